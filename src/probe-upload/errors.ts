/**
 * Domain error thrown when the uploaded bytes match no known format.
 * Framework-agnostic error that can be converted to HTTP exceptions in the API layer.
 */
export class UnsupportedFormatError extends Error {
  constructor(public readonly size: number) {
    super(`Unsupported media format: no detector matched the first ${size} bytes`);
    this.name = "UnsupportedFormatError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsupportedFormatError);
    }
  }
}

/**
 * Domain error thrown when upload validation fails.
 * Framework-agnostic error that can be converted to HTTP exceptions in the API layer.
 */
export class UploadValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadValidationError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UploadValidationError);
    }
  }
}

/**
 * Error codes returned by the probe API.
 * Domain errors are converted to HTTP exceptions with these codes in the controller layer.
 */
export enum ProbeErrorCode {
  FILE_REQUIRED = "FILE_REQUIRED",
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
}
