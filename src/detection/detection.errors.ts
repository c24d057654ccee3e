/**
 * Error codes for registry/configuration issues
 */
export enum RegistryErrorCode {
  DETECTOR_ALREADY_REGISTERED = "DETECTOR_ALREADY_REGISTERED",
}

/**
 * Error thrown when detector registry operations fail
 */
export class RegistryError extends Error {
  constructor(
    public readonly code: RegistryErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RegistryError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError);
    }
  }
}

/**
 * Error thrown when attempting to register a second detector under a taken name
 */
export class DetectorAlreadyRegisteredError extends RegistryError {
  constructor(message: string) {
    super(RegistryErrorCode.DETECTOR_ALREADY_REGISTERED, message);
    this.name = "DetectorAlreadyRegisteredError";
  }
}
