import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Busboy from "busboy";
import { Request } from "express";
import { Readable } from "stream";
import { BusboyFactory } from "./busboy-factory.service";
import { UploadValidationError } from "./errors";
import { resolveMaxUploadBytes } from "./probe-upload.config";

const FILE_FIELD = "file";

/**
 * Service responsible for reading the uploaded file out of a multipart request.
 * Keeps only the leading bytes needed for classification.
 */
@Injectable()
export class ProbeUploadService {
  private readonly logger = new Logger(ProbeUploadService.name);
  private readonly maxBytes: number;

  constructor(
    private readonly busboyFactory: BusboyFactory,
    configService: ConfigService,
  ) {
    this.maxBytes = resolveMaxUploadBytes(configService);
  }

  /**
   * Parses a multipart/form-data request and buffers the `file` field
   *
   * @param req - Express request object containing multipart/form-data
   * @returns Promise resolving to at most `PROBE_MAX_UPLOAD_BYTES` leading bytes of the file
   * @throws UploadValidationError for invalid requests (invalid content type, missing file, parse failure)
   */
  async readUpload(req: Request): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const contentType = req.headers["content-type"] || "";
      if (!contentType.includes("multipart/form-data")) {
        reject(
          new UploadValidationError(
            "Invalid content type. Expected multipart/form-data",
          ),
        );
        return;
      }

      let busboy: Busboy.Busboy;
      try {
        busboy = this.busboyFactory.create(req.headers, {
          fileSize: this.maxBytes,
          files: 1,
        });
      } catch (error) {
        this.handleParseError(reject, error);
        return;
      }

      let filePromise: Promise<Buffer> | null = null;

      busboy.on("file", (name: string, stream: Readable, info: Busboy.FileInfo) => {
        if (name !== FILE_FIELD || filePromise !== null) {
          stream.resume(); // Drain other fields
          return;
        }

        this.logger.debug(
          `Received file upload: ${info.filename}, type: ${info.mimeType}, encoding: ${info.encoding}`,
        );
        filePromise = this.collectPrefix(stream);
        // busboy skips "finish" when the form ends mid-file
        filePromise.catch((error: unknown) => this.handleParseError(reject, error));
      });

      busboy.on("finish", () => {
        if (filePromise === null) {
          reject(new UploadValidationError("File is required"));
          return;
        }
        filePromise.then(resolve, reject);
      });

      busboy.on("error", (error: unknown) => this.handleParseError(reject, error));

      req.pipe(busboy);
    });
  }

  /**
   * Reads the stream to its end, keeping the first `maxBytes` bytes
   * Busboy truncates the stream at the `fileSize` limit; the slice guards parsers that do not.
   */
  private collectPrefix(stream: Readable): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let kept = 0;

      stream.on("data", (chunk: Buffer) => {
        if (kept >= this.maxBytes) {
          return;
        }
        const part = chunk.subarray(0, this.maxBytes - kept);
        chunks.push(part);
        kept += part.length;
      });

      stream.on("limit", () => {
        this.logger.debug(`File truncated to ${this.maxBytes} bytes for probing`);
      });

      stream.on("end", () => resolve(Buffer.concat(chunks)));
      stream.on("error", reject);
    });
  }

  private handleParseError(reject: (reason?: unknown) => void, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Busboy error: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    reject(new UploadValidationError(`Failed to parse multipart form data: ${message}`));
  }
}
