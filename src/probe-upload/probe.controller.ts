import { BadRequestException, Controller, Post, Req } from "@nestjs/common";
import { Request } from "express";
import { AudioType } from "../detection/audio-type";
import { ProbeService } from "../detection/probe.service";
import { ProbeResponseDto } from "./dto/probe-response.dto";
import { ProbeErrorCode, UnsupportedFormatError, UploadValidationError } from "./errors";
import { ProbeUploadService } from "./probe-upload.service";

@Controller("probe")
export class ProbeController {
  constructor(
    private readonly probeUploadService: ProbeUploadService,
    private readonly probeService: ProbeService,
  ) {}

  @Post()
  async probe(@Req() req: Request): Promise<ProbeResponseDto> {
    try {
      const data = await this.probeUploadService.readUpload(req);

      const result = this.probeService.probe(data);
      if (result.format === AudioType.Unknown) {
        throw new UnsupportedFormatError(data.length);
      }

      return result;
    } catch (error) {
      // Convert domain errors to HTTP exceptions
      if (error instanceof UnsupportedFormatError) {
        throw new BadRequestException({
          error: error.message,
          code: ProbeErrorCode.UNSUPPORTED_FORMAT,
        });
      }

      if (error instanceof UploadValidationError) {
        throw new BadRequestException({
          error: error.message,
          code: ProbeErrorCode.FILE_REQUIRED,
        });
      }

      // Re-throw unknown errors (will be handled by exception filter)
      throw error;
    }
  }
}
