import { ConfigService } from "@nestjs/config";

export const MAX_UPLOAD_BYTES_KEY = "PROBE_MAX_UPLOAD_BYTES";
export const DEFAULT_MAX_UPLOAD_BYTES = 1024 * 1024;

/**
 * Number of leading file bytes kept for probing
 * Non-numeric and non-positive values fall back to the default.
 */
export function resolveMaxUploadBytes(configService: ConfigService): number {
  const raw = configService.get<string>(MAX_UPLOAD_BYTES_KEY);
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_MAX_UPLOAD_BYTES;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 ? value : DEFAULT_MAX_UPLOAD_BYTES;
}
