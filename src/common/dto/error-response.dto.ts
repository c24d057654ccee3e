/**
 * Body of every error response the API sends
 */
export interface ErrorResponseDto {
  error: string;
  code: string;
}
