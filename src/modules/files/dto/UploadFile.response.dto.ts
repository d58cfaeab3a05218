export interface UploadFileResponseDto {
  id: string;
}
