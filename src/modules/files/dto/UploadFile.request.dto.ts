import { IsBase64, IsString, MaxLength, MinLength } from 'class-validator';

export class UploadFileRequestDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  public readonly name!: string;

  @IsBase64()
  public readonly contentBase64!: string;
}
