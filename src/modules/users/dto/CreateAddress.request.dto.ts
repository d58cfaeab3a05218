import { IsBoolean, IsOptional, IsString, MinLength } from 'class-validator';

export class CreateAddressRequestDto {
  @IsString()
  @MinLength(1)
  public readonly label!: string;

  @IsString()
  @MinLength(1)
  public readonly street!: string;

  @IsString()
  @MinLength(1)
  public readonly city!: string;

  @IsOptional()
  @IsBoolean()
  public readonly primary?: boolean;
}
