import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, MinLength } from 'class-validator';

export class UpdateAddressRequestDto {
  @IsOptional()
  @IsString()
  @MinLength(1)
  public readonly label?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  public readonly street?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  public readonly city?: string;

  @IsOptional()
  @IsBoolean()
  public readonly primary?: boolean;
}

export class UpdateAddressQueryDto {
  /** `?upsert=true` appends the address when the user has none with this id. */
  @IsOptional()
  @Transform(({ value }: { value: unknown }) => value === true || value === 'true')
  @IsBoolean()
  public readonly upsert?: boolean;
}
