import { IsEmail, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

/** Unset fields keep their stored value. */
export class UpdateUserRequestDto {
  @IsOptional()
  @IsEmail()
  public readonly email?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  public readonly name?: string;

  @IsOptional()
  @IsString()
  @MinLength(8)
  public readonly password?: string;
}
