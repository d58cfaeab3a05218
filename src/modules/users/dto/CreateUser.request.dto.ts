import { IsEmail, IsString, MaxLength, MinLength } from 'class-validator';

export class CreateUserRequestDto {
  @IsEmail()
  public readonly email!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(200)
  public readonly name!: string;

  @IsString()
  @MinLength(8)
  public readonly password!: string;
}
