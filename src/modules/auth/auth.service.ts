import { Injectable, Logger } from '@nestjs/common';
import { InvalidCredentialsError } from '../../lib/errors/AuthError';
import { PasswordHasher } from '../security/password.hasher';
import { TokenService } from '../security/token.service';
import { UsersService } from '../users/users.service';
import type { LoginResponseDto } from './dto/Login.response.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  public constructor(
    private readonly users: UsersService,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
  ) {}

  /** Unknown email and wrong password fail the same way. */
  public async login(email: string, password: string): Promise<LoginResponseDto> {
    const user = await this.users.findByEmail(email);
    if (!user.found || !(await this.hasher.verify(user.value.passwordHash, password))) {
      this.logger.warn(`Failed login for ${email}`);
      throw new InvalidCredentialsError();
    }
    const accessToken = this.tokens.issue({
      sub: user.value._id.toHexString(),
      email: user.value.email,
    });
    return { accessToken, tokenType: 'bearer' };
  }
}
