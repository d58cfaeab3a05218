import { randomBytes } from 'node:crypto';
import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import bcrypt from 'bcrypt';
import { securityConfig } from './security.config';

@Injectable()
export class PasswordHasher {
  public constructor(
    @Inject(securityConfig.KEY)
    private readonly cfg: ConfigType<typeof securityConfig>,
  ) {}

  public hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cfg.bcryptRounds);
  }

  public verify(hash: string, plain: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }

  /** 32 hex characters from 16 random bytes. */
  public randomString(): string {
    return randomBytes(16).toString('hex');
  }
}
