import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PasswordHasher } from './password.hasher';
import { securityConfig } from './security.config';
import { TokenService } from './token.service';

@Module({
  imports: [ConfigModule.forFeature(securityConfig)],
  providers: [TokenService, PasswordHasher],
  exports: [TokenService, PasswordHasher],
})
export class SecurityModule {}
