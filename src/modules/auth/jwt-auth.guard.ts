import { Injectable, type CanActivate, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { MissingCredentialsError } from '../../lib/errors/AuthError';
import { toHttpException } from '../../lib/errors/http';
import { TokenService, type VerifiedClaims } from '../security/token.service';

export interface AuthenticatedRequest extends Request {
  user?: VerifiedClaims;
}

const BEARER_RX = /^Bearer\s+(\S+)$/i;

/** Requires `Authorization: Bearer <token>`; puts the claims on `req.user`. */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  public constructor(private readonly tokens: TokenService) {}

  public canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const match = BEARER_RX.exec(req.headers.authorization ?? '');
    try {
      if (!match) throw new MissingCredentialsError();
      req.user = this.tokens.verify(match[1]);
      return true;
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
