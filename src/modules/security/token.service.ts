import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { InvalidTokenError } from '../../lib/errors/AuthError';
import { securityConfig } from './security.config';

/** Caller-supplied claims; expiry and issue time are set on signing. */
export type TokenClaims = Record<string, unknown> & { sub: string };

export type VerifiedClaims = JwtPayload & { sub: string };

const RESERVED_CLAIMS = new Set(['exp', 'iat', 'nbf']);

@Injectable()
export class TokenService {
  public constructor(
    @Inject(securityConfig.KEY)
    private readonly cfg: ConfigType<typeof securityConfig>,
  ) {}

  /** Sign `claims` with an expiry of the configured number of minutes. */
  public issue(claims: TokenClaims): string {
    const payload: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(claims)) {
      if (!RESERVED_CLAIMS.has(k)) payload[k] = v;
    }
    return jwt.sign(payload, this.cfg.secretKey, {
      algorithm: this.cfg.algorithm,
      expiresIn: this.cfg.expiresMinutes * 60,
    });
  }

  /** Decode and check a token; any failure is InvalidTokenError (403). */
  public verify(token: string): VerifiedClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.cfg.secretKey, {
        algorithms: [this.cfg.algorithm],
      });
    } catch (err) {
      throw new InvalidTokenError(err instanceof Error ? err.message : String(err));
    }
    if (typeof decoded === 'string') {
      throw new InvalidTokenError('payload is not an object');
    }
    const { sub } = decoded;
    if (typeof sub !== 'string' || sub.length === 0) {
      throw new InvalidTokenError('missing subject');
    }
    return { ...decoded, sub };
  }
}
