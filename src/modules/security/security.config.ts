import { registerAs } from '@nestjs/config';

export const ENV_JWT_SECRET = 'JWT_SECRET';
export const ENV_JWT_ALGORITHM = 'JWT_ALGORITHM';
export const ENV_JWT_EXPIRES_MINUTES = 'JWT_EXPIRES_MINUTES';
export const ENV_BCRYPT_ROUNDS = 'BCRYPT_ROUNDS';

/** Shared-secret algorithms; anything else needs a key pair. */
export const TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export interface SecurityConfig {
  secretKey: string;
  algorithm: TokenAlgorithm;
  expiresMinutes: number;
  bcryptRounds: number;
}

export const SECURITY_DEFAULTS = {
  // Dev-only fallback; set JWT_SECRET anywhere else.
  secretKey: 'dev-only-secret',
  algorithm: 'HS256',
  expiresMinutes: 30,
  bcryptRounds: 10,
} as const satisfies SecurityConfig;

function isTokenAlgorithm(v: string): v is TokenAlgorithm {
  return TOKEN_ALGORITHMS.some((a) => a === v);
}

function positiveInt(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer (got '${raw}')`);
  }
  return n;
}

export function loadSecurityConfig(env: NodeJS.ProcessEnv = process.env): SecurityConfig {
  const algorithm = env[ENV_JWT_ALGORITHM]?.trim() || SECURITY_DEFAULTS.algorithm;
  if (!isTokenAlgorithm(algorithm)) {
    throw new Error(
      `${ENV_JWT_ALGORITHM} must be one of ${TOKEN_ALGORITHMS.join(', ')} (got '${algorithm}')`,
    );
  }
  return {
    secretKey: env[ENV_JWT_SECRET]?.trim() || SECURITY_DEFAULTS.secretKey,
    algorithm,
    expiresMinutes: positiveInt(
      env[ENV_JWT_EXPIRES_MINUTES],
      ENV_JWT_EXPIRES_MINUTES,
      SECURITY_DEFAULTS.expiresMinutes,
    ),
    bcryptRounds: positiveInt(env[ENV_BCRYPT_ROUNDS], ENV_BCRYPT_ROUNDS, SECURITY_DEFAULTS.bcryptRounds),
  };
}

export const securityConfig = registerAs('security', () => loadSecurityConfig());
