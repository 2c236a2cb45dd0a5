import argon2 from 'argon2';
import { SignJWT, jwtVerify } from 'jose';

export interface AccessTokenClaims {
  sub: string;
  username: string;
  email: string;
}

const TOKEN_ALGORITHM = 'HS256';

/**
 * Hash a password using argon2id
 */
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 65536, // 64 MB
    timeCost: 3,
    parallelism: 4,
  });
}

/**
 * Verify a password against a hash
 */
export async function verifyPassword(
  password: string,
  hash: string
): Promise<boolean> {
  return argon2.verify(hash, password);
}

/**
 * Calculate expiry date for tokens
 */
export function getTokenExpiry(duration: string, now: Date = new Date()): Date {
  const match = duration.match(/^(\d+)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  switch (unit) {
    case 's':
      return new Date(now.getTime() + value * 1000);
    case 'm':
      return new Date(now.getTime() + value * 60 * 1000);
    case 'h':
      return new Date(now.getTime() + value * 60 * 60 * 1000);
    case 'd':
      return new Date(now.getTime() + value * 24 * 60 * 60 * 1000);
    default:
      throw new Error(`Invalid duration unit: ${unit}`);
  }
}

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign an HS256 access token that expires at `expiresAt`.
 */
export async function signAccessToken(
  claims: AccessTokenClaims,
  secret: string,
  expiresAt: Date
): Promise<string> {
  return new SignJWT({ username: claims.username, email: claims.email })
    .setProtectedHeader({ alg: TOKEN_ALGORITHM })
    .setSubject(claims.sub)
    .setIssuedAt()
    .setExpirationTime(Math.floor(expiresAt.getTime() / 1000))
    .sign(secretKey(secret));
}

/**
 * Verify an access token and return its claims.
 * Rejects with the underlying jose error when the token is invalid or expired.
 */
export async function verifyAccessToken(
  token: string,
  secret: string
): Promise<AccessTokenClaims> {
  const { payload } = await jwtVerify(token, secretKey(secret), {
    algorithms: [TOKEN_ALGORITHM],
  });

  const { sub, username, email } = payload;
  if (!sub || typeof username !== 'string' || typeof email !== 'string') {
    throw new Error('Access token is missing required claims');
  }

  return { sub, username, email };
}
