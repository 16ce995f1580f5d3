// apps/api/src/lib/sessionToken.ts
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { ROLES, type Role } from '../models/user';

export const SESSION_TTL_SECONDS = 24 * 60 * 60;

/** The authenticated caller, as carried by a session token. */
export interface Principal {
  id: string;
  email: string;
  role: Role;
}

export type TokenErrorCode = 'TokenExpired' | 'TokenInvalid';

export class TokenError extends Error {
  constructor(readonly code: TokenErrorCode) {
    super(code);
    this.name = 'TokenError';
  }
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  role: z.enum(ROLES),
  exp: z.number(),
});

const toSeconds = (at: Date) => Math.floor(at.getTime() / 1000);

export function issueSessionToken(
  principal: Principal,
  secret: string,
  opts: { ttlSeconds?: number; now?: Date } = {}
) {
  const iat = toSeconds(opts.now ?? new Date());
  return jwt.sign({ email: principal.email, role: principal.role, iat }, secret, {
    algorithm: 'HS256',
    subject: principal.id,
    expiresIn: opts.ttlSeconds ?? SESSION_TTL_SECONDS,
  });
}

/**
 * Verifies signature and expiry, then decodes the claims into a Principal.
 * Nothing here consults the database.
 */
export function verifySessionToken(token: string, secret: string, opts: { now?: Date } = {}): Principal {
  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      clockTimestamp: toSeconds(opts.now ?? new Date()),
    });
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) throw new TokenError('TokenExpired');
    if (err instanceof jwt.JsonWebTokenError) throw new TokenError('TokenInvalid');
    throw err;
  }

  const claims = claimsSchema.safeParse(payload);
  if (!claims.success) throw new TokenError('TokenInvalid');
  return { id: claims.data.sub, email: claims.data.email, role: claims.data.role };
}
