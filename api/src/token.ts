import crypto from 'node:crypto';
import { z } from 'zod';
import { ROLES, type Role } from './store.js';
import { safeEqual } from './security.js';

export type Claims = {
  readonly sub: string;
  readonly email: string;
  readonly role: Role;
  readonly iat: number;
  readonly exp: number;
};

const HeaderSchema = z.object({ alg: z.literal('HS256'), typ: z.literal('JWT') });

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  role: z.enum(ROLES),
  iat: z.number().int(),
  exp: z.number().int()
});

type Clock = { now?: () => number };

function hmac(secret: string, data: string) {
  return crypto.createHmac('sha256', secret).update(data).digest('base64url');
}

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
}

export function signToken(
  identity: { id: string; email: string; role: Role },
  opts: { secret: string; ttlSeconds: number } & Clock
) {
  const iat = Math.floor((opts.now ?? Date.now)() / 1000);
  const header = Buffer.from(JSON.stringify({ alg: 'HS256', typ: 'JWT' })).toString('base64url');
  const payload = Buffer.from(
    JSON.stringify({ sub: identity.id, email: identity.email, role: identity.role, iat, exp: iat + opts.ttlSeconds })
  ).toString('base64url');
  const data = `${header}.${payload}`;
  return `${data}.${hmac(opts.secret, data)}`;
}

/**
 * Verifies an HS256 token issued by {@link signToken}.
 *
 * Returns `null` for every kind of failure (structure, header, signature, expiry, claims)
 * so callers cannot tell which check rejected the token.
 */
export function verifyToken(token: string, opts: { secret: string } & Clock): Claims | null {
  const parts = token.split('.');
  if (parts.length !== 3) return null;
  const [h, p, s] = parts;
  if (!h || !p || !s) return null;

  if (!safeEqual(hmac(opts.secret, `${h}.${p}`), s)) return null;
  if (!HeaderSchema.safeParse(decodeSegment(h)).success) return null;

  const claims = ClaimsSchema.safeParse(decodeSegment(p));
  if (!claims.success) return null;

  const nowSeconds = Math.floor((opts.now ?? Date.now)() / 1000);
  if (nowSeconds >= claims.data.exp) return null;

  return claims.data;
}
