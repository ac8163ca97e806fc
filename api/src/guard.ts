import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AdmissionTracker } from './admission.js';
import { AppError } from './errors.js';
import { identityFromClaims, requireIdentity, type Identity } from './identity.js';
import type { Role } from './store.js';
import { verifyToken } from './token.js';

export type GuardDeps = {
  admission: AdmissionTracker;
  rateLimitPerMinute: number;
  jwtSecret: string;
  now?: () => number;
};

export type ProtectedHandler = (req: FastifyRequest, reply: FastifyReply, identity: Identity) => unknown;

const BEARER = 'Bearer ';

export function isAllowed(required: readonly Role[] | undefined, role: Role) {
  if (!required || required.length === 0) return true;
  return required.includes(role);
}

export function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER)) return null;
  const token = header.slice(BEARER.length);
  if (!token || /\s/.test(token)) return null;
  return token;
}

export function createGuard(deps: GuardDeps) {
  // onRequest hook: runs before the body is read, so malformed payloads are still counted.
  async function admitClient(req: FastifyRequest, reply: FastifyReply) {
    const clientKey = req.ip;
    if (!(await deps.admission.admit(clientKey, deps.rateLimitPerMinute))) {
      const seconds = Math.ceil(deps.admission.retryAfterMs(clientKey) / 1000);
      reply.header('Retry-After', String(Math.max(1, seconds)));
      throw new AppError('RateLimited', 'Rate limit exceeded. Please try again later.');
    }
  }

  function authenticate(req: FastifyRequest): Identity {
    const header = req.headers.authorization;
    if (!header) throw new AppError('Unauthenticated', 'Authorization header is required');

    const token = bearerToken(header);
    if (!token) throw new AppError('Unauthenticated', 'Invalid authorization format. Use: Bearer <token>');

    const claims = verifyToken(token, { secret: deps.jwtSecret, now: deps.now });
    if (!claims) throw new AppError('Unauthenticated', 'Invalid or expired token');

    return identityFromClaims(claims);
  }

  /**
   * Route options for a protected endpoint. Admission, bearer authentication and the role
   * check run in that order as an onRequest hook, ahead of body parsing, and attach the
   * identity to the request. The handler then receives that identity.
   */
  function protect(handler: ProtectedHandler, opts: { roles?: readonly Role[] } = {}) {
    return {
      onRequest: async (req: FastifyRequest, reply: FastifyReply) => {
        await admitClient(req, reply);
        const identity = authenticate(req);
        if (!isAllowed(opts.roles, identity.role)) {
          throw new AppError('Forbidden', 'Insufficient permissions for this action');
        }
        req.identity = identity;
      },
      handler: async (req: FastifyRequest, reply: FastifyReply) => handler(req, reply, requireIdentity(req))
    };
  }

  return { admitClient, authenticate, protect };
}

export type Guard = ReturnType<typeof createGuard>;
