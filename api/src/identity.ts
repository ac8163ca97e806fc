import type { FastifyRequest } from 'fastify';
import { AppError } from './errors.js';
import type { Role } from './store.js';
import type { Claims } from './token.js';

export type Identity = {
  readonly subjectId: string;
  readonly email: string;
  readonly role: Role;
};

declare module 'fastify' {
  interface FastifyRequest {
    identity: Identity | null;
  }
}

export function identityFromClaims(claims: Claims): Identity {
  return Object.freeze({ subjectId: claims.sub, email: claims.email, role: claims.role });
}

function missing(field: string): never {
  throw new AppError('MissingIdentity', `No authenticated ${field} on this request`);
}

// Read-only view of the identity attached by the access guard.
export class RequestIdentity {
  constructor(private readonly value: Identity | null) {}

  subjectId(): string {
    return this.value?.subjectId ?? missing('subject');
  }

  email(): string {
    return this.value?.email ?? missing('email');
  }

  role(): Role {
    return this.value?.role ?? missing('role');
  }
}

export function requireIdentity(req: FastifyRequest): Identity {
  return req.identity ?? missing('identity');
}

export function identityOf(req: FastifyRequest) {
  return new RequestIdentity(req.identity);
}
