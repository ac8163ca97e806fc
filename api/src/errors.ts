import { STATUS_CODES } from 'node:http';

export type ErrorKind =
  | 'InvalidRequest'
  | 'Unauthenticated'
  | 'MissingIdentity'
  | 'Forbidden'
  | 'NotFound'
  | 'NoActiveRecord'
  | 'Conflict'
  | 'CodeExpired'
  | 'RateLimited'
  | 'Internal'
  | 'DeliveryFailed';

const STATUS: Record<ErrorKind, number> = {
  InvalidRequest: 400,
  Unauthenticated: 401,
  MissingIdentity: 401,
  Forbidden: 403,
  NotFound: 404,
  NoActiveRecord: 404,
  Conflict: 409,
  CodeExpired: 410,
  RateLimited: 429,
  Internal: 500,
  DeliveryFailed: 502
};

export function statusFor(kind: ErrorKind): number {
  return STATUS[kind];
}

export function statusText(status: number): string {
  return STATUS_CODES[status] ?? 'Error';
}

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.kind = kind;
  }

  get status() {
    return statusFor(this.kind);
  }
}
