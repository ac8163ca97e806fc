import crypto from 'node:crypto';

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

const PASSWORD_SCHEME = 'scrypt';
const KEY_LENGTH = 64;

// Stored as `scrypt$<salt>$<derived key>`, both base64url.
export function hashPassword(password: string) {
  const salt = crypto.randomBytes(16);
  const key = crypto.scryptSync(password, salt, KEY_LENGTH);
  return [PASSWORD_SCHEME, salt.toString('base64url'), key.toString('base64url')].join('$');
}

export function verifyPassword(password: string, stored: string) {
  const parts = stored.split('$');
  if (parts.length !== 3 || parts[0] !== PASSWORD_SCHEME) return false;
  const salt = Buffer.from(parts[1] ?? '', 'base64url');
  const expected = Buffer.from(parts[2] ?? '', 'base64url');
  if (salt.length === 0 || expected.length !== KEY_LENGTH) return false;
  return crypto.timingSafeEqual(expected, crypto.scryptSync(password, salt, KEY_LENGTH));
}

// Constant-time for equal lengths; a length mismatch returns early.
export function safeEqual(a: string, b: string) {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function generateNumericCode(digits = 6) {
  return crypto.randomInt(0, 10 ** digits).toString().padStart(digits, '0');
}
