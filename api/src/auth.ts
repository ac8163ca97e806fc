import fp from 'fastify-plugin';
import type {
  FastifyBaseLogger,
  FastifyPluginAsync,
  FastifyTypeProviderDefault,
  RawServerDefault
} from 'fastify';
import { z } from 'zod';
import type { Services } from './app.js';
import { AppError } from './errors.js';
import type { VerificationResult } from './otp.js';
import { publicProfile, type Profile } from './profileRepo.js';
import { parseInput, sendSuccess } from './respond.js';
import { hashPassword, verifyPassword } from './security.js';
import { OTP_PURPOSES, type OtpPurpose } from './store.js';
import { signToken } from './token.js';

const email = z
  .string({ required_error: 'Email is required' })
  .trim()
  .min(1, 'Email is required')
  .email('Email address is invalid')
  .transform((value) => value.toLowerCase());

const purpose = z.enum(OTP_PURPOSES, {
  errorMap: () => ({ message: `Purpose must be one of: ${OTP_PURPOSES.join(', ')}` })
});

const code = z
  .string({ required_error: 'Code is required' })
  .trim()
  .regex(/^\d{6}$/, 'Code must be 6 digits');

const password = z.string({ required_error: 'Password is required' }).min(8, 'Password must be at least 8 characters');

// Password-reset and registration codes are consumed by their own profile routes.
const verifiablePurpose = z.enum(['login', 'verification'], {
  errorMap: () => ({ message: 'Purpose must be login or verification' })
});

const RequestOtpBody = z.object({ email, purpose });
const VerifyOtpBody = z.object({ email, purpose: verifiablePurpose, code });

const CreateProfileBody = z.object({
  full_name: z.string({ required_error: 'Full name is required' }).trim().min(1, 'Full name is required'),
  email,
  password,
  role: z.enum(['farmer', 'buyer'], { errorMap: () => ({ message: 'Role must be farmer or buyer' }) }),
  phone: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).optional(),
  code
});

const LoginBody = z.object({ email, password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required') });

const PasswordResetBody = z.object({ email, code, password });

// Purposes that need an existing account, and the one that needs the email to be free.
const REQUIRES_ACCOUNT: Record<OtpPurpose, boolean> = {
  login: true,
  'password-reset': true,
  verification: true,
  registration: false
};

function rejectUnverified(result: Exclude<VerificationResult, 'Valid'>): never {
  if (result === 'Expired') {
    throw new AppError('CodeExpired', 'Verification code has expired. Request a new one.');
  }
  if (result === 'Invalid') {
    throw new AppError('Unauthenticated', 'Invalid verification code');
  }
  throw new AppError('NotFound', 'No verification code found. Request a new one.');
}

export const authPlugin: FastifyPluginAsync<{ services: Services }> = fp<{ services: Services }, RawServerDefault, FastifyTypeProviderDefault, FastifyBaseLogger, FastifyPluginAsync<{ services: Services }>>(
  async (app, { services }) => {
    const { otp, profiles, audit, guard, config, now } = services;

    function tokenFor(profile: Profile) {
      return signToken(
        { id: profile.id, email: profile.email, role: profile.role },
        { secret: config.jwtSecret, ttlSeconds: config.jwtExpirationSeconds, now }
      );
    }

    async function consume(address: string, p: OtpPurpose, presented: string) {
      const result = await otp.verify(address, p, presented);
      await audit.record('otp_verify', { purpose: p, result });
      if (result !== 'Valid') rejectUnverified(result);
    }

    app.post('/v1/otp/request', { onRequest: guard.admitClient }, async (req, reply) => {
      const body = parseInput(RequestOtpBody, req.body);
      const existing = await profiles.findByEmail(body.email);

      if (REQUIRES_ACCOUNT[body.purpose] && !existing) {
        throw new AppError('NotFound', 'No account found for this email');
      }
      if (!REQUIRES_ACCOUNT[body.purpose] && existing) {
        throw new AppError('Conflict', 'An account with this email already exists');
      }

      const issued = await otp.issue(body.email, body.purpose);
      await audit.record('otp_issued', { purpose: body.purpose, delivered: issued.delivery.status === 'sent' });

      if (issued.delivery.status === 'failed') {
        throw new AppError(
          'DeliveryFailed',
          'Verification code was created but could not be delivered. Request a resend.',
          { cause: issued.delivery.error }
        );
      }

      return sendSuccess(reply, 'Verification code sent', { expiresAt: new Date(issued.record.expiresAt).toISOString() });
    });

    app.post('/v1/otp/resend', { onRequest: guard.admitClient }, async (req, reply) => {
      const body = parseInput(RequestOtpBody, req.body);
      const record = await otp.resend(body.email, body.purpose);
      await audit.record('otp_resent', { purpose: body.purpose });
      return sendSuccess(reply, 'Verification code re-sent', { expiresAt: new Date(record.expiresAt).toISOString() });
    });

    app.post('/v1/otp/verify', { onRequest: guard.admitClient }, async (req, reply) => {
      const body = parseInput(VerifyOtpBody, req.body);
      await consume(body.email, body.purpose, body.code);

      const profile = await profiles.findByEmail(body.email);
      if (!profile) throw new AppError('NotFound', 'No account found for this email');

      if (body.purpose === 'verification') {
        const verifiedAt = new Date(now());
        await profiles.markEmailVerified(profile.id, verifiedAt);
        await audit.record('email_verified', { userId: profile.id });
        return sendSuccess(reply, 'Email verified', { verifiedAt: verifiedAt.toISOString() });
      }

      await audit.record('login_ok', { method: 'otp', userId: profile.id });
      return sendSuccess(reply, 'Login successful', { token: tokenFor(profile), profile: publicProfile(profile) });
    });

    app.post('/v1/profile/create', { onRequest: guard.admitClient }, async (req, reply) => {
      const body = parseInput(CreateProfileBody, req.body);
      if (await profiles.findByEmail(body.email)) {
        throw new AppError('Conflict', 'An account with this email already exists');
      }

      await consume(body.email, 'registration', body.code);

      const profile = await profiles.create({
        fullName: body.full_name,
        email: body.email,
        passwordHash: hashPassword(body.password),
        role: body.role,
        phone: body.phone ?? null,
        location: body.location ?? null
      });
      await audit.record('profile_created', { userId: profile.id, role: profile.role });
      return sendSuccess(reply, 'Profile created', { token: tokenFor(profile), profile }, 201);
    });

    app.post('/v1/profile/login', { onRequest: guard.admitClient }, async (req, reply) => {
      const body = parseInput(LoginBody, req.body);
      const profile = await profiles.findByEmail(body.email);

      if (!profile || !verifyPassword(body.password, profile.password)) {
        await audit.record('login_failed', { ip: req.ip });
        throw new AppError('Unauthenticated', 'Invalid email or password');
      }

      await audit.record('login_ok', { method: 'password', userId: profile.id });
      return sendSuccess(reply, 'Login successful', { token: tokenFor(profile), profile: publicProfile(profile) });
    });

    app.post('/v1/profile/password-reset', { onRequest: guard.admitClient }, async (req, reply) => {
      const body = parseInput(PasswordResetBody, req.body);
      const profile = await profiles.findByEmail(body.email);
      if (!profile) throw new AppError('NotFound', 'No account found for this email');

      await consume(body.email, 'password-reset', body.code);
      await profiles.setPassword(profile.id, hashPassword(body.password));
      await audit.record('password_reset', { userId: profile.id });
      return sendSuccess(reply, 'Password updated');
    });
  },
  { name: 'auth' }
);
