import 'dotenv/config';
import { z } from 'zod';
import type { OtpPurpose } from './store.js';

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: intFrom(8080),
  HOST: z.string().default('0.0.0.0'),
  TRUST_PROXY: z.enum(['true', 'false']).default('false'),
  DATABASE_URL: z.string().optional(),

  JWT_SECRET: z.string().min(1).default('dev-jwt-secret-change-me'),
  JWT_EXPIRATION: intFrom(3600),
  RATE_LIMIT_PER_MINUTE: intFrom(60),

  OTP_LOGIN_MINUTES: intFrom(5),
  OTP_PASSWORD_RESET_MINUTES: intFrom(10),
  OTP_VERIFICATION_MINUTES: intFrom(15),
  OTP_REGISTRATION_MINUTES: intFrom(15),
  DELIVERY_TIMEOUT_MS: intFrom(10_000),

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: intFrom(587),
  SMTP_USERNAME: z.string().default(''),
  SMTP_PASSWORD: z.string().default(''),
  SMTP_EMAIL: z.string().default(''),

  WHATSAPP_API_URL: z.string().default('https://graph.facebook.com/v19.0'),
  WHATSAPP_TOKEN: z.string().default(''),
  WHATSAPP_PHONE_NUMBER_ID: z.string().default('')
});

export type AppConfig = {
  port: number;
  host: string;
  trustProxy: boolean;
  databaseUrl?: string;
  jwtSecret: string;
  jwtExpirationSeconds: number;
  rateLimitPerMinute: number;
  otpExpiryMinutes: Record<OtpPurpose, number>;
  deliveryTimeoutMs: number;
  smtp: { host: string; port: number; username: string; password: string; from: string };
  whatsapp: { apiUrl: string; token: string; phoneNumberId: string };
};

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  // Empty strings from .env files mean "unset".
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    trustProxy: e.TRUST_PROXY === 'true',
    databaseUrl: e.DATABASE_URL,
    jwtSecret: e.JWT_SECRET,
    jwtExpirationSeconds: e.JWT_EXPIRATION,
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    otpExpiryMinutes: {
      login: e.OTP_LOGIN_MINUTES,
      'password-reset': e.OTP_PASSWORD_RESET_MINUTES,
      verification: e.OTP_VERIFICATION_MINUTES,
      registration: e.OTP_REGISTRATION_MINUTES
    },
    deliveryTimeoutMs: e.DELIVERY_TIMEOUT_MS,
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      username: e.SMTP_USERNAME,
      password: e.SMTP_PASSWORD,
      from: e.SMTP_EMAIL
    },
    whatsapp: {
      apiUrl: e.WHATSAPP_API_URL,
      token: e.WHATSAPP_TOKEN,
      phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID
    }
  };
}

export const config = loadConfig(process.env);
