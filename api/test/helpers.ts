import crypto from 'node:crypto';
import { buildApp, type AppDeps } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { AppError } from '../src/errors.js';
import type { Mailer } from '../src/mailer.js';
import type {
  AuditLog,
  NewProfile,
  Profile,
  ProfileRepository,
  ProfileWithPassword
} from '../src/profileRepo.js';
import { hashPassword } from '../src/security.js';
import type { Role } from '../src/store.js';
import { signToken } from '../src/token.js';
import type { MessageSender } from '../src/whatsapp.js';

export const TEST_SECRET = 'test-secret';

export function testConfig(overrides: Record<string, string> = {}) {
  return loadConfig({ JWT_SECRET: TEST_SECRET, RATE_LIMIT_PER_MINUTE: '100', ...overrides });
}

export class Clock {
  constructor(public current = Date.parse('2026-01-01T00:00:00.000Z')) {}

  now = () => this.current;

  advance(ms: number) {
    this.current += ms;
  }
}

export class MemoryProfileRepository implements ProfileRepository {
  readonly rows = new Map<string, ProfileWithPassword>();

  async findByEmail(email: string) {
    for (const row of this.rows.values()) {
      if (row.email === email) return row;
    }
    return null;
  }

  async findById(id: string) {
    const row = this.rows.get(id);
    if (!row) return null;
    const { password: _password, ...profile } = row;
    return profile;
  }

  async create(p: NewProfile): Promise<Profile> {
    if (await this.findByEmail(p.email)) throw new AppError('Conflict', 'A profile with this email or phone already exists');
    const row: ProfileWithPassword = {
      id: crypto.randomUUID(),
      full_name: p.fullName,
      email: p.email,
      phone: p.phone ?? null,
      role: p.role,
      location: p.location ?? null,
      email_verified_at: null,
      created_at: new Date('2026-01-01T00:00:00.000Z'),
      password: p.passwordHash
    };
    this.rows.set(row.id, row);
    const { password: _password, ...profile } = row;
    return profile;
  }

  async setPassword(id: string, passwordHash: string) {
    const row = this.rows.get(id);
    if (row) this.rows.set(id, { ...row, password: passwordHash });
  }

  async markEmailVerified(id: string, at: Date) {
    const row = this.rows.get(id);
    if (row && !row.email_verified_at) this.rows.set(id, { ...row, email_verified_at: at });
  }

  seed(email: string, role: Role, password = 'correct-horse') {
    const row: ProfileWithPassword = {
      id: crypto.randomUUID(),
      full_name: 'Test User',
      email,
      phone: null,
      role,
      location: null,
      email_verified_at: null,
      created_at: new Date('2026-01-01T00:00:00.000Z'),
      password: hashPassword(password)
    };
    this.rows.set(row.id, row);
    return row;
  }
}

export class MemoryAuditLog implements AuditLog {
  readonly events: Array<{ event: string; meta?: Record<string, unknown> }> = [];

  async record(event: string, meta?: Record<string, unknown>) {
    this.events.push({ event, meta });
  }
}

export type SentMail = { recipient: string; subject: string; html: string; text: string };

export class RecordingMailer implements Mailer {
  readonly sent: SentMail[] = [];
  failNext = 0;

  async deliver(recipient: string, subject: string, html: string, text: string) {
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new AppError('DeliveryFailed', 'Failed to send email');
    }
    this.sent.push({ recipient, subject, html, text });
  }

  lastCode() {
    const last = this.sent.at(-1);
    const match = last?.text.match(/\b(\d{6})\b/);
    return match?.[1];
  }
}

export class RecordingMessenger implements MessageSender {
  readonly sent: Array<{ recipient: string; body: string }> = [];

  async sendMessage(recipient: string, body: string) {
    this.sent.push({ recipient, body });
  }
}

export async function testApp(overrides: Partial<AppDeps> = {}) {
  const clock = new Clock();
  const profiles = new MemoryProfileRepository();
  const audit = new MemoryAuditLog();
  const mailer = new RecordingMailer();
  const messenger = new RecordingMessenger();
  const config = overrides.config ?? testConfig();

  const { app, services } = await buildApp({
    config,
    profiles,
    audit,
    mailer,
    messenger,
    now: clock.now,
    ...overrides
  });

  function tokenFor(profile: { id: string; email: string; role: Role }) {
    return signToken(profile, { secret: config.jwtSecret, ttlSeconds: config.jwtExpirationSeconds, now: clock.now });
  }

  return { app, services, clock, profiles, audit, mailer, messenger, config, tokenFor };
}
