import type { Pool } from 'pg';
import { AppError } from './errors.js';
import type { Role } from './store.js';

export type Profile = {
  id: string;
  full_name: string;
  email: string;
  phone: string | null;
  role: Role;
  location: string | null;
  email_verified_at: Date | null;
  created_at: Date;
};

export type ProfileWithPassword = Profile & { password: string };

export type NewProfile = {
  fullName: string;
  email: string;
  passwordHash: string;
  role: Role;
  phone?: string | null;
  location?: string | null;
};

export interface ProfileRepository {
  findByEmail(email: string): Promise<ProfileWithPassword | null>;
  findById(id: string): Promise<Profile | null>;
  create(profile: NewProfile): Promise<Profile>;
  setPassword(id: string, passwordHash: string): Promise<void>;
  markEmailVerified(id: string, at: Date): Promise<void>;
}

export interface AuditLog {
  record(event: string, meta?: Record<string, unknown>): Promise<void>;
}

function isUniqueViolation(err: unknown) {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

const PUBLIC_COLUMNS = 'id, full_name, email, phone, role, location, email_verified_at, created_at';

export function publicProfile(profile: ProfileWithPassword | Profile): Profile {
  return {
    id: profile.id,
    full_name: profile.full_name,
    email: profile.email,
    phone: profile.phone,
    role: profile.role,
    location: profile.location,
    email_verified_at: profile.email_verified_at,
    created_at: profile.created_at
  };
}

export class PgProfileRepository implements ProfileRepository {
  constructor(private readonly pool: Pool) {}

  async findByEmail(email: string) {
    const r = await this.pool.query<ProfileWithPassword>(
      `select ${PUBLIC_COLUMNS}, password from profiles where email=$1`,
      [email]
    );
    return r.rows[0] ?? null;
  }

  async findById(id: string) {
    const r = await this.pool.query<Profile>(`select ${PUBLIC_COLUMNS} from profiles where id=$1`, [id]);
    return r.rows[0] ?? null;
  }

  async create(p: NewProfile) {
    let rows: Profile[];
    try {
      const r = await this.pool.query<Profile>(
        `insert into profiles(full_name, email, password, role, phone, location)
         values ($1,$2,$3,$4,$5,$6) returning ${PUBLIC_COLUMNS}`,
        [p.fullName, p.email, p.passwordHash, p.role, p.phone ?? null, p.location ?? null]
      );
      rows = r.rows;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new AppError('Conflict', 'A profile with this email or phone already exists', { cause: err });
      }
      throw err;
    }
    const created = rows[0];
    if (!created) throw new Error('Profile insert returned no row');
    return created;
  }

  async setPassword(id: string, passwordHash: string) {
    await this.pool.query('update profiles set password=$2, updated_at=now() where id=$1', [id, passwordHash]);
  }

  // Keeps the first verification time.
  async markEmailVerified(id: string, at: Date) {
    await this.pool.query(
      'update profiles set email_verified_at=coalesce(email_verified_at, $2), updated_at=now() where id=$1',
      [id, at]
    );
  }
}

export class PgAuditLog implements AuditLog {
  constructor(private readonly pool: Pool) {}

  async record(event: string, meta?: Record<string, unknown>) {
    await this.pool.query('insert into audit_events(event, meta) values ($1, $2)', [event, meta ?? null]);
  }
}
