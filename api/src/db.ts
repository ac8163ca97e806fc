import { Pool } from 'pg';

let pool: Pool | null = null;

export async function initDb(url: string | undefined) {
  if (!url) throw new Error('DATABASE_URL is required');

  pool = new Pool({ connectionString: url });
  await pool.query('select 1');

  await pool.query(`
    DO $$ BEGIN
      CREATE TYPE user_role AS ENUM ('farmer', 'buyer', 'admin');
    EXCEPTION WHEN duplicate_object THEN NULL;
    END $$;
  `);

  await pool.query(`
    create table if not exists profiles (
      id uuid primary key default gen_random_uuid(),
      full_name text not null,
      phone text unique,
      password text not null,
      email text not null unique,
      role user_role not null,
      location text,
      email_verified_at timestamptz,
      created_at timestamptz default now(),
      updated_at timestamptz default now()
    );
  `);

  await pool.query('alter table profiles add column if not exists email_verified_at timestamptz');

  await pool.query(`
    create table if not exists audit_events (
      id bigserial primary key,
      ts timestamptz not null default now(),
      event text not null,
      meta jsonb
    );
  `);

  return pool;
}

export async function closeDb() {
  if (!pool) return;
  await pool.end();
  pool = null;
}
