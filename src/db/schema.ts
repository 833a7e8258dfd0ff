import type { Pool } from 'pg';

import { withClient } from './pg-store.js';

const CREATE_ORGANIZATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS organizations (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    slug TEXT NOT NULL UNIQUE,
    support_email TEXT,
    phone TEXT,
    alt_phone TEXT,
    website TEXT,
    max_coordinators INTEGER NOT NULL DEFAULT 5,
    timezone TEXT NOT NULL DEFAULT 'Asia/Kolkata',
    language TEXT NOT NULL DEFAULT 'English',
    status TEXT NOT NULL DEFAULT 'Active',
    pending_requests INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

// org_id stays nullable; the create path is what requires it.
const CREATE_USERS_TABLE = `
  CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    org_id INTEGER REFERENCES organizations (id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    role TEXT NOT NULL,
    phone TEXT,
    timezone TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

export async function ensureSchema(pool: Pool): Promise<void> {
  await withClient(pool, 'schema.ensure', async (client) => {
    await client.query(CREATE_ORGANIZATIONS_TABLE);
    await client.query(CREATE_USERS_TABLE);
  });
}
