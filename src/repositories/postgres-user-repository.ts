import type { Pool } from 'pg';

import { getSingleRow, isIntegrityViolation, withClient, withTransaction } from '../db/pg-store.js';
import { IntegrityConstraintError } from './repository-errors.js';
import { toLikePattern } from './search-pattern.js';
import type { CreateUserInput, DirectoryUserRecord, UserRepository } from './user-repository.js';

interface UserRow {
  id: number;
  org_id: number | null;
  name: string;
  email: string;
  role: string;
  phone: string | null;
  timezone: string | null;
  created_at: Date;
}

interface UserWithOrganizationRow extends UserRow {
  organization_name: string | null;
  organization_slug: string | null;
}

interface CountRow {
  count: string;
}

const USER_WITH_ORGANIZATION_SELECT = `
  SELECT
    u.*,
    o.name AS organization_name,
    o.slug AS organization_slug
  FROM users u
  LEFT JOIN organizations o ON o.id = u.org_id
`;

function mapUserRecord(row: UserWithOrganizationRow): DirectoryUserRecord {
  return {
    user: {
      id: row.id,
      organizationId: row.org_id,
      name: row.name,
      email: row.email,
      role: row.role,
      phone: row.phone,
      timezone: row.timezone,
      createdAt: row.created_at
    },
    organizationName: row.organization_name,
    organizationSlug: row.organization_slug
  };
}

export class PostgresUserRepository implements UserRepository {
  public constructor(private readonly pool: Pool) {}

  public async countUsers(): Promise<number> {
    return withClient(this.pool, 'users.count', async (client) => {
      const result = await client.query<CountRow>('SELECT COUNT(*) AS count FROM users');
      return Number(getSingleRow(result.rows)?.count ?? 0);
    });
  }

  public async createUser(input: CreateUserInput): Promise<DirectoryUserRecord> {
    try {
      return await withTransaction(this.pool, 'users.create', async (client) => {
        const inserted = await client.query<UserRow>(
          `
          INSERT INTO users (org_id, name, email, role, phone, timezone)
          VALUES ($1, $2, $3, $4, $5, $6)
          RETURNING *
          `,
          [input.organizationId, input.name, input.email, input.role, input.phone, input.timezone]
        );

        const insertedRow = getSingleRow(inserted.rows);
        if (insertedRow === null) {
          throw new Error('Failed to create user.');
        }

        const result = await client.query<UserWithOrganizationRow>(
          `${USER_WITH_ORGANIZATION_SELECT} WHERE u.id = $1`,
          [insertedRow.id]
        );

        const row = getSingleRow(result.rows);
        if (row === null) {
          throw new Error('Failed to load created user.');
        }

        return mapUserRecord(row);
      });
    } catch (error) {
      if (isIntegrityViolation(error)) {
        throw new IntegrityConstraintError('User violates a table constraint.', { cause: error });
      }

      throw error;
    }
  }

  public async listUsers(): Promise<DirectoryUserRecord[]> {
    return withClient(this.pool, 'users.list', async (client) => {
      const result = await client.query<UserWithOrganizationRow>(`${USER_WITH_ORGANIZATION_SELECT} ORDER BY u.id DESC`);
      return result.rows.map(mapUserRecord);
    });
  }

  public async searchUsers(query: string): Promise<DirectoryUserRecord[]> {
    return withClient(this.pool, 'users.search', async (client) => {
      const result = await client.query<UserWithOrganizationRow>(
        `
        ${USER_WITH_ORGANIZATION_SELECT}
        WHERE u.name ILIKE $1 OR u.email ILIKE $1 OR o.name ILIKE $1
        ORDER BY u.id DESC
        `,
        [toLikePattern(query)]
      );

      return result.rows.map(mapUserRecord);
    });
  }
}
