import type { Pool, PoolClient } from 'pg';

import { getSingleRow, isIntegrityViolation, withClient, withTransaction } from '../db/pg-store.js';
import type {
  CreateOrganizationInput,
  Organization,
  OrganizationRepository,
  UpdateOrganizationStatusInput
} from './organization-repository.js';
import { IntegrityConstraintError } from './repository-errors.js';
import { toLikePattern } from './search-pattern.js';

interface OrganizationRow {
  id: number;
  name: string;
  slug: string;
  support_email: string | null;
  phone: string | null;
  alt_phone: string | null;
  website: string | null;
  max_coordinators: number;
  timezone: string;
  language: string;
  status: string;
  pending_requests: number;
  created_at: Date;
}

interface CountRow {
  count: string;
}

function mapOrganization(row: OrganizationRow): Organization {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    supportEmail: row.support_email,
    phone: row.phone,
    altPhone: row.alt_phone,
    website: row.website,
    maxCoordinators: row.max_coordinators,
    timezone: row.timezone,
    language: row.language,
    status: row.status,
    pendingRequests: row.pending_requests,
    createdAt: row.created_at
  };
}

async function insertOrganization(client: PoolClient, input: CreateOrganizationInput): Promise<Organization> {
  const result = await client.query<OrganizationRow>(
    `
    INSERT INTO organizations (
      name,
      slug,
      support_email,
      phone,
      alt_phone,
      website,
      max_coordinators,
      timezone,
      language,
      status,
      pending_requests
    )
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
    RETURNING *
    `,
    [
      input.name,
      input.slug,
      input.supportEmail,
      input.phone,
      input.altPhone,
      input.website,
      input.maxCoordinators,
      input.timezone,
      input.language,
      input.status,
      input.pendingRequests
    ]
  );

  const row = getSingleRow(result.rows);
  if (row === null) {
    throw new Error('Failed to create organization.');
  }

  return mapOrganization(row);
}

export class PostgresOrganizationRepository implements OrganizationRepository {
  public constructor(private readonly pool: Pool) {}

  public async countOrganizations(): Promise<number> {
    return withClient(this.pool, 'organizations.count', async (client) => {
      const result = await client.query<CountRow>('SELECT COUNT(*) AS count FROM organizations');
      return Number(getSingleRow(result.rows)?.count ?? 0);
    });
  }

  public async createOrganization(input: CreateOrganizationInput): Promise<Organization> {
    const [organization] = await this.insertOrganizations('organizations.create', [input]);
    if (organization === undefined) {
      throw new Error('Failed to create organization.');
    }

    return organization;
  }

  public async createOrganizations(inputs: readonly CreateOrganizationInput[]): Promise<Organization[]> {
    return this.insertOrganizations('organizations.create_batch', inputs);
  }

  public async findOrganizationById(organizationId: number): Promise<Organization | null> {
    return withClient(this.pool, 'organizations.find_by_id', async (client) => {
      const result = await client.query<OrganizationRow>(
        `
        SELECT *
        FROM organizations
        WHERE id = $1
        LIMIT 1
        `,
        [organizationId]
      );

      const row = getSingleRow(result.rows);
      return row === null ? null : mapOrganization(row);
    });
  }

  public async findOrganizationBySlug(slug: string): Promise<Organization | null> {
    return withClient(this.pool, 'organizations.find_by_slug', async (client) => {
      const result = await client.query<OrganizationRow>(
        `
        SELECT *
        FROM organizations
        WHERE slug = $1
        LIMIT 1
        `,
        [slug]
      );

      const row = getSingleRow(result.rows);
      return row === null ? null : mapOrganization(row);
    });
  }

  public async listOrganizations(): Promise<Organization[]> {
    return withClient(this.pool, 'organizations.list', async (client) => {
      const result = await client.query<OrganizationRow>('SELECT * FROM organizations ORDER BY id DESC');
      return result.rows.map(mapOrganization);
    });
  }

  public async searchOrganizations(query: string): Promise<Organization[]> {
    return withClient(this.pool, 'organizations.search', async (client) => {
      const result = await client.query<OrganizationRow>(
        `
        SELECT *
        FROM organizations
        WHERE name ILIKE $1 OR slug ILIKE $1
        ORDER BY id DESC
        `,
        [toLikePattern(query)]
      );

      return result.rows.map(mapOrganization);
    });
  }

  public async updateOrganizationStatus(input: UpdateOrganizationStatusInput): Promise<Organization | null> {
    return withTransaction(this.pool, 'organizations.update_status', async (client) => {
      const result = await client.query<OrganizationRow>(
        `
        UPDATE organizations
        SET status = $2
        WHERE id = $1
        RETURNING *
        `,
        [input.organizationId, input.status]
      );

      const row = getSingleRow(result.rows);
      return row === null ? null : mapOrganization(row);
    });
  }

  private async insertOrganizations(operation: string, inputs: readonly CreateOrganizationInput[]): Promise<Organization[]> {
    try {
      return await withTransaction(this.pool, operation, async (client) => {
        const organizations: Organization[] = [];

        for (const input of inputs) {
          organizations.push(await insertOrganization(client, input));
        }

        return organizations;
      });
    } catch (error) {
      if (isIntegrityViolation(error)) {
        throw new IntegrityConstraintError('Organization violates a table constraint.', { cause: error });
      }

      throw error;
    }
  }
}
