import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { AppRuntime } from '../../src/app.js';
import { createTestRuntime } from '../helpers/create-test-runtime.js';

interface OrganizationResponse {
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
  created_at: string;
}

interface ErrorResponse {
  code: string;
  message: string;
  traceId: string;
}

async function createOrganization(runtime: AppRuntime, body: Record<string, unknown>): Promise<OrganizationResponse> {
  const response = await request(runtime.app).post('/api/organizations').send(body);
  expect(response.status).toBe(201);
  return response.body as OrganizationResponse;
}

describe('organization integration', () => {
  let runtime: AppRuntime;

  beforeEach(async () => {
    runtime = await createTestRuntime();
  });

  afterEach(async () => {
    await runtime.close();
  });

  it('creates, reads and suspends an organization end to end', async () => {
    const created = await createOrganization(runtime, { name: 'Test U', slug: 'Test U!' });

    expect(created.slug).toBe('test_u');
    expect(created.name).toBe('Test U');
    expect(created.status).toBe('Active');

    const fetched = await request(runtime.app).get(`/api/organizations/${created.id}`);
    expect(fetched.status).toBe(200);
    expect(fetched.body).toEqual(created);

    const suspended = await request(runtime.app)
      .put(`/api/organizations/${created.id}/status`)
      .send({ status: 'Suspended' });

    expect(suspended.status).toBe(200);
    expect((suspended.body as OrganizationResponse).status).toBe('Suspended');

    const refetched = await request(runtime.app).get(`/api/organizations/${created.id}`);
    expect((refetched.body as OrganizationResponse).status).toBe('Suspended');
  });

  it('fills defaults for omitted and falsy optional fields', async () => {
    const created = await createOrganization(runtime, {
      name: 'Harbor College',
      slug: 'harbor',
      max_coordinators: 0,
      timezone: '',
      website: 'https://harbor.example.com'
    });

    expect(created).toMatchObject({
      name: 'Harbor College',
      slug: 'harbor',
      support_email: null,
      phone: null,
      alt_phone: null,
      website: 'https://harbor.example.com',
      max_coordinators: 5,
      timezone: 'Asia/Kolkata',
      language: 'English',
      status: 'Active',
      pending_requests: 0
    });
    expect(Number.isNaN(Date.parse(created.created_at))).toBe(false);
  });

  it('coerces numeric strings for integer fields', async () => {
    const created = await createOrganization(runtime, {
      name: 'Lakeside Institute',
      slug: 'lakeside',
      max_coordinators: '12',
      pending_requests: '3'
    });

    expect(created.max_coordinators).toBe(12);
    expect(created.pending_requests).toBe(3);
  });

  it('rejects a non-numeric integer field', async () => {
    const response = await request(runtime.app)
      .post('/api/organizations')
      .send({ name: 'Lakeside Institute', slug: 'lakeside', max_coordinators: 'many' });

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).code).toBe('VALIDATION_ERROR');
    expect((response.body as ErrorResponse).message).toBe('max_coordinators must be an integer');
    expect(await runtime.organizationRepository.countOrganizations()).toBe(0);
  });

  it('truncates fractional numbers and reads true as one', async () => {
    const created = await createOrganization(runtime, {
      name: 'Lakeside Institute',
      slug: 'lakeside',
      max_coordinators: 3.7,
      pending_requests: true
    });

    expect(created.max_coordinators).toBe(3);
    expect(created.pending_requests).toBe(1);
  });

  it('accepts signed decimal strings with surrounding whitespace', async () => {
    const created = await createOrganization(runtime, {
      name: 'Lakeside Institute',
      slug: 'lakeside',
      max_coordinators: ' 7 ',
      pending_requests: '-2'
    });

    expect(created.max_coordinators).toBe(7);
    expect(created.pending_requests).toBe(-2);
  });

  it.each(['0x10', '1e3', '0b11', '3.0'])('rejects the non-decimal integer string %s', async (value) => {
    const response = await request(runtime.app)
      .post('/api/organizations')
      .send({ name: 'Lakeside Institute', slug: 'lakeside', max_coordinators: value });

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).message).toBe('max_coordinators must be an integer');
    expect(await runtime.organizationRepository.countOrganizations()).toBe(0);
  });

  it('reports the first missing required field', async () => {
    const missingBoth = await request(runtime.app).post('/api/organizations').send({});
    expect(missingBoth.status).toBe(400);
    expect((missingBoth.body as ErrorResponse).message).toBe('name is required');

    const missingSlug = await request(runtime.app).post('/api/organizations').send({ name: 'No Slug', slug: '' });
    expect(missingSlug.status).toBe(400);
    expect((missingSlug.body as ErrorResponse).code).toBe('VALIDATION_ERROR');
    expect((missingSlug.body as ErrorResponse).message).toBe('slug is required');
  });

  it('rejects a slug with no safe characters', async () => {
    const response = await request(runtime.app).post('/api/organizations').send({ name: 'Symbols', slug: '!!!' });

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).message).toBe('slug is invalid');
  });

  it('rejects a second organization whose slug sanitizes to an existing one', async () => {
    await createOrganization(runtime, { name: 'First Campus', slug: 'North Campus' });

    const duplicate = await request(runtime.app)
      .post('/api/organizations')
      .send({ name: 'Second Campus', slug: 'north campus!' });

    expect(duplicate.status).toBe(400);
    expect(duplicate.body).toMatchObject({
      code: 'ORGANIZATION_CONFLICT',
      message: 'Slug already exists or invalid data.'
    });

    const matches = await request(runtime.app).get('/api/organizations/search').query({ q: 'north_campus' });
    const organizations = matches.body as OrganizationResponse[];
    expect(organizations).toHaveLength(1);
    expect(organizations[0]?.name).toBe('First Campus');
  });

  it('lists organizations newest first', async () => {
    const first = await createOrganization(runtime, { name: 'Alpha', slug: 'alpha' });
    const second = await createOrganization(runtime, { name: 'Beta', slug: 'beta' });

    const response = await request(runtime.app).get('/api/organizations');
    expect(response.status).toBe(200);
    expect((response.body as OrganizationResponse[]).map((organization) => organization.id)).toEqual([second.id, first.id]);
  });

  it('returns an empty list when there are no organizations', async () => {
    const response = await request(runtime.app).get('/api/organizations');

    expect(response.status).toBe(200);
    expect(response.body).toEqual([]);
  });

  it('returns 404 for unknown and malformed organization ids', async () => {
    const unknown = await request(runtime.app).get('/api/organizations/999');
    expect(unknown.status).toBe(404);
    expect((unknown.body as ErrorResponse).code).toBe('ORGANIZATION_NOT_FOUND');
    expect((unknown.body as ErrorResponse).message).toBe('Organization not found.');

    const malformed = await request(runtime.app).get('/api/organizations/abc');
    expect(malformed.status).toBe(404);
    expect((malformed.body as ErrorResponse).code).toBe('ORGANIZATION_NOT_FOUND');
  });

  it('requires a status when updating and leaves unknown ids untouched', async () => {
    const created = await createOrganization(runtime, { name: 'Gamma', slug: 'gamma' });

    const missingStatus = await request(runtime.app).put(`/api/organizations/${created.id}/status`).send({});
    expect(missingStatus.status).toBe(400);
    expect((missingStatus.body as ErrorResponse).message).toBe('status is required');

    const unknown = await request(runtime.app).put('/api/organizations/999/status').send({ status: 'Suspended' });
    expect(unknown.status).toBe(404);
    expect((unknown.body as ErrorResponse).code).toBe('ORGANIZATION_NOT_FOUND');

    const listed = await request(runtime.app).get('/api/organizations');
    expect((listed.body as OrganizationResponse[]).map((organization) => organization.status)).toEqual(['Active']);
  });

  it('accepts any status value without transition rules', async () => {
    const created = await createOrganization(runtime, { name: 'Delta', slug: 'delta', status: 'Pending' });
    expect(created.status).toBe('Pending');

    const archived = await request(runtime.app).put(`/api/organizations/${created.id}/status`).send({ status: 'Archived' });
    expect((archived.body as OrganizationResponse).status).toBe('Archived');

    const reactivated = await request(runtime.app).put(`/api/organizations/${created.id}/status`).send({ status: 'Active' });
    expect((reactivated.body as OrganizationResponse).status).toBe('Active');
  });

  it('searches names and slugs by substring', async () => {
    const riverside = await createOrganization(runtime, { name: 'Riverside University', slug: 'rvu' });
    const hill = await createOrganization(runtime, { name: 'Hill Academy', slug: 'hill-river' });
    await createOrganization(runtime, { name: 'Plains School', slug: 'plains' });

    const response = await request(runtime.app).get('/api/organizations/search').query({ q: 'river' });
    expect(response.status).toBe(200);
    expect((response.body as OrganizationResponse[]).map((organization) => organization.id)).toEqual([hill.id, riverside.id]);

    const trimmed = await request(runtime.app).get('/api/organizations/search').query({ q: '  Plains ' });
    expect((trimmed.body as OrganizationResponse[]).map((organization) => organization.slug)).toEqual(['plains']);
  });

  it('treats an empty search as a full listing and a miss as an empty array', async () => {
    await createOrganization(runtime, { name: 'Alpha', slug: 'alpha' });
    await createOrganization(runtime, { name: 'Beta', slug: 'beta' });

    const everything = await request(runtime.app).get('/api/organizations/search');
    expect((everything.body as OrganizationResponse[]).map((organization) => organization.slug)).toEqual(['beta', 'alpha']);

    const blank = await request(runtime.app).get('/api/organizations/search').query({ q: '   ' });
    expect(blank.body).toHaveLength(2);

    const miss = await request(runtime.app).get('/api/organizations/search').query({ q: 'zeta' });
    expect(miss.status).toBe(200);
    expect(miss.body).toEqual([]);
  });

  it('matches search wildcards literally', async () => {
    await createOrganization(runtime, { name: 'Percent Club', slug: 'percent' });

    const response = await request(runtime.app).get('/api/organizations/search').query({ q: '%' });
    expect(response.body).toEqual([]);
  });

  it('treats a nested query parameter as an empty search', async () => {
    await createOrganization(runtime, { name: 'Alpha', slug: 'alpha' });

    const response = await request(runtime.app).get('/api/organizations/search?q[x]=1');
    expect(response.status).toBe(200);
    expect((response.body as OrganizationResponse[]).map((organization) => organization.slug)).toEqual(['alpha']);
  });
});
