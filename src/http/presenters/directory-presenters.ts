import type { Organization } from '../../repositories/organization-repository.js';
import type { DirectoryUserRecord } from '../../repositories/user-repository.js';

export interface OrganizationResponse {
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

export interface UserResponse {
  id: number;
  org_id: number | null;
  name: string;
  email: string;
  role: string;
  phone: string | null;
  timezone: string | null;
  created_at: string;
  organization_name: string | null;
  organization_slug: string | null;
}

// Keys follow the table's column order.
export function presentOrganization(organization: Organization): OrganizationResponse {
  return {
    id: organization.id,
    name: organization.name,
    slug: organization.slug,
    support_email: organization.supportEmail,
    phone: organization.phone,
    alt_phone: organization.altPhone,
    website: organization.website,
    max_coordinators: organization.maxCoordinators,
    timezone: organization.timezone,
    language: organization.language,
    status: organization.status,
    pending_requests: organization.pendingRequests,
    created_at: organization.createdAt.toISOString()
  };
}

export function presentUser(record: DirectoryUserRecord): UserResponse {
  const { user } = record;

  return {
    id: user.id,
    org_id: user.organizationId,
    name: user.name,
    email: user.email,
    role: user.role,
    phone: user.phone,
    timezone: user.timezone,
    created_at: user.createdAt.toISOString(),
    organization_name: record.organizationName,
    organization_slug: record.organizationSlug
  };
}
