export const DEFAULT_MAX_COORDINATORS = 5;
export const DEFAULT_PENDING_REQUESTS = 0;
export const DEFAULT_TIMEZONE = 'Asia/Kolkata';
export const DEFAULT_LANGUAGE = 'English';
export const DEFAULT_STATUS = 'Active';

export interface Organization {
  id: number;
  name: string;
  slug: string;
  supportEmail: string | null;
  phone: string | null;
  altPhone: string | null;
  website: string | null;
  maxCoordinators: number;
  timezone: string;
  language: string;
  status: string;
  pendingRequests: number;
  createdAt: Date;
}

export interface CreateOrganizationInput {
  name: string;
  slug: string;
  supportEmail: string | null;
  phone: string | null;
  altPhone: string | null;
  website: string | null;
  maxCoordinators: number;
  timezone: string;
  language: string;
  status: string;
  pendingRequests: number;
}

export interface UpdateOrganizationStatusInput {
  organizationId: number;
  status: string;
}

/**
 * Storage contract for organizations.
 *
 * `createOrganization` throws `IntegrityConstraintError` when the row would
 * break a table constraint (the unique slug in practice) and writes nothing.
 * `createOrganizations` inserts a batch all-or-nothing under the same rule.
 * Lists and searches are ordered by id, newest first.
 */
export interface OrganizationRepository {
  countOrganizations(): Promise<number>;
  createOrganization(input: CreateOrganizationInput): Promise<Organization>;
  createOrganizations(inputs: readonly CreateOrganizationInput[]): Promise<Organization[]>;
  findOrganizationById(organizationId: number): Promise<Organization | null>;
  findOrganizationBySlug(slug: string): Promise<Organization | null>;
  listOrganizations(): Promise<Organization[]>;
  searchOrganizations(query: string): Promise<Organization[]>;
  updateOrganizationStatus(input: UpdateOrganizationStatusInput): Promise<Organization | null>;
}
