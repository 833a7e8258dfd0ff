import { AppError } from '../errors/app-error.js';
import type {
  CreateOrganizationInput,
  Organization,
  OrganizationRepository
} from '../repositories/organization-repository.js';
import { IntegrityConstraintError } from '../repositories/repository-errors.js';
import { recordDirectoryRecordCreated } from '../telemetry/metrics.js';

const UNSAFE_SLUG_CHARACTERS = /[^A-Za-z0-9_.-]/g;

/**
 * Reduces a submitted slug to a lowercase, filesystem-safe token:
 * `"Test U!"` becomes `"test_u"`. Path separators and whitespace runs become
 * underscores, anything outside `[A-Za-z0-9_.-]` is dropped, and leading or
 * trailing dots and underscores are trimmed. May return an empty string.
 */
export function sanitizeSlug(value: string): string {
  const ascii = value
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replaceAll('/', ' ');

  return ascii
    .trim()
    .split(/\s+/)
    .join('_')
    .replace(UNSAFE_SLUG_CHARACTERS, '')
    .replace(/^[._]+|[._]+$/g, '')
    .toLowerCase();
}

export function organizationNotFound(): AppError {
  return new AppError(404, 'ORGANIZATION_NOT_FOUND', 'Organization not found.');
}

export class OrganizationService {
  public constructor(private readonly organizationRepository: OrganizationRepository) {}

  public listOrganizations(): Promise<Organization[]> {
    return this.organizationRepository.listOrganizations();
  }

  public async getOrganization(organizationId: number): Promise<Organization> {
    const organization = await this.organizationRepository.findOrganizationById(organizationId);
    if (organization === null) {
      throw organizationNotFound();
    }

    return organization;
  }

  public async createOrganization(input: CreateOrganizationInput): Promise<Organization> {
    const slug = sanitizeSlug(input.slug);
    if (slug.length === 0) {
      throw new AppError(400, 'VALIDATION_ERROR', 'slug is invalid');
    }

    try {
      const organization = await this.organizationRepository.createOrganization({
        ...input,
        slug
      });

      recordDirectoryRecordCreated('organization');
      return organization;
    } catch (error) {
      if (error instanceof IntegrityConstraintError) {
        throw new AppError(400, 'ORGANIZATION_CONFLICT', 'Slug already exists or invalid data.');
      }

      throw error;
    }
  }

  public async updateStatus(organizationId: number, status: string): Promise<Organization> {
    const updated = await this.organizationRepository.updateOrganizationStatus({
      organizationId,
      status
    });

    if (updated === null) {
      throw organizationNotFound();
    }

    return updated;
  }

  public searchOrganizations(query: string): Promise<Organization[]> {
    const normalizedQuery = query.trim();
    if (normalizedQuery.length === 0) {
      return this.organizationRepository.listOrganizations();
    }

    return this.organizationRepository.searchOrganizations(normalizedQuery);
  }
}
