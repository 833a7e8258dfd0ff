import type {
  CreateOrganizationInput,
  Organization,
  OrganizationRepository,
  UpdateOrganizationStatusInput
} from './organization-repository.js';
import { IntegrityConstraintError } from './repository-errors.js';
import { containsIgnoringCase } from './search-pattern.js';

function cloneOrganization(organization: Organization): Organization {
  return {
    ...organization,
    createdAt: new Date(organization.createdAt)
  };
}

function newestFirst(left: Organization, right: Organization): number {
  return right.id - left.id;
}

export class InMemoryOrganizationRepository implements OrganizationRepository {
  private readonly organizationsById = new Map<number, Organization>();

  private readonly organizationIdsBySlug = new Map<string, number>();

  private nextId = 1;

  public countOrganizations(): Promise<number> {
    return Promise.resolve(this.organizationsById.size);
  }

  public createOrganization(input: CreateOrganizationInput): Promise<Organization> {
    return this.createOrganizations([input]).then(([organization]) => {
      if (organization === undefined) {
        throw new Error('Failed to create organization.');
      }

      return organization;
    });
  }

  public createOrganizations(inputs: readonly CreateOrganizationInput[]): Promise<Organization[]> {
    const incomingSlugs = new Set<string>();
    for (const input of inputs) {
      if (this.organizationIdsBySlug.has(input.slug) || incomingSlugs.has(input.slug)) {
        return Promise.reject(new IntegrityConstraintError(`Organization slug "${input.slug}" already exists.`));
      }

      incomingSlugs.add(input.slug);
    }

    const organizations = inputs.map((input) => {
      const organization: Organization = {
        id: this.nextId,
        ...input,
        createdAt: new Date()
      };

      this.nextId += 1;
      this.organizationsById.set(organization.id, organization);
      this.organizationIdsBySlug.set(organization.slug, organization.id);

      return cloneOrganization(organization);
    });

    return Promise.resolve(organizations);
  }

  public findOrganizationById(organizationId: number): Promise<Organization | null> {
    const organization = this.getOrganization(organizationId);
    return Promise.resolve(organization === null ? null : cloneOrganization(organization));
  }

  public findOrganizationBySlug(slug: string): Promise<Organization | null> {
    const organizationId = this.organizationIdsBySlug.get(slug);
    if (organizationId === undefined) {
      return Promise.resolve(null);
    }

    return this.findOrganizationById(organizationId);
  }

  public listOrganizations(): Promise<Organization[]> {
    const organizations = Array.from(this.organizationsById.values())
      .sort(newestFirst)
      .map(cloneOrganization);

    return Promise.resolve(organizations);
  }

  public searchOrganizations(query: string): Promise<Organization[]> {
    const organizations = Array.from(this.organizationsById.values())
      .filter((organization) => containsIgnoringCase(organization.name, query) || containsIgnoringCase(organization.slug, query))
      .sort(newestFirst)
      .map(cloneOrganization);

    return Promise.resolve(organizations);
  }

  public updateOrganizationStatus(input: UpdateOrganizationStatusInput): Promise<Organization | null> {
    const organization = this.organizationsById.get(input.organizationId);
    if (organization === undefined) {
      return Promise.resolve(null);
    }

    organization.status = input.status;
    return Promise.resolve(cloneOrganization(organization));
  }

  /** Live row lookup for the in-memory user store, which joins against it. */
  public getOrganization(organizationId: number): Organization | null {
    return this.organizationsById.get(organizationId) ?? null;
  }
}
