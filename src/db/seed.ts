import {
  DEFAULT_LANGUAGE,
  DEFAULT_MAX_COORDINATORS,
  type CreateOrganizationInput,
  type OrganizationRepository
} from '../repositories/organization-repository.js';
import type { CreateUserInput, UserRepository } from '../repositories/user-repository.js';

export interface SeedResult {
  organizationsCreated: number;
  usersCreated: number;
}

const SAMPLE_ORGANIZATIONS: readonly CreateOrganizationInput[] = [
  {
    name: 'Massachusetts Institute of Technology',
    slug: 'mit',
    supportEmail: 'support@mit.edu',
    phone: '+1-617-253-1000',
    altPhone: '+1-617-253-9999',
    website: 'https://mit.edu',
    maxCoordinators: DEFAULT_MAX_COORDINATORS,
    timezone: 'America/New_York',
    language: DEFAULT_LANGUAGE,
    status: 'Active',
    pendingRequests: 45
  },
  {
    name: 'GITAM Institute of Technology',
    slug: 'gitam',
    supportEmail: 'gitam@gitam.in',
    phone: '+91-9676456543',
    altPhone: '+91-93473294913',
    website: 'https://gitam.edu',
    maxCoordinators: DEFAULT_MAX_COORDINATORS,
    timezone: 'Asia/Kolkata',
    language: DEFAULT_LANGUAGE,
    status: 'Active',
    pendingRequests: 45
  }
];

type SampleUser = Omit<CreateUserInput, 'organizationId'> & {
  organizationSlug: string;
  fallbackOrganizationId: number;
};

const SAMPLE_USERS: readonly SampleUser[] = [
  {
    organizationSlug: 'gitam',
    fallbackOrganizationId: 1,
    name: 'Dave Richards',
    email: 'dave.richards@example.com',
    role: 'Admin',
    phone: '+91-9000000001',
    timezone: 'Asia/Kolkata'
  },
  {
    organizationSlug: 'gitam',
    fallbackOrganizationId: 1,
    name: 'Abhishek Hari',
    email: 'abhishek.hari@example.com',
    role: 'Co-ordinator',
    phone: '+91-9000000002',
    timezone: 'Asia/Kolkata'
  },
  {
    organizationSlug: 'mit',
    fallbackOrganizationId: 2,
    name: 'Nishta Gupta',
    email: 'nishta.gupta@example.com',
    role: 'Admin',
    phone: '+1-617-0000003',
    timezone: 'America/New_York'
  }
];

async function resolveOrganizationId(
  organizationRepository: OrganizationRepository,
  slug: string,
  fallbackId: number
): Promise<number> {
  const organization = await organizationRepository.findOrganizationBySlug(slug);
  return organization?.id ?? fallbackId;
}

/**
 * Inserts the sample organizations into an empty organization table and the
 * sample users into an empty user table. Tables that already hold rows are
 * left alone.
 */
export async function seedDirectory(
  organizationRepository: OrganizationRepository,
  userRepository: UserRepository
): Promise<SeedResult> {
  const result: SeedResult = {
    organizationsCreated: 0,
    usersCreated: 0
  };

  if (await organizationRepository.countOrganizations() === 0) {
    const organizations = await organizationRepository.createOrganizations(SAMPLE_ORGANIZATIONS);
    result.organizationsCreated = organizations.length;
  }

  if (await userRepository.countUsers() === 0) {
    const organizationIds = new Map<string, number>();

    for (const sample of SAMPLE_USERS) {
      const { organizationSlug, fallbackOrganizationId, ...user } = sample;

      let organizationId = organizationIds.get(organizationSlug);
      if (organizationId === undefined) {
        organizationId = await resolveOrganizationId(organizationRepository, organizationSlug, fallbackOrganizationId);
        organizationIds.set(organizationSlug, organizationId);
      }

      await userRepository.createUser({
        ...user,
        organizationId
      });
      result.usersCreated += 1;
    }
  }

  return result;
}
