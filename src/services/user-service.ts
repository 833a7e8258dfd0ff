import { AppError } from '../errors/app-error.js';
import type { OrganizationRepository } from '../repositories/organization-repository.js';
import { IntegrityConstraintError } from '../repositories/repository-errors.js';
import type { CreateUserInput, DirectoryUserRecord, UserRepository } from '../repositories/user-repository.js';
import { recordDirectoryRecordCreated } from '../telemetry/metrics.js';

function organizationInvalid(): AppError {
  return new AppError(400, 'ORGANIZATION_INVALID', 'Organization does not exist.');
}

export class UserService {
  public constructor(
    private readonly userRepository: UserRepository,
    private readonly organizationRepository: OrganizationRepository
  ) {}

  public listUsers(): Promise<DirectoryUserRecord[]> {
    return this.userRepository.listUsers();
  }

  public async createUser(input: CreateUserInput): Promise<DirectoryUserRecord> {
    const organization = await this.organizationRepository.findOrganizationById(input.organizationId);
    if (organization === null) {
      throw organizationInvalid();
    }

    try {
      const record = await this.userRepository.createUser(input);
      recordDirectoryRecordCreated('user');
      return record;
    } catch (error) {
      // The organization can disappear between the lookup and the insert.
      if (error instanceof IntegrityConstraintError) {
        throw organizationInvalid();
      }

      throw error;
    }
  }

  public searchUsers(query: string): Promise<DirectoryUserRecord[]> {
    const normalizedQuery = query.trim();
    if (normalizedQuery.length === 0) {
      return this.userRepository.listUsers();
    }

    return this.userRepository.searchUsers(normalizedQuery);
  }
}
