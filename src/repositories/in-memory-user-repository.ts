import type { InMemoryOrganizationRepository } from './in-memory-organization-repository.js';
import { IntegrityConstraintError } from './repository-errors.js';
import { containsIgnoringCase } from './search-pattern.js';
import type { CreateUserInput, DirectoryUser, DirectoryUserRecord, UserRepository } from './user-repository.js';

function cloneUser(user: DirectoryUser): DirectoryUser {
  return {
    ...user,
    createdAt: new Date(user.createdAt)
  };
}

export class InMemoryUserRepository implements UserRepository {
  private readonly usersById = new Map<number, DirectoryUser>();

  private nextId = 1;

  public constructor(private readonly organizations: InMemoryOrganizationRepository) {}

  public countUsers(): Promise<number> {
    return Promise.resolve(this.usersById.size);
  }

  public createUser(input: CreateUserInput): Promise<DirectoryUserRecord> {
    // Mirrors the foreign key on users.org_id.
    if (this.organizations.getOrganization(input.organizationId) === null) {
      return Promise.reject(new IntegrityConstraintError(`Organization ${input.organizationId} does not exist.`));
    }

    const user: DirectoryUser = {
      id: this.nextId,
      ...input,
      createdAt: new Date()
    };

    this.nextId += 1;
    this.usersById.set(user.id, user);

    return Promise.resolve(this.toRecord(user));
  }

  public listUsers(): Promise<DirectoryUserRecord[]> {
    return Promise.resolve(this.collect(() => true));
  }

  public searchUsers(query: string): Promise<DirectoryUserRecord[]> {
    return Promise.resolve(this.collect((record) =>
      containsIgnoringCase(record.user.name, query)
      || containsIgnoringCase(record.user.email, query)
      || containsIgnoringCase(record.organizationName, query)
    ));
  }

  private collect(predicate: (record: DirectoryUserRecord) => boolean): DirectoryUserRecord[] {
    return Array.from(this.usersById.values())
      .sort((left, right) => right.id - left.id)
      .map((user) => this.toRecord(user))
      .filter(predicate);
  }

  private toRecord(user: DirectoryUser): DirectoryUserRecord {
    const organization = user.organizationId === null ? null : this.organizations.getOrganization(user.organizationId);

    return {
      user: cloneUser(user),
      organizationName: organization?.name ?? null,
      organizationSlug: organization?.slug ?? null
    };
  }
}
