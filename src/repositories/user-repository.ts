export interface DirectoryUser {
  id: number;
  organizationId: number | null;
  name: string;
  email: string;
  role: string;
  phone: string | null;
  timezone: string | null;
  createdAt: Date;
}

export interface DirectoryUserRecord {
  user: DirectoryUser;
  organizationName: string | null;
  organizationSlug: string | null;
}

export interface CreateUserInput {
  organizationId: number;
  name: string;
  email: string;
  role: string;
  phone: string | null;
  timezone: string | null;
}

export interface UserRepository {
  countUsers(): Promise<number>;
  createUser(input: CreateUserInput): Promise<DirectoryUserRecord>;
  listUsers(): Promise<DirectoryUserRecord[]>;
  searchUsers(query: string): Promise<DirectoryUserRecord[]>;
}
