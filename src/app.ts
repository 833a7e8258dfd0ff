import express, { type Express } from 'express';
import helmet from 'helmet';
import { Pool } from 'pg';

import { getEnv, type Env } from './config/env.js';
import { ensureSchema } from './db/schema.js';
import { seedDirectory } from './db/seed.js';
import { AppError } from './errors/app-error.js';
import { errorHandler } from './errors/error-handler.js';
import { attachRequestTelemetry } from './http/middlewares/request-telemetry.js';
import { attachTraceId } from './http/middlewares/trace-id.js';
import { createOrganizationRoutes } from './http/routes/organization-routes.js';
import { createUserRoutes } from './http/routes/user-routes.js';
import { createViewRoutes } from './http/routes/view-routes.js';
import { InMemoryOrganizationRepository } from './repositories/in-memory-organization-repository.js';
import { InMemoryUserRepository } from './repositories/in-memory-user-repository.js';
import type { OrganizationRepository } from './repositories/organization-repository.js';
import { PostgresOrganizationRepository } from './repositories/postgres-organization-repository.js';
import { PostgresUserRepository } from './repositories/postgres-user-repository.js';
import type { UserRepository } from './repositories/user-repository.js';
import { OrganizationService } from './services/organization-service.js';
import { UserService } from './services/user-service.js';

export interface CreateAppOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  organizationRepository?: OrganizationRepository;
  userRepository?: UserRepository;
}

export interface AppRuntime {
  app: Express;
  env: Env;
  organizationRepository: OrganizationRepository;
  userRepository: UserRepository;
  close(): Promise<void>;
}

export async function createApp(options: CreateAppOptions = {}): Promise<AppRuntime> {
  const env = getEnv(options.envOverrides);
  const app = express();
  const usePostgres = typeof env.DATABASE_URL === 'string' && env.DATABASE_URL.length > 0;

  let pgPool: Pool | null = null;
  const getPool = (): Pool => {
    if (pgPool !== null) {
      return pgPool;
    }

    if (!usePostgres) {
      throw new Error('DATABASE_URL is not configured.');
    }

    pgPool = new Pool({ connectionString: env.DATABASE_URL });
    return pgPool;
  };

  const closePool = async (): Promise<void> => {
    if (pgPool !== null) {
      await pgPool.end();
      pgPool = null;
    }
  };

  const organizationRepository = options.organizationRepository ?? (() => {
    if (usePostgres) {
      return new PostgresOrganizationRepository(getPool());
    }

    return new InMemoryOrganizationRepository();
  })();
  const userRepository = options.userRepository ?? (() => {
    if (usePostgres) {
      return new PostgresUserRepository(getPool());
    }

    if (organizationRepository instanceof InMemoryOrganizationRepository) {
      return new InMemoryUserRepository(organizationRepository);
    }

    throw new Error('A userRepository must be supplied together with a custom organizationRepository.');
  })();

  try {
    if (usePostgres) {
      await ensureSchema(getPool());
    }

    if (env.SEED_SAMPLE_DATA) {
      const seeded = await seedDirectory(organizationRepository, userRepository);
      if (env.NODE_ENV !== 'test' && (seeded.organizationsCreated > 0 || seeded.usersCreated > 0)) {
        console.log('directory_seeded', seeded);
      }
    }
  } catch (error) {
    await closePool();
    throw error;
  }

  const organizationService = new OrganizationService(organizationRepository);
  const userService = new UserService(userRepository, organizationRepository);

  app.disable('x-powered-by');
  app.use(attachTraceId);
  app.use(helmet());
  app.use(express.json());
  if (env.NODE_ENV !== 'test') {
    app.use(attachRequestTelemetry);
  }

  app.use('/', createViewRoutes());
  app.use('/api/organizations', createOrganizationRoutes(organizationService));
  app.use('/api/users', createUserRoutes(userService));

  app.get('/health', (_request, response) => {
    response.status(200).json({
      status: 'ok'
    });
  });

  app.use((_request, _response, next) => {
    next(new AppError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use(errorHandler);

  return {
    app,
    env,
    organizationRepository,
    userRepository,
    close: closePool
  };
}
