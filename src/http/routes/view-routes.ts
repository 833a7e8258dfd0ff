import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Router } from 'express';

const viewsDirectory = fileURLToPath(new URL('../../../views/', import.meta.url));

const PAGES: Record<string, string> = {
  '/': 'index.html',
  '/organizations': 'organizations.html',
  '/users': 'users.html'
};

export function createViewRoutes(): Router {
  const router = Router();

  for (const [route, filename] of Object.entries(PAGES)) {
    router.get(route, (_request, response, next) => {
      response.sendFile(path.join(viewsDirectory, filename), (error) => {
        if (error !== undefined) {
          next(error);
        }
      });
    });
  }

  return router;
}
