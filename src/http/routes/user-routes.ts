import { Router } from 'express';
import { z } from 'zod';

import type { UserService } from '../../services/user-service.js';
import { presentUser } from '../presenters/directory-presenters.js';
import { optionalText, requiredRecordId, requiredText, searchQuerySchema } from '../validation.js';

const createUserSchema = z.object({
  name: requiredText('name'),
  email: requiredText('email'),
  role: requiredText('role'),
  org_id: requiredRecordId('org_id'),
  phone: optionalText('phone'),
  timezone: optionalText('timezone')
});

export function createUserRoutes(userService: UserService): Router {
  const router = Router();

  router.get('/', async (_request, response, next) => {
    try {
      const records = await userService.listUsers();
      response.status(200).json(records.map(presentUser));
    } catch (error) {
      next(error);
    }
  });

  router.get('/search', async (request, response, next) => {
    try {
      const { q } = searchQuerySchema.parse(request.query);
      const records = await userService.searchUsers(q);
      response.status(200).json(records.map(presentUser));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (request, response, next) => {
    try {
      const payload = createUserSchema.parse(request.body);
      const record = await userService.createUser({
        organizationId: payload.org_id,
        name: payload.name,
        email: payload.email,
        role: payload.role,
        phone: payload.phone ?? null,
        timezone: payload.timezone ?? null
      });

      response.status(201).json(presentUser(record));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
