import { Router } from 'express';
import { z } from 'zod';

import {
  DEFAULT_LANGUAGE,
  DEFAULT_MAX_COORDINATORS,
  DEFAULT_PENDING_REQUESTS,
  DEFAULT_STATUS,
  DEFAULT_TIMEZONE
} from '../../repositories/organization-repository.js';
import { organizationNotFound, type OrganizationService } from '../../services/organization-service.js';
import { presentOrganization } from '../presenters/directory-presenters.js';
import {
  integerWithDefault,
  optionalText,
  parseRecordIdParam,
  requiredText,
  searchQuerySchema,
  textWithDefault
} from '../validation.js';

const createOrganizationSchema = z.object({
  name: requiredText('name'),
  slug: requiredText('slug'),
  support_email: optionalText('support_email'),
  phone: optionalText('phone'),
  alt_phone: optionalText('alt_phone'),
  website: optionalText('website'),
  max_coordinators: integerWithDefault('max_coordinators', DEFAULT_MAX_COORDINATORS),
  timezone: textWithDefault('timezone', DEFAULT_TIMEZONE),
  language: textWithDefault('language', DEFAULT_LANGUAGE),
  status: textWithDefault('status', DEFAULT_STATUS),
  pending_requests: integerWithDefault('pending_requests', DEFAULT_PENDING_REQUESTS)
});

const updateStatusSchema = z.object({
  status: z.string({
    required_error: 'status is required',
    invalid_type_error: 'status must be a string'
  })
});

function requireOrganizationId(value: unknown): number {
  const organizationId = parseRecordIdParam(value);
  if (organizationId === null) {
    throw organizationNotFound();
  }

  return organizationId;
}

export function createOrganizationRoutes(organizationService: OrganizationService): Router {
  const router = Router();

  router.get('/', async (_request, response, next) => {
    try {
      const organizations = await organizationService.listOrganizations();
      response.status(200).json(organizations.map(presentOrganization));
    } catch (error) {
      next(error);
    }
  });

  // Registered before /:organizationId so "search" is never read as an id.
  router.get('/search', async (request, response, next) => {
    try {
      const { q } = searchQuerySchema.parse(request.query);
      const organizations = await organizationService.searchOrganizations(q);
      response.status(200).json(organizations.map(presentOrganization));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:organizationId', async (request, response, next) => {
    try {
      const organizationId = requireOrganizationId(request.params.organizationId);
      const organization = await organizationService.getOrganization(organizationId);
      response.status(200).json(presentOrganization(organization));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (request, response, next) => {
    try {
      const payload = createOrganizationSchema.parse(request.body);
      const organization = await organizationService.createOrganization({
        name: payload.name,
        slug: payload.slug,
        supportEmail: payload.support_email ?? null,
        phone: payload.phone ?? null,
        altPhone: payload.alt_phone ?? null,
        website: payload.website ?? null,
        maxCoordinators: payload.max_coordinators,
        timezone: payload.timezone,
        language: payload.language,
        status: payload.status,
        pendingRequests: payload.pending_requests
      });

      response.status(201).json(presentOrganization(organization));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:organizationId/status', async (request, response, next) => {
    try {
      const organizationId = requireOrganizationId(request.params.organizationId);
      const payload = updateStatusSchema.parse(request.body);
      const organization = await organizationService.updateStatus(organizationId, payload.status);
      response.status(200).json(presentOrganization(organization));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
