import { randomUUID } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

export const TRACE_ID_HEADER = 'x-trace-id';

const incomingTraceIdSchema = z.string().uuid();

/** Reuses a caller-supplied UUID trace id, otherwise mints one, and echoes it back. */
export function attachTraceId(request: Request, response: Response, next: NextFunction): void {
  const incoming = incomingTraceIdSchema.safeParse(request.get(TRACE_ID_HEADER));
  const traceId = incoming.success ? incoming.data : randomUUID();

  response.locals.traceId = traceId;
  response.setHeader(TRACE_ID_HEADER, traceId);
  next();
}
