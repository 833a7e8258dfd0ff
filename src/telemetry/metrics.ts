import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('org-directory');

const httpRequestDuration = meter.createHistogram('http.server.request.duration', {
  description: 'Duration of inbound HTTP requests',
  unit: 'ms'
});

const httpRequestCount = meter.createCounter('http.server.request.count', {
  description: 'Count of inbound HTTP requests'
});

const httpErrorCount = meter.createCounter('http.server.request.errors', {
  description: 'Count of HTTP 5xx responses'
});

const dbQueryDuration = meter.createHistogram('db.client.operation.duration', {
  description: 'Duration of database operations, from client checkout to release',
  unit: 'ms'
});

const dbQueryErrorCount = meter.createCounter('db.client.operation.errors', {
  description: 'Count of failed database operations'
});

const directoryRecordsCreated = meter.createCounter('directory.records.created', {
  description: 'Count of organizations and users created'
});

export type DirectoryRecordKind = 'organization' | 'user';

export function recordHttpRequest(attributes: Record<string, string | number>, durationMs: number): void {
  httpRequestDuration.record(durationMs, attributes);
  httpRequestCount.add(1, attributes);
}

export function recordHttpError(attributes: Record<string, string | number>): void {
  httpErrorCount.add(1, attributes);
}

export function recordDbOperation(attributes: Record<string, string | number>, durationMs: number): void {
  dbQueryDuration.record(durationMs, attributes);
}

export function recordDbOperationError(attributes: Record<string, string | number>): void {
  dbQueryErrorCount.add(1, attributes);
}

export function recordDirectoryRecordCreated(kind: DirectoryRecordKind): void {
  directoryRecordsCreated.add(1, { kind });
}
