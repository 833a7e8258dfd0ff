import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { ConsoleMetricExporter, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';

import type { Env } from '../config/env.js';

let sdk: NodeSDK | null = null;

export function isTelemetryEnabled(env: Pick<Env, 'NODE_ENV' | 'OTEL_ENABLED'>): boolean {
  return env.OTEL_ENABLED && env.NODE_ENV !== 'test';
}

// HTTP, Express and pg spans; socket, DNS and file spans stay off.
function directoryInstrumentations() {
  return getNodeAutoInstrumentations({
    '@opentelemetry/instrumentation-fs': { enabled: false },
    '@opentelemetry/instrumentation-dns': { enabled: false },
    '@opentelemetry/instrumentation-net': { enabled: false }
  });
}

export async function startTelemetry(env: Env): Promise<void> {
  if (!isTelemetryEnabled(env) || sdk !== null) {
    return;
  }

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

  const directorySdk = new NodeSDK({
    serviceName: env.OTEL_SERVICE_NAME,
    traceExporter: new ConsoleSpanExporter(),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new ConsoleMetricExporter(),
      exportIntervalMillis: env.OTEL_METRIC_EXPORT_INTERVAL_MS
    }),
    instrumentations: [directoryInstrumentations()]
  });

  directorySdk.start();
  sdk = directorySdk;
  console.log('telemetry_started', {
    serviceName: env.OTEL_SERVICE_NAME,
    metricExportIntervalMs: env.OTEL_METRIC_EXPORT_INTERVAL_MS
  });
}

export async function stopTelemetry(): Promise<void> {
  const running = sdk;
  if (running === null) {
    return;
  }

  sdk = null;
  await running.shutdown();
  console.log('telemetry_stopped');
}
