/**
 * OpenTelemetry Setup
 *
 * Starts the OpenTelemetry Node SDK when OTEL_ENABLED=true and an OTLP
 * endpoint is configured. Traces go to `<endpoint>/v1/traces` and metrics to
 * `<endpoint>/v1/metrics`, both over OTLP/HTTP. Incoming HTTP requests are
 * traced by the Node auto-instrumentations.
 *
 * Telemetry never stops the service from starting: when it is disabled, has
 * no usable endpoint, or the SDK fails to start, `setupTelemetry()` logs why
 * and returns null.
 *
 * @example
 * ```bash
 * OTEL_ENABLED=true OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318 npm start
 * ```
 */

import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { metrics, NodeSDK } from '@opentelemetry/sdk-node';
import { z } from 'zod';
import type { AppConfig } from './config';
import type { Logger } from './logger';

export interface TelemetryHandle {
  /** Flushes pending spans and metrics, then stops the SDK */
  shutdown(): Promise<void>;
}

const endpointSchema = z.string().url();

function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export function setupTelemetry(
  config: AppConfig['telemetry'],
  logger: Logger
): TelemetryHandle | null {
  const log = logger.child({ module: 'telemetry' });

  if (!config.enabled) {
    log.info('OpenTelemetry is disabled');
    return null;
  }

  if (!config.endpoint) {
    log.warn('OTEL_ENABLED is set but OTEL_EXPORTER_OTLP_ENDPOINT is missing, telemetry not started');
    return null;
  }

  const parsedEndpoint = endpointSchema.safeParse(config.endpoint);
  if (!parsedEndpoint.success) {
    log.warn(
      { endpoint: config.endpoint },
      'OTEL_EXPORTER_OTLP_ENDPOINT is not a valid URL, telemetry not started'
    );
    return null;
  }

  const endpoint = trimTrailingSlash(parsedEndpoint.data);

  const sdk = new NodeSDK({
    serviceName: config.serviceName,
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    metricReader: new metrics.PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` }),
    }),
    instrumentations: [
      getNodeAutoInstrumentations({
        // Noisy, little value for an HTTP service
        '@opentelemetry/instrumentation-fs': { enabled: false },
        '@opentelemetry/instrumentation-dns': { enabled: false },
      }),
    ],
  });

  try {
    sdk.start();
  } catch (err) {
    log.warn({ err }, 'OpenTelemetry SDK failed to start, telemetry disabled');
    return null;
  }

  log.info({ endpoint, serviceName: config.serviceName }, 'OpenTelemetry started');

  return {
    async shutdown() {
      await sdk.shutdown();
      log.info('OpenTelemetry shut down');
    },
  };
}
