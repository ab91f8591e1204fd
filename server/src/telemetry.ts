/**
 * OpenTelemetry Tracing
 *
 * Each game session runs inside a `war.session` span. Spans are no-ops unless
 * an exporter is configured.
 *
 * Configuration:
 *   OTEL_EXPORTER_OTLP_ENDPOINT - OTLP endpoint (e.g., http://tempo:4318/v1/traces)
 *   OTEL_SERVICE_NAME - Service name (defaults to war-server)
 */
import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { trace, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';
import { logInfo, logWarn } from './logger.js';

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME || 'war-server';
const SERVICE_VERSION = process.env.npm_package_version || '0.1.0';

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

/**
 * Start the OTLP exporter when an endpoint is configured.
 * Returns a shutdown function (a no-op when tracing is off).
 */
export function startTelemetry(endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT?.trim()): () => Promise<void> {
  if (!endpoint) {
    return async () => {};
  }

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
  });

  sdk.start();
  logInfo(`[telemetry] OpenTelemetry tracing enabled → ${endpoint}`);

  return async () => {
    try {
      await sdk.shutdown();
    } catch (err) {
      logWarn('[telemetry] failed to shut down OTLP exporter', err);
    }
  };
}

export const tracer: Tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);

/**
 * Add attributes to an existing span
 */
export function addSpanAttributes(span: Span, attributes: SpanAttributes): void {
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      span.setAttribute(key, value);
    }
  }
}

/**
 * Execute a function within a new span
 *
 * @example
 * const outcome = await withSpan('war.session', async (span) => {
 *   span.setAttribute('war.session_id', id);
 *   return await session.play();
 * });
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: SpanAttributes,
): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        addSpanAttributes(span, attributes);
      }
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
