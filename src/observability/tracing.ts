import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace, SpanStatusCode, Span, Tracer } from '@opentelemetry/api';
import { config } from '../config';
import { logger } from './logger';

let sdk: NodeSDK | null = null;

/**
 * Initialize OpenTelemetry SDK
 * Should be called before the app modules that need instrumentation are loaded
 */
export const initTracing = (): void => {
  if (!config.otel.enabled) {
    logger.debug('Tracing disabled');
    return;
  }

  const endpoint = config.otel.exporterEndpoint;

  try {
    sdk = new NodeSDK({
      serviceName: config.otel.serviceName,
      traceExporter: new OTLPTraceExporter({ url: endpoint }),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-express': { enabled: true },
          '@opentelemetry/instrumentation-mongodb': { enabled: true },
          '@opentelemetry/instrumentation-ioredis': { enabled: true },
          '@opentelemetry/instrumentation-http': { enabled: true },
          '@opentelemetry/instrumentation-fs': { enabled: false },
        }),
      ],
    });

    sdk.start();
    logger.info({ endpoint }, 'OpenTelemetry tracing initialized');
  } catch (error) {
    logger.warn({ err: error }, 'Failed to initialize OpenTelemetry tracing');
  }
};

export const shutdownTracing = async (): Promise<void> => {
  if (sdk) {
    try {
      await sdk.shutdown();
      logger.info('OpenTelemetry tracing shut down');
    } catch (error) {
      logger.error({ err: error }, 'Error shutting down OpenTelemetry');
    } finally {
      sdk = null;
    }
  }
};

export const getTracer = (name: string): Tracer => {
  return trace.getTracer(name);
};

/**
 * Run `fn` inside an active span, recording the outcome on it
 */
export const withSpan = async <T>(
  tracerName: string,
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  return getTracer(tracerName).startActiveSpan(name, async (span) => {
    span.setAttributes(attributes);

    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
};

/**
 * Span around one escrow ledger operation, e.g. `escrow.claim`
 */
export const traceEscrowOperation = async <T>(
  operation: string,
  attributes: Record<string, string | number | boolean>,
  fn: () => Promise<T>
): Promise<T> => {
  return withSpan(
    'timelock-escrow-ledger',
    `escrow.${operation}`,
    { 'escrow.operation': operation, ...attributes },
    async () => fn()
  );
};
