import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace, SpanStatusCode, Span, Tracer } from '@opentelemetry/api';
import { config } from '../config';
import { logger } from './logger';

let sdk: NodeSDK | null = null;

/**
 * Initialize OpenTelemetry SDK
 * Should be called before any other imports/code that needs tracing
 */
export const initTracing = (): void => {
  if (config.isTest) {
    logger.debug('Tracing disabled in test environment');
    return;
  }

  if (!config.otel.enabled) {
    logger.debug('Tracing disabled (set OTEL_ENABLED=true to enable)');
    return;
  }

  const otlpEndpoint = config.otel.exporterEndpoint;

  try {
    sdk = new NodeSDK({
      serviceName: config.otel.serviceName,
      traceExporter: new OTLPTraceExporter({
        url: otlpEndpoint,
      }),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-express': { enabled: true },
          '@opentelemetry/instrumentation-http': { enabled: true },
          // Disable file system instrumentation to reduce noise
          '@opentelemetry/instrumentation-fs': { enabled: false },
        }),
      ],
    });

    sdk.start();
    logger.info({ endpoint: otlpEndpoint }, 'OpenTelemetry tracing initialized');
  } catch (error) {
    logger.warn({ error }, 'Failed to initialize OpenTelemetry tracing');
  }
};

/**
 * Shutdown OpenTelemetry SDK gracefully
 */
export const shutdownTracing = async (): Promise<void> => {
  if (sdk) {
    try {
      await sdk.shutdown();
      logger.info('OpenTelemetry tracing shut down');
    } catch (error) {
      logger.error({ error }, 'Error shutting down OpenTelemetry');
    } finally {
      sdk = null;
    }
  }
};

/**
 * Get a tracer for a specific service/component
 */
export const getTracer = (name: string): Tracer => {
  return trace.getTracer(name);
};

/**
 * Run `fn` inside a span for one issuance step.
 * The span is marked ERROR when `fn` throws and always ended.
 */
export const createIssuanceSpan = async <T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  const tracer = getTracer('asset-issuance');

  return tracer.startActiveSpan(name, async (span) => {
    Object.entries(attributes).forEach(([key, value]) => {
      span.setAttribute(key, value);
    });

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
