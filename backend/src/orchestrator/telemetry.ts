import { trace, context, SpanStatusCode, type Attributes, type Span, type Tracer } from '@opentelemetry/api';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { config } from '../config/app.js';

const TRACER_NAME = 'conversation-orchestrator';

let tracerInitialized = false;

function ensureTracer() {
  if (tracerInitialized) return;

  const resource = new Resource({
    [SemanticResourceAttributes.SERVICE_NAME]: config.OTEL_SERVICE_NAME ?? config.PROJECT_NAME,
    [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV
  });

  const provider = new NodeTracerProvider({ resource });

  if (config.OTEL_EXPORTER_OTLP_ENDPOINT) {
    provider.addSpanProcessor(
      new SimpleSpanProcessor(new OTLPTraceExporter({ url: config.OTEL_EXPORTER_OTLP_ENDPOINT }))
    );
  }

  if (config.ENABLE_CONSOLE_TRACING) {
    provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  provider.register();
  tracerInitialized = true;
}

export function getTracer(): Tracer {
  ensureTracer();
  return trace.getTracer(TRACER_NAME);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs `fn` inside a new active span. The span is marked failed and rethrown
 * on error, and always ended.
 */
export async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>, attributes?: Attributes): Promise<T> {
  const span = getTracer().startSpan(name, attributes ? { attributes } : undefined);
  try {
    return await context.with(trace.setSpan(context.active(), span), () => fn(span));
  } catch (error) {
    const err = toError(error);
    span.recordException(err);
    span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    throw error;
  } finally {
    span.end();
  }
}

export function traced<T>(name: string, fn: () => Promise<T>, attributes?: Attributes): Promise<T> {
  return withSpan(name, () => fn(), attributes);
}
