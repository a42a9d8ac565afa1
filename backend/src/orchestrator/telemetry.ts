import { trace, context, SpanStatusCode, type Attributes } from '@opentelemetry/api';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { config } from '../config/app.js';
import { describeError } from '../utils/errors.js';

const TRACER_NAME = 'farm-advisor-agent';

let tracerInitialized = false;

function ensureTracer() {
  if (tracerInitialized) return;

  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  const resource = new Resource({
    [SemanticResourceAttributes.SERVICE_NAME]: process.env.OTEL_SERVICE_NAME || config.PROJECT_NAME,
    [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV
  });

  const provider = new NodeTracerProvider({ resource });

  if (endpoint) {
    provider.addSpanProcessor(new SimpleSpanProcessor(new OTLPTraceExporter({ url: endpoint })));
  }
  if (process.env.ENABLE_CONSOLE_TRACING?.toLowerCase() === 'true') {
    provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  provider.register();
  tracerInitialized = true;
}

export function getTracer() {
  ensureTracer();
  return trace.getTracer(TRACER_NAME);
}

export async function traced<T>(name: string, fn: () => Promise<T>, attributes?: Attributes): Promise<T> {
  const span = getTracer().startSpan(name, attributes ? { attributes } : undefined);
  try {
    return await context.with(trace.setSpan(context.active(), span), fn);
  } catch (error) {
    span.recordException(error instanceof Error ? error : describeError(error));
    span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
    throw error;
  } finally {
    span.end();
  }
}
