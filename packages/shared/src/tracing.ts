/**
 * Tracing utilities: a thin wrapper around the OpenTelemetry API.
 *
 * No SDK is registered here; without one the tracer is a no-op and these
 * helpers simply run the wrapped function.
 */
import { trace, context, isSpanContextValid, SpanStatusCode, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'rxdesk';

export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/** Trace id of a span, or undefined while no SDK is recording (used for the X-Trace-Id header) */
export function traceIdOf(span: Span): string | undefined {
  const ctx = span.spanContext();
  return isSpanContextValid(ctx) ? ctx.traceId : undefined;
}

/**
 * Wrap an async function in an OTel span.
 * Records errors and sets span status.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  return context.with(context.active(), () => {
    return tracer.startActiveSpan(name, { attributes }, async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        span.recordException(error instanceof Error ? error : new Error(String(error)));
        throw error;
      } finally {
        span.end();
      }
    });
  });
}
