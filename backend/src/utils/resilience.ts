import { SpanStatusCode } from '@opentelemetry/api';
import { getTracer } from '../orchestrator/telemetry.js';
import { describeError } from './errors.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  retryableErrors?: string[];
}

export class TimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

function readField(error: unknown, field: 'code' | 'status' | 'name'): string {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return '';
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

function isRetryable(error: unknown, retryableErrors: string[]): boolean {
  const message = describeError(error);
  const code = readField(error, 'code');
  const status = readField(error, 'status');
  const name = readField(error, 'name');
  return retryableErrors.some(
    (token) => message.includes(token) || code.includes(token) || status.includes(token) || name === token
  );
}

/**
 * Runs `fn` with a per-attempt timeout, retrying transient failures with
 * exponential backoff. The signal aborts when an attempt times out.
 */
export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    timeoutMs = 30000,
    retryableErrors = ['ECONNRESET', 'ETIMEDOUT', '429', '503', 'AbortError']
  } = options;

  return getTracer().startActiveSpan(`retry:${operation}`, async (span) => {
    span.setAttribute('retry.operation', operation);
    span.setAttribute('retry.max', maxRetries);

    try {
      for (let attempt = 0; ; attempt += 1) {
        const controller = new AbortController();
        let timeoutId: NodeJS.Timeout | undefined;

        try {
          const pending = fn(controller.signal, attempt);
          const result = await (timeoutMs > 0
            ? Promise.race([
                pending,
                new Promise<never>((_, reject) => {
                  timeoutId = setTimeout(() => {
                    controller.abort();
                    reject(new TimeoutError(operation, timeoutMs));
                  }, timeoutMs);
                })
              ])
            : pending);

          if (attempt > 0) {
            console.info(`${operation} succeeded after ${attempt} retries.`);
            span.addEvent('retry.success', { attempt });
          }
          span.setAttribute('retry.attempts', attempt);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          controller.abort();
          span.addEvent('retry.failure', { attempt, message: describeError(error) });

          if (attempt >= maxRetries || !isRetryable(error, retryableErrors)) {
            span.recordException(error instanceof Error ? error : describeError(error));
            span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
            throw error;
          }

          const waitTime = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
          span.addEvent('retry.wait', { attempt: attempt + 1, waitTime });
          console.warn(`${operation} failed (attempt ${attempt + 1}/${maxRetries}). Retrying in ${waitTime}ms...`);
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        } finally {
          if (timeoutId) {
            clearTimeout(timeoutId);
          }
        }
      }
    } finally {
      span.end();
    }
  });
}
