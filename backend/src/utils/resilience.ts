import { SpanStatusCode } from '@opentelemetry/api';
import { getTracer, toError } from '../orchestrator/telemetry.js';
import { ServiceError, describeError } from './errors.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  retryableErrors?: string[];
  /** Stops further attempts and backoff waits once aborted. */
  signal?: AbortSignal;
}

export interface RetryInvocationContext {
  attempt: number;
}

const DEFAULT_RETRYABLE = ['ECONNRESET', 'ETIMEDOUT', '429', '503', 'AbortError'];

export function isRetryableError(error: unknown, retryableErrors: string[] = DEFAULT_RETRYABLE): boolean {
  const details = describeError(error);
  return retryableErrors.some(
    (code) =>
      details.message.includes(code) ||
      details.name === code ||
      (details.code?.includes(code) ?? false) ||
      (details.status?.toString().includes(code) ?? false)
  );
}

/**
 * Aborts `controller` with the reason of whichever of `signals` aborts first.
 * Returns the function that detaches the listeners.
 */
export function linkAbortSignals(controller: AbortController, ...signals: Array<AbortSignal | undefined>): () => void {
  const detach: Array<() => void> = [];
  for (const signal of signals) {
    if (!signal) {
      continue;
    }
    if (signal.aborted) {
      controller.abort(signal.reason);
      continue;
    }
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', forwardAbort, { once: true });
    detach.push(() => signal.removeEventListener('abort', forwardAbort));
  }
  return () => {
    for (const remove of detach) {
      remove();
    }
  };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal, context: RetryInvocationContext) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    timeoutMs = 30000,
    retryableErrors = DEFAULT_RETRYABLE,
    signal
  } = options;

  const tracer = getTracer();

  return tracer.startActiveSpan(`retry:${operation}`, async (span) => {
    span.setAttribute('retry.operation', operation);
    span.setAttribute('retry.max', maxRetries);

    let attempt = 0;
    let lastError: unknown;

    try {
      while (attempt <= maxRetries) {
        if (signal?.aborted) {
          throw lastError ?? signal.reason;
        }
        const controller = new AbortController();
        let timeoutId: NodeJS.Timeout | undefined;

        try {
          const timedOperation = fn(controller.signal, { attempt });
          // A call that loses the race to the timer may still reject once aborted
          timedOperation.catch((lateError: unknown) => {
            if (controller.signal.aborted) {
              console.debug(
                JSON.stringify({ event: 'retry.late_failure', operation, attempt, error: toError(lateError).message })
              );
            }
          });
          const result = await (timeoutMs > 0
            ? Promise.race([
                timedOperation,
                new Promise<never>((_, reject) => {
                  timeoutId = setTimeout(() => {
                    controller.abort();
                    reject(
                      new ServiceError(`${operation} timed out after ${timeoutMs}ms`, { code: 'ETIMEDOUT' })
                    );
                  }, timeoutMs);
                })
              ])
            : timedOperation);

          if (attempt > 0) {
            console.info(JSON.stringify({ event: 'retry.recovered', operation, attempt }));
            span.addEvent('retry.success', { attempt });
          }

          span.setAttribute('retry.attempts', attempt);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          controller.abort();
          lastError = error;
          const err = toError(error);

          span.addEvent('retry.failure', { attempt, message: err.message });

          if (signal?.aborted || !isRetryableError(error, retryableErrors) || attempt === maxRetries) {
            span.recordException(err);
            span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
            throw error;
          }

          attempt += 1;
          const waitTime = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
          span.addEvent('retry.wait', { attempt, waitTime });
          console.warn(
            JSON.stringify({ event: 'retry.scheduled', operation, attempt, maxRetries, waitTime, error: err.message })
          );
          await sleep(waitTime, signal);
        } finally {
          if (timeoutId) {
            clearTimeout(timeoutId);
          }
        }
      }

      throw lastError;
    } finally {
      span.end();
    }
  });
}
