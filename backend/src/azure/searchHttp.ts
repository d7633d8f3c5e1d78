import { performance } from 'node:perf_hooks';
import { createHash, randomUUID } from 'node:crypto';
import { config } from '../config/app.js';
import { SEARCH_SCOPE, createAuthHeaderProvider } from './credentials.js';
import { ServiceError, describeError } from '../utils/errors.js';
import { sanitizeLogMessage } from '../utils/openai.js';

const searchAuthHeaders = createAuthHeaderProvider(SEARCH_SCOPE);

export interface SearchRequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  correlationId?: string;
  signal?: AbortSignal;
}

export interface SearchRequestResult {
  response: Response;
  durationMs: number;
  requestId?: string;
  correlationId: string;
}

export async function performSearchRequest(
  operation: string,
  url: string,
  options: SearchRequestOptions = {}
): Promise<SearchRequestResult> {
  const { method = 'GET', body, signal } = options;
  const correlationId = options.correlationId ?? randomUUID();

  const headers: Record<string, string> = {
    ...(await searchAuthHeaders(config.AZURE_SEARCH_API_KEY)),
    'x-ms-client-request-id': correlationId
  };
  const init: RequestInit = { method, headers, signal };

  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  const queryHash = createHash('sha256').update(url).digest('hex').slice(0, 16);
  const start = performance.now();
  console.info(
    JSON.stringify({
      event: 'azure.search.request.start',
      operation,
      method,
      correlationId,
      queryHash
    })
  );

  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    const details = describeError(error);
    if (signal?.aborted || details.name === 'AbortError') {
      throw error;
    }
    throw new ServiceError(`${operation} network connection failed: ${details.message}`, {
      code: 'ECONNRESET',
      correlationId,
      cause: error
    });
  }

  const durationMs = Math.round(performance.now() - start);
  const requestId =
    response.headers.get('x-ms-request-id') ?? response.headers.get('apim-request-id') ?? undefined;

  if (!response.ok) {
    const errorText = await response.text().catch(() => '');
    console.error(
      JSON.stringify({
        event: 'azure.search.request.error',
        operation,
        status: response.status,
        durationMs,
        error: sanitizeLogMessage(errorText),
        correlationId,
        requestId,
        queryHash
      })
    );
    throw new ServiceError(`${operation} failed: ${response.status} ${response.statusText}`, {
      status: response.status,
      correlationId,
      requestId,
      body: errorText
    });
  }

  console.info(
    JSON.stringify({
      event: 'azure.search.request.completed',
      operation,
      status: response.status,
      durationMs,
      correlationId,
      requestId,
      queryHash
    })
  );

  return { response, durationMs, requestId, correlationId };
}
