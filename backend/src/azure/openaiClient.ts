import { config, isDevelopment } from '../config/app.js';
import { ServiceError, describeError } from '../utils/errors.js';
import { COGNITIVE_SERVICES_SCOPE, createAuthHeaderProvider } from './credentials.js';

const baseUrl = `${config.AZURE_OPENAI_ENDPOINT.replace(/\/+$/, '')}/openai/${config.AZURE_OPENAI_API_VERSION}`;
const normalizedQuery = config.AZURE_OPENAI_API_QUERY.replace(/^\?+/, '');

function withQuery(url: string) {
  if (!normalizedQuery) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${normalizedQuery}`;
}

/**
 * Sanitize Azure error messages to prevent information disclosure in production
 */
function sanitizeAzureError(status: number, statusText: string, body: string): string {
  if (isDevelopment) {
    return `${status} ${statusText} - ${body}`;
  }
  return `${status} ${statusText}`;
}

const openAIAuthHeaders = createAuthHeaderProvider(COGNITIVE_SERVICES_SCOPE);

async function postJson<T>(
  operation: string,
  url: string,
  body: unknown,
  headers: Record<string, string>,
  signal?: AbortSignal
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...headers
      },
      body: JSON.stringify(body),
      signal
    });
  } catch (error) {
    const details = describeError(error);
    if (signal?.aborted || details.name === 'AbortError') {
      throw error;
    }
    const causeCode = error instanceof Error ? describeError(error.cause).code : undefined;
    throw new ServiceError(`${operation} network connection failed: ${details.message}`, {
      code: causeCode ?? 'ECONNRESET',
      cause: error
    });
  }

  if (!response.ok) {
    const text = await response.text();
    throw new ServiceError(`${operation} failed: ${sanitizeAzureError(response.status, response.statusText, text)}`, {
      status: response.status,
      requestId: response.headers.get('x-request-id') ?? undefined,
      body: isDevelopment ? text : undefined
    });
  }

  return (await response.json()) as T;
}

export type ResponseTextFormat =
  | { type: 'text' }
  | { type: 'json_object' }
  | {
      type: 'json_schema';
      name: string;
      schema: Record<string, unknown>;
      description?: string;
      strict?: boolean;
    };

export interface FunctionToolDefinition {
  type: 'function';
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  strict?: boolean;
}

export type ResponseInputItem =
  | { type: 'message'; role: 'system' | 'developer' | 'user' | 'assistant'; content: string }
  | { type: 'function_call'; call_id: string; name: string; arguments: string }
  | { type: 'function_call_output'; call_id: string; output: string };

export interface OutputContentPart {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface OutputItem {
  type: string;
  id?: string;
  role?: string;
  status?: string;
  content?: OutputContentPart[];
  call_id?: string;
  name?: string;
  arguments?: string;
  [key: string]: unknown;
}

export interface ResponseUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface AzureResponseOutput {
  id: string;
  object: 'response';
  status: 'completed' | 'failed' | 'in_progress' | 'cancelled' | 'queued' | 'incomplete';
  created_at: number;
  model: string;
  output: OutputItem[];
  output_text?: string | null;
  usage?: ResponseUsage;
  error: { code: string; message: string } | null;
  incomplete_details: { reason: 'max_output_tokens' | 'content_filter' } | null;
}

export interface ResponsePayload {
  model?: string;
  instructions?: string;
  input: ResponseInputItem[];
  temperature?: number;
  max_output_tokens?: number;
  tools?: FunctionToolDefinition[];
  tool_choice?: 'auto' | 'required' | 'none';
  parallel_tool_calls?: boolean;
  text?: { format: ResponseTextFormat };
  store?: boolean;
  user?: string;
  metadata?: Record<string, string>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export async function createResponse(
  payload: ResponsePayload,
  options: RequestOptions = {}
): Promise<AzureResponseOutput> {
  // undefined fields drop out during serialization
  const request = {
    ...payload,
    model: payload.model ?? config.AZURE_OPENAI_GPT_DEPLOYMENT,
    tools: payload.tools?.length ? payload.tools : undefined,
    // tool_choice and parallel_tool_calls are rejected without tools
    tool_choice: payload.tools?.length ? payload.tool_choice : undefined,
    parallel_tool_calls: payload.tools?.length ? payload.parallel_tool_calls : undefined,
    store: payload.store ?? false
  };

  const response = await postJson<AzureResponseOutput>(
    'Azure OpenAI request',
    withQuery(`${baseUrl}/responses`),
    request,
    await openAIAuthHeaders(config.AZURE_OPENAI_API_KEY),
    options.signal
  );

  if (response.status === 'failed' && response.error) {
    throw new ServiceError(`Azure OpenAI response failed: ${response.error.code} ${response.error.message}`, {
      code: response.error.code
    });
  }

  return response;
}

export interface EmbeddingsResponse {
  object: 'list';
  data: Array<{
    object: 'embedding';
    embedding: number[];
    index: number;
  }>;
  model: string;
  usage: {
    prompt_tokens: number;
    total_tokens: number;
  };
}

export async function createEmbeddings(
  inputs: string[] | string,
  model?: string,
  options: RequestOptions = {}
): Promise<EmbeddingsResponse> {
  const embeddingEndpoint = config.AZURE_OPENAI_EMBEDDING_ENDPOINT ?? config.AZURE_OPENAI_ENDPOINT;
  const embeddingBaseUrl = `${embeddingEndpoint.replace(/\/+$/, '')}/openai/${config.AZURE_OPENAI_API_VERSION}`;

  return postJson<EmbeddingsResponse>(
    'Azure OpenAI embeddings',
    withQuery(`${embeddingBaseUrl}/embeddings`),
    {
      model: model ?? config.AZURE_OPENAI_EMBEDDING_DEPLOYMENT,
      input: inputs
    },
    await openAIAuthHeaders(config.AZURE_OPENAI_EMBEDDING_API_KEY ?? config.AZURE_OPENAI_API_KEY),
    options.signal
  );
}
