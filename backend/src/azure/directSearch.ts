/**
 * Direct Azure AI Search integration for the technical documentation index.
 *
 * One hybrid query per call: the query text drives keyword matching and its
 * embedding drives a single vector query, fused by the service.
 */

import { z } from 'zod';
import type { RetrievedDocument, SearchToolOutput } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { performSearchRequest } from './searchHttp.js';
import { embedText } from '../utils/embeddings.js';

// ============================================================================
// Types
// ============================================================================

export interface VectorQuery {
  kind: 'vector';
  vector: number[];
  fields: string;
  k: number;
}

export interface SearchPayload {
  search: string;
  top?: number;
  select?: string;
  filter?: string;
  vectorQueries?: VectorQuery[];
}

const searchResultSchema = z
  .object({
    '@search.score': z.number().optional(),
    title: z.string().nullish(),
    content: z.string().nullish(),
    source: z.string().nullish(),
    page_number: z.number().nullish(),
    url: z.string().nullish()
  })
  .passthrough();

const searchResponseSchema = z.object({
  '@odata.count': z.number().optional(),
  value: z.array(searchResultSchema)
});

export type SearchResult = z.infer<typeof searchResultSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;

// ============================================================================
// Query Builder
// ============================================================================

export class SearchQueryBuilder {
  private readonly payload: SearchPayload;

  constructor(query: string) {
    this.payload = { search: query };
  }

  withVector(vector: number[], field: string, k: number): this {
    this.payload.vectorQueries = [{ kind: 'vector', vector, fields: field, k }];
    return this;
  }

  withFilter(filter: string): this {
    this.payload.filter = filter;
    return this;
  }

  take(count: number): this {
    this.payload.top = count;
    return this;
  }

  selectFields(fields: string[]): this {
    this.payload.select = fields.join(',');
    return this;
  }

  build(): SearchPayload {
    return { ...this.payload, vectorQueries: this.payload.vectorQueries?.map((query) => ({ ...query })) };
  }
}

// ============================================================================
// Direct Search API
// ============================================================================

export async function executeSearch(
  indexName: string,
  queryBuilder: SearchQueryBuilder,
  options: { signal?: AbortSignal; correlationId?: string } = {}
): Promise<SearchResponse> {
  const endpoint = config.AZURE_SEARCH_ENDPOINT.replace(/\/+$/, '');
  const url = `${endpoint}/indexes('${encodeURIComponent(indexName)}')/docs/search?api-version=${config.AZURE_SEARCH_API_VERSION}`;

  const { response } = await performSearchRequest('docs.search', url, {
    method: 'POST',
    body: queryBuilder.build(),
    correlationId: options.correlationId,
    signal: options.signal
  });

  return searchResponseSchema.parse(await response.json());
}

const SELECT_FIELDS = ['title', 'content', 'source', 'page_number', 'url'];
export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export function formatContextBlock(result: SearchResult): string {
  const page = result.page_number ?? undefined;
  const pageLabel = page !== undefined ? String(page) : 'N/A';
  return [
    `SOURCE: ${result.title || 'Untitled'}`,
    `METADATA: File ${result.source ?? 'unknown'}, Page ${pageLabel}`,
    `CONTENT: ${result.content ?? ''}`
  ].join('\n');
}

export function toRetrievedDocument(result: SearchResult): RetrievedDocument {
  const document: RetrievedDocument = {};
  if (result.title) document.title = result.title;
  if (result.source) document.source = result.source;
  if (typeof result.page_number === 'number') document.page = result.page_number;
  if (result.url) document.url = result.url;
  return document;
}

export interface TechnicalSearchOptions {
  indexName?: string;
  top?: number;
  filter?: string;
  signal?: AbortSignal;
  correlationId?: string;
}

/**
 * Hybrid keyword + vector search over the documentation index, shaped for the
 * generator: a context string it can read and the documents it came from.
 */
export async function searchTechnicalDocs(
  query: string,
  options: TechnicalSearchOptions = {}
): Promise<SearchToolOutput> {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new Error('Search query must not be empty');
  }

  const top = options.top ?? config.SEARCH_TOP_K;
  const vector = await embedText(trimmed, { signal: options.signal });

  const builder = new SearchQueryBuilder(trimmed)
    .withVector(vector, config.AZURE_SEARCH_VECTOR_FIELD, top)
    .take(top)
    .selectFields(SELECT_FIELDS);

  if (options.filter) {
    builder.withFilter(options.filter);
  }

  const response = await executeSearch(options.indexName ?? config.AZURE_SEARCH_INDEX_NAME, builder, {
    signal: options.signal,
    correlationId: options.correlationId
  });

  return {
    content: response.value.map(formatContextBlock).join(CONTEXT_SEPARATOR),
    documents: response.value.map(toRetrievedDocument)
  };
}
