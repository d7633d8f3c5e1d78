import type { SearchToolOutput } from '../../../shared/types.js';
import { searchTechnicalDocs } from '../azure/directSearch.js';
import type { FunctionToolDefinition } from '../azure/openaiClient.js';

export type ToolOutput = SearchToolOutput | string;

export interface ToolInvocationOptions {
  signal?: AbortSignal;
}

/**
 * A callable capability offered to the generator. `normalizeArgs` turns the
 * model's free-form argument map into the shape `invoke` expects and throws a
 * {@link ToolArgumentError} when it cannot.
 */
export interface ToolDefinition<TArgs = unknown> {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  normalizeArgs(raw: Record<string, unknown>): TArgs;
  invoke(args: TArgs, options: ToolInvocationOptions): Promise<ToolOutput>;
}

export type ToolRegistry = ReadonlyMap<string, ToolDefinition>;

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

export function createToolRegistry(tools: ToolDefinition[]): ToolRegistry {
  const registry = new Map<string, ToolDefinition>();
  for (const tool of tools) {
    if (registry.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }
    registry.set(tool.name, tool);
  }
  return registry;
}

export function toFunctionTools(registry: ToolRegistry): FunctionToolDefinition[] {
  return Array.from(registry.values(), (tool) => ({
    type: 'function' as const,
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters
  }));
}

export const SEARCH_TOOL_NAME = 'search_technical_docs';

export interface SearchArgs {
  query: string;
}

const QUERY_ALIASES = ['query', 'text', 'input'];

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export function normalizeSearchArgs(raw: Record<string, unknown>): SearchArgs {
  for (const key of QUERY_ALIASES) {
    const value = nonEmptyString(raw[key]);
    if (value) {
      return { query: value };
    }
  }

  // A lone string argument under any other name is taken as the query
  const strings = Object.values(raw).map(nonEmptyString).filter((value): value is string => Boolean(value));
  if (strings.length === 1) {
    return { query: strings[0] };
  }

  throw new ToolArgumentError(`${SEARCH_TOOL_NAME} requires a non-empty "query" string`);
}

export function createSearchTool(
  search: (query: string, options: ToolInvocationOptions) => Promise<SearchToolOutput> = searchTechnicalDocs
): ToolDefinition<SearchArgs> {
  return {
    name: SEARCH_TOOL_NAME,
    description:
      'Search the Azure technical documentation with hybrid keyword and vector search. ' +
      'Always pass the CURRENT user question (or a focused rewrite of it), never an earlier topic.',
    parameters: {
      type: 'object',
      additionalProperties: false,
      properties: {
        query: {
          type: 'string',
          description: 'Search query for the current question'
        }
      },
      required: ['query']
    },
    normalizeArgs: normalizeSearchArgs,
    invoke: (args, options) => search(args.query, options)
  };
}

export function createDefaultToolRegistry(): ToolRegistry {
  return createToolRegistry([createSearchTool()]);
}
