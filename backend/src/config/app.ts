import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

loadEnv();

// z.coerce.boolean() treats the string "false" as true
const booleanFlag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .default(defaultValue)
    .transform((value, ctx) => {
      if (typeof value === 'boolean') {
        return value;
      }
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['false', '0', 'no', 'off', ''].includes(normalized)) {
        return false;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, received "${value}"` });
      return z.NEVER;
    });

const envSchema = z.object({
  PROJECT_NAME: z.string().default('azure-docs-assistant'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8787),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  AZURE_OPENAI_ENDPOINT: z.string().url(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  // v1 path segment is required for the Responses API
  AZURE_OPENAI_API_VERSION: z
    .string()
    .default('v1')
    .refine((value) => value === 'v1' || value === 'preview', {
      message: 'AZURE_OPENAI_API_VERSION must be one of: v1, preview'
    })
    .transform(() => 'v1'),
  AZURE_OPENAI_API_QUERY: z
    .string()
    .default('api-version=preview')
    .refine((value) => value === 'api-version=preview' || value === 'api-version=v1', {
      message: 'AZURE_OPENAI_API_QUERY must be api-version=preview or api-version=v1'
    }),
  AZURE_OPENAI_GPT_DEPLOYMENT: z.string().default('gpt-4o'),
  AZURE_OPENAI_EMBEDDING_DEPLOYMENT: z.string().default('text-embedding-3-large'),
  AZURE_OPENAI_EMBEDDING_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_EMBEDDING_API_KEY: z.string().optional(),

  AZURE_SEARCH_ENDPOINT: z.string().url(),
  AZURE_SEARCH_API_KEY: z.string().optional(),
  AZURE_SEARCH_API_VERSION: z.string().default('2024-07-01'),
  AZURE_SEARCH_INDEX_NAME: z.string().default('azure-technical-docs'),
  AZURE_SEARCH_VECTOR_FIELD: z.string().default('content_vector'),
  SEARCH_TOP_K: z.coerce.number().int().positive().default(5),

  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  GENERATION_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1200),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  GENERATION_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  INTENT_CLASSIFIER_MAX_TOKENS: z.coerce.number().int().positive().default(300),
  INTENT_CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  PARALLEL_TOOL_CALLS: booleanFlag(true),
  MAX_TOOL_ITERATIONS: z.coerce.number().int().positive().default(5),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  SESSION_DB_PATH: z.string().default('./data/session-store.db'),

  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(10),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(90000),
  TURN_TIMEOUT_MS: z.coerce.number().int().positive().default(75000),
  MAX_INPUT_CHARS: z.coerce.number().int().positive().default(4000),

  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
  OTEL_SERVICE_NAME: z.string().optional(),
  ENABLE_CONSOLE_TRACING: booleanFlag(false)
}).superRefine((env, ctx) => {
  // The turn must end with an answer before the request watchdog replies 408
  if (env.TURN_TIMEOUT_MS >= env.REQUEST_TIMEOUT_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TURN_TIMEOUT_MS'],
      message: 'TURN_TIMEOUT_MS must be lower than REQUEST_TIMEOUT_MS'
    });
  }
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
export const isDevelopment = config.NODE_ENV === 'development';
export const isTest = config.NODE_ENV === 'test';
