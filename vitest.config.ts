import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'warn',
      AZURE_OPENAI_ENDPOINT: 'https://example-openai.openai.azure.com',
      AZURE_OPENAI_API_KEY: 'test-key',
      AZURE_SEARCH_ENDPOINT: 'https://example-search.search.windows.net',
      AZURE_SEARCH_API_KEY: 'test-key',
      SESSION_DB_PATH: ':memory:',
      ENABLE_CONSOLE_TRACING: 'false'
    }
  }
});
