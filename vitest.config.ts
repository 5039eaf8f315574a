import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000, // 10 second default for tests
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    env: {
      // Keep tests away from any real endpoint or developer .env values
      MD_DIGEST_API_KEY: 'test-key',
      MD_DIGEST_BASE_URL: 'http://localhost:0',
      MD_DIGEST_RETRY_INITIAL_DELAY_MS: '1',
      MD_DIGEST_RETRY_MAX_DELAY_MS: '2',
    },
  },
});
