import { defineConfig } from '@playwright/test';

// Keep harness chatter out of the test output unless asked for.
process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'error';

export default defineConfig({
  testDir: './test',
  testMatch: '**/*.spec.ts',
  fullyParallel: false,
  forbidOnly: !!process.env['CI'],
  retries: 0,
  timeout: 30000
});
