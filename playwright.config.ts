import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: './microservices',
  testMatch: '**/tests/**/*.spec.ts',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  timeout: 30_000,
});
