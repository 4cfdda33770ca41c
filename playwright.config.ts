import { defineConfig } from '@playwright/test';

// Unit-level suites only: nothing here launches a browser.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: true,
});
