/**
 * safety.ts
 *
 * Request guardrails for every scraping page:
 * - abort stylesheets, images, fonts and media (the grid geometry lives in inline styles)
 * - allow everything else
 *
 */


import type { Page } from '@playwright/test';

const BLOCKED_RESOURCE_TYPES = new Set(['stylesheet', 'image', 'font', 'media']);

export function isBlockedResource(resourceType: string): boolean {
  return BLOCKED_RESOURCE_TYPES.has(resourceType);
}

export async function installAssetBlocking(page: Page) {
  await page.route('**/*', async (route) => {
    if (isBlockedResource(route.request().resourceType())) {
      return route.abort();
    }
    return route.continue();
  });
}
