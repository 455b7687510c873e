/**
 * Runtime configuration from environment variables
 */

import { join } from 'path';
import { z } from 'zod';

export const DEFAULT_LOCATOR_BASE_URL =
  'https://maps.churchofjesuschrist.org/api/maps-proxy/v2/locations/identify';
export const DEFAULT_LOCATOR_REFERER = 'https://maps.churchofjesuschrist.org/';

// The service answers nearest-N queries, so one large page normally holds
// every meetinghouse.
export const DEFAULT_PAGE_SIZE = 100_000;
export const DEFAULT_MAX_PAGES = 50;

export interface AppConfig {
  locatorBaseUrl: string;
  locatorReferer: string;
  pageSize: number;
  maxPages: number;
  snapshotPath: string;
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  LOCATOR_BASE_URL: z.string().url().default(DEFAULT_LOCATOR_BASE_URL),
  LOCATOR_REFERER: z.string().url().default(DEFAULT_LOCATOR_REFERER),
  LOCATOR_PAGE_SIZE: positiveInt.default(DEFAULT_PAGE_SIZE),
  LOCATOR_MAX_PAGES: positiveInt.default(DEFAULT_MAX_PAGES),
  SNAPSHOT_PATH: z.string().min(1).optional(),
});

/**
 * Load configuration, applying defaults for unset variables
 *
 * @throws ZodError if a variable is set to an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    locatorBaseUrl: parsed.LOCATOR_BASE_URL,
    locatorReferer: parsed.LOCATOR_REFERER,
    pageSize: parsed.LOCATOR_PAGE_SIZE,
    maxPages: parsed.LOCATOR_MAX_PAGES,
    snapshotPath: parsed.SNAPSHOT_PATH ?? join(cwd, 'data', 'buildings.json'),
  };
}
