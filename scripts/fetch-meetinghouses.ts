#!/usr/bin/env tsx
/**
 * Fetch Meetinghouses from the Meetinghouse Locator
 *
 * Harvests every meetinghouse, with the units that meet in it, from the
 * public locator map service and writes them to a JSON snapshot. An
 * existing snapshot is replaced.
 *
 * Usage:
 *   tsx scripts/fetch-meetinghouses.ts [--output <path>] [--page-size <n>]
 */

import { DEFAULT_LOCATOR_QUERY } from '../shared/types/meetinghouse';
import { getFlag, getIntFlag } from '../src/lib/cli';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { fetchAllBuildings } from '../src/lib/locator/client';
import { writeSnapshot } from '../src/lib/snapshot/store';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const config = loadConfig();
  const outputPath = getFlag(args, 'output') ?? config.snapshotPath;
  const pageSize = getIntFlag(args, 'page-size') ?? config.pageSize;

  console.log('Fetching meetinghouses from the locator...\n');

  const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
    baseUrl: config.locatorBaseUrl,
    referer: config.locatorReferer,
    pageSize,
    maxPages: config.maxPages,
    log: (message) => console.log(message),
    warn: (message) => console.warn(message),
  });

  console.log(`\n✓ Total buildings fetched: ${buildings.length}`);

  writeSnapshot(outputPath, buildings);
  console.log(`✓ Saved to: ${outputPath}`);
  console.log(`\nNext step:`);
  console.log(`  tsx scripts/analyze-meetinghouses.ts --input ${outputPath}`);
}

main().catch((error: unknown) => {
  console.error('\n✗ Error fetching meetinghouses:');
  console.error(errorMessage(error));
  process.exit(1);
});
