#!/usr/bin/env tsx
/**
 * Analyze a Meetinghouse Snapshot
 *
 * Loads the snapshot written by fetch-meetinghouses.ts and prints one metric.
 *
 * Usage:
 *   tsx scripts/analyze-meetinghouses.ts [--input <path>] [--metric <name>]
 *
 * Examples:
 *   tsx scripts/analyze-meetinghouses.ts --metric units-per-building
 *   tsx scripts/analyze-meetinghouses.ts --metric meeting-time --city Rexburg --time "Su 11:00"
 *   tsx scripts/analyze-meetinghouses.ts --metric prune --output data/buildings_pruned.json
 */

import { getFlag } from '../src/lib/cli';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { pruneSnapshotFile } from '../src/lib/snapshot/prune';
import { readSnapshot } from '../src/lib/snapshot/store';
import {
  DEFAULT_METRIC,
  METRICS,
  isMetricName,
  runMetric,
  type MetricName,
} from '../src/lib/stats/analysis';
import { formatReport } from '../src/lib/stats/report';

const PRUNE_COMMAND = 'prune';

function main(): void {
  const args = process.argv.slice(2);
  const config = loadConfig();
  const inputPath = getFlag(args, 'input') ?? config.snapshotPath;
  const requested = getFlag(args, 'metric') ?? DEFAULT_METRIC;
  const metric: MetricName | typeof PRUNE_COMMAND | null =
    requested === PRUNE_COMMAND ? PRUNE_COMMAND : isMetricName(requested) ? requested : null;

  if (metric === null) {
    console.error(`✗ Unknown metric: ${requested}`);
    console.error(`  Available: ${[...METRICS, PRUNE_COMMAND].join(', ')}`);
    process.exitCode = 1;
    return;
  }

  if (metric === PRUNE_COMMAND) {
    const outputPath = getFlag(args, 'output');
    if (!outputPath) {
      throw new Error('prune requires --output <path>');
    }
    const count = pruneSnapshotFile(inputPath, outputPath);
    console.log(`✓ Pruned snapshot of ${count} buildings saved to: ${outputPath}`);
    return;
  }

  console.log(`Reading buildings from ${inputPath}...`);
  const buildings = readSnapshot(inputPath);
  console.log(`✓ Total buildings found: ${buildings.length}\n`);

  const result = runMetric(metric, buildings, {
    city: getFlag(args, 'city'),
    time: getFlag(args, 'time'),
  });
  for (const line of formatReport(result)) {
    console.log(line);
  }
}

try {
  main();
} catch (error) {
  console.error('\n✗ Error analyzing meetinghouses:');
  console.error(errorMessage(error));
  process.exit(1);
}
