import type { Building } from '../../../shared/types/meetinghouse';
import { readSnapshot, writeSnapshot } from './store';

/**
 * Copy buildings without the bulky per-building fields: search match
 * metadata, unit lists, phone numbers and opening hours
 */
export function pruneBuildings(buildings: Building[]): Building[] {
  return buildings.map(({ match, associated, phones, hours, ...rest }) => rest);
}

/**
 * Write a pruned copy of the snapshot at `inputPath` to `outputPath`
 *
 * @returns number of buildings written
 */
export function pruneSnapshotFile(inputPath: string, outputPath: string): number {
  const pruned = pruneBuildings(readSnapshot(inputPath));
  writeSnapshot(outputPath, pruned);
  return pruned.length;
}
