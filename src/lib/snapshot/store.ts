/**
 * Snapshot persistence
 *
 * A snapshot is the full building list written as one JSON array. Writes
 * always replace the whole file.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Building } from '../../../shared/types/meetinghouse';
import { SnapshotError, errorMessage } from '../errors';
import { describeIssues } from './issues';
import { safeValidateBuildings } from './schema';

/**
 * Write buildings to a snapshot file, creating its directory if needed
 */
export function writeSnapshot(path: string, buildings: Building[]): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(buildings, null, 2));
}

/**
 * Read and validate a snapshot file
 *
 * @throws SnapshotError if the file is missing, is not JSON, or does not
 *   hold a list of buildings
 */
export function readSnapshot(path: string): Building[] {
  if (!existsSync(path)) {
    throw new SnapshotError(`Snapshot not found: ${path}`, path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new SnapshotError(
      `Snapshot is not valid JSON (${path}): ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }

  const result = safeValidateBuildings(raw);
  if (!result.success) {
    throw new SnapshotError(
      `Snapshot does not match the building schema (${path}): ${describeIssues(result.error)}`,
      path,
      { cause: result.error }
    );
  }

  return result.data;
}
