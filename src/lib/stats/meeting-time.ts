import type { Building } from '../../../shared/types/meetinghouse';
import type { MeetingTimeMatch } from '../../../shared/types/stats';
import { flattenUnits } from './units';

// Young single adult units are left out of meeting-time searches.
const EXCLUDED_SUBTYPE = 'YSA';

/**
 * Buildings in `city` where at least one unit meets at `time`
 *
 * @param time - hours code fragment such as "Su 11:00"
 */
export function findBuildingsMeetingAt(
  buildings: Building[],
  city: string,
  time: string
): MeetingTimeMatch[] {
  const wantedCity = city.toUpperCase();
  const inCity = buildings.filter(
    (building) => building.address?.city?.toUpperCase() === wantedCity
  );

  const matches = new Map<string, MeetingTimeMatch>();
  for (const building of inCity) {
    matches.set(building.id, {
      buildingId: building.id,
      name: building.name ?? null,
      address: building.address?.formatted ?? null,
      units: [],
    });
  }

  for (const { buildingId, unit } of flattenUnits(inCity)) {
    if (unit.subType === EXCLUDED_SUBTYPE) continue;
    if (!unit.hours?.code.includes(time)) continue;
    matches.get(buildingId)?.units.push(unit.name ?? unit.id);
  }

  return [...matches.values()].filter((match) => match.units.length > 0);
}
