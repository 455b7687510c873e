/**
 * Unit counts over a snapshot
 */

import type { Building, Unit, UnitRecord } from '../../../shared/types/meetinghouse';
import type {
  CountTable,
  CountryUnitCounts,
  UnitCountBucket,
  UnitTypeSummary,
  UnitsPerBuilding,
} from '../../../shared/types/stats';
import { countryOf, hasAddress } from './address';

/** Key used in subtype counts for units that carry no subtype */
export const NO_SUBTYPE_KEY = 'NULL';

export function unitsOf(building: Building): Unit[] {
  return building.associated ?? [];
}

/**
 * Every unit paired with the id of the building that lists it
 */
export function flattenUnits(buildings: Building[]): UnitRecord[] {
  return buildings.flatMap((building) =>
    unitsOf(building).map((unit) => ({ buildingId: building.id, unit }))
  );
}

export function countTotalUnits(buildings: Building[]): number {
  return buildings.reduce((total, building) => total + unitsOf(building).length, 0);
}

function bucketFor(unitCount: number): UnitCountBucket {
  switch (unitCount) {
    case 0:
      return '0';
    case 1:
      return '1';
    case 2:
      return '2';
    case 3:
      return '3';
    default:
      return '4+';
  }
}

/**
 * Count buildings by how many units meet in them
 */
export function countUnitsPerBuilding(buildings: Building[]): UnitsPerBuilding {
  const histogram: Record<number, number> = {};
  const buckets: Record<UnitCountBucket, number> = { '0': 0, '1': 0, '2': 0, '3': 0, '4+': 0 };

  for (const building of buildings) {
    const unitCount = unitsOf(building).length;
    histogram[unitCount] = (histogram[unitCount] ?? 0) + 1;
    buckets[bucketFor(unitCount)]++;
  }

  return { totalBuildings: buildings.length, histogram, buckets };
}

/**
 * Order a count table by count, largest first, then by key
 */
export function sortCounts(counts: Map<string, number>): CountTable {
  return [...counts.entries()].sort(([ka, a], [kb, b]) => b - a || ka.localeCompare(kb));
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Break units down by type and subtype, and buildings by address and
 * country coverage
 */
export function summarizeUnitTypes(buildings: Building[]): UnitTypeSummary {
  const byType = new Map<string, number>();
  const bySubType = new Map<string, number>();
  const byCountry = new Map<string, CountryUnitCounts>();
  let totalUnits = 0;
  let buildingsWithNoUnits = 0;
  let buildingsWithoutAddress = 0;
  let buildingsWithoutAddressButUnits = 0;

  for (const building of buildings) {
    const units = unitsOf(building);
    const addressed = hasAddress(building);
    const country = countryOf(building);

    if (!addressed) {
      buildingsWithoutAddress++;
      if (units.length > 0) buildingsWithoutAddressButUnits++;
    }

    if (country !== null) {
      const counts = byCountry.get(country) ?? { buildings: 0, units: 0, buildingsWithNoUnits: 0 };
      counts.buildings++;
      counts.units += units.length;
      if (units.length === 0) counts.buildingsWithNoUnits++;
      byCountry.set(country, counts);
    }

    if (units.length === 0) {
      buildingsWithNoUnits++;
      continue;
    }

    for (const unit of units) {
      totalUnits++;
      increment(byType, unit.type);
      increment(bySubType, unit.subType ?? NO_SUBTYPE_KEY);
    }
  }

  return {
    totalUnits,
    distinctTypes: byType.size,
    buildingsWithNoUnits,
    buildingsWithoutAddress,
    buildingsWithoutAddressButUnits,
    countryCount: byCountry.size,
    byType: sortCounts(byType),
    bySubType: sortCounts(bySubType),
    byCountry: Object.fromEntries(byCountry),
  };
}
