/**
 * Render analysis results as console lines
 */

import type {
  CountTable,
  CountryBuildingCount,
  MeetingTimeMatch,
  SizeByCountry,
  UnitTypeSummary,
  UnitsPerBuilding,
} from '../../../shared/types/stats';
import { UNIT_COUNT_BUCKETS } from '../../../shared/types/stats';
import type { AnalysisResult } from './analysis';

function countLines(counts: CountTable): string[] {
  return counts.map(([key, count]) => `  ${key}: ${count}`);
}

function formatUnitsPerBuilding(result: UnitsPerBuilding): string[] {
  const exact = Object.entries(result.histogram)
    .map(([units, count]) => [Number(units), count] as const)
    .sort(([a], [b]) => a - b)
    .map(([units, count]) => `  ${units}: ${count}`);

  return [
    'Count of buildings with number of units:',
    ...exact,
    `Number of units per building (total buildings: ${result.totalBuildings}):`,
    ...UNIT_COUNT_BUCKETS.map((bucket) => `  ${bucket}: ${result.buckets[bucket]}`),
  ];
}

function formatUnitTypes(result: UnitTypeSummary): string[] {
  return [
    `Total units: ${result.totalUnits}`,
    `Total unit types: ${result.distinctTypes}`,
    `Total buildings with no units: ${result.buildingsWithNoUnits}`,
    `Total country count: ${result.countryCount}`,
    `Total buildings with no address: ${result.buildingsWithoutAddress}`,
    `Total buildings with no address, but has units: ${result.buildingsWithoutAddressButUnits}`,
    'Units by type:',
    ...countLines(result.byType),
    'Units by subtype:',
    ...countLines(result.bySubType),
  ];
}

function formatByCountry(result: CountryBuildingCount[]): string[] {
  return [
    `Buildings by country (${result.length} countries):`,
    ...result.map(({ country, buildings }) => `  ${country}: ${buildings}`),
  ];
}

function formatSizeByCountry(result: SizeByCountry): string[] {
  return [
    'Average interior size by country:',
    ...result.countries.map(
      (c) => `  ${c.country}: ${c.avgSizeSqM} sq m / ${c.avgSizeSqFt} sq ft (${c.count} buildings)`
    ),
    `Total buildings with no address: ${result.skipped.noAddress}`,
    `Total buildings with no interior size: ${result.skipped.noInteriorSize}`,
    `Total buildings with no property size: ${result.skipped.noPropertySize}`,
    `Total interior larger than property: ${result.skipped.interiorExceedsProperty}`,
    `Total zero size: ${result.skipped.zeroSize}`,
    `Global average size: ${result.globalAvgSizeSqM} sq m / ${result.globalAvgSizeSqFt} sq ft`,
  ];
}

function formatMeetingTime(matches: MeetingTimeMatch[], city: string, time: string): string[] {
  return [
    `Found ${matches.length} buildings with units meeting at ${time} in ${city}`,
    ...matches.map(
      (m) => `  ${m.name ?? m.buildingId} (${m.address ?? 'no address'}): ${m.units.join(', ')}`
    ),
  ];
}

export function formatReport(result: AnalysisResult): string[] {
  switch (result.metric) {
    case 'summary':
      return [
        `Total buildings: ${result.value.totalBuildings}`,
        `Total units: ${result.value.totalUnits}`,
        `Total buildings with no address: ${result.value.buildingsWithoutAddress}`,
        ...formatUnitsPerBuilding(result.value.unitsPerBuilding),
        'Units by type:',
        ...countLines(result.value.unitTypes.byType),
      ];
    case 'units-per-building':
      return formatUnitsPerBuilding(result.value);
    case 'no-address':
      return [`Total buildings with no address: ${result.value}`];
    case 'total-units':
      return [`Total units: ${result.value}`];
    case 'unit-types':
      return formatUnitTypes(result.value);
    case 'by-country':
      return formatByCountry(result.value);
    case 'size-by-country':
      return formatSizeByCountry(result.value);
    case 'meeting-time':
      return formatMeetingTime(result.value, result.city, result.time);
  }
}
