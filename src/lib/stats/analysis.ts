/**
 * Metric registry
 *
 * Maps metric names accepted on the command line to the analysis they run.
 * Every metric is a pure read over the building list.
 */

import type { Building } from '../../../shared/types/meetinghouse';
import type {
  AnalysisSummary,
  CountryBuildingCount,
  MeetingTimeMatch,
  SizeByCountry,
  UnitTypeSummary,
  UnitsPerBuilding,
} from '../../../shared/types/stats';
import { countBuildingsWithoutAddress, groupBuildingsByCountry } from './address';
import { findBuildingsMeetingAt } from './meeting-time';
import { averageSizeByCountry } from './size';
import { countTotalUnits, countUnitsPerBuilding, summarizeUnitTypes } from './units';

export const METRICS = [
  'summary',
  'units-per-building',
  'no-address',
  'total-units',
  'unit-types',
  'by-country',
  'size-by-country',
  'meeting-time',
] as const;

export type MetricName = (typeof METRICS)[number];

export const DEFAULT_METRIC: MetricName = 'unit-types';

export type AnalysisResult =
  | { metric: 'summary'; value: AnalysisSummary }
  | { metric: 'units-per-building'; value: UnitsPerBuilding }
  | { metric: 'no-address'; value: number }
  | { metric: 'total-units'; value: number }
  | { metric: 'unit-types'; value: UnitTypeSummary }
  | { metric: 'by-country'; value: CountryBuildingCount[] }
  | { metric: 'size-by-country'; value: SizeByCountry }
  | { metric: 'meeting-time'; value: MeetingTimeMatch[]; city: string; time: string };

export interface MetricOptions {
  city?: string;
  time?: string;
}

export function isMetricName(value: string): value is MetricName {
  return (METRICS as readonly string[]).includes(value);
}

export function summarize(buildings: Building[]): AnalysisSummary {
  return {
    totalBuildings: buildings.length,
    totalUnits: countTotalUnits(buildings),
    buildingsWithoutAddress: countBuildingsWithoutAddress(buildings),
    unitsPerBuilding: countUnitsPerBuilding(buildings),
    unitTypes: summarizeUnitTypes(buildings),
  };
}

/**
 * Run one metric over a snapshot
 *
 * @throws Error if `meeting-time` is requested without a city and time
 */
export function runMetric(
  metric: MetricName,
  buildings: Building[],
  options: MetricOptions = {}
): AnalysisResult {
  switch (metric) {
    case 'summary':
      return { metric, value: summarize(buildings) };
    case 'units-per-building':
      return { metric, value: countUnitsPerBuilding(buildings) };
    case 'no-address':
      return { metric, value: countBuildingsWithoutAddress(buildings) };
    case 'total-units':
      return { metric, value: countTotalUnits(buildings) };
    case 'unit-types':
      return { metric, value: summarizeUnitTypes(buildings) };
    case 'by-country':
      return { metric, value: groupBuildingsByCountry(buildings) };
    case 'size-by-country':
      return { metric, value: averageSizeByCountry(buildings) };
    case 'meeting-time': {
      const { city, time } = options;
      if (!city || !time) {
        throw new Error('meeting-time requires --city and --time (e.g. --time "Su 11:00")');
      }
      return { metric, value: findBuildingsMeetingAt(buildings, city, time), city, time };
    }
  }
}
