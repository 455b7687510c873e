/**
 * Result shapes produced by the snapshot analyses
 */

export const UNIT_COUNT_BUCKETS = ['0', '1', '2', '3', '4+'] as const;

export type UnitCountBucket = (typeof UNIT_COUNT_BUCKETS)[number];

/** Tag → count pairs, largest count first */
export type CountTable = Array<[key: string, count: number]>;

export interface UnitsPerBuilding {
  totalBuildings: number;
  /** Exact number of units → number of buildings with that many */
  histogram: Record<number, number>;
  buckets: Record<UnitCountBucket, number>;
}

export interface CountryUnitCounts {
  buildings: number;
  units: number;
  buildingsWithNoUnits: number;
}

export interface UnitTypeSummary {
  totalUnits: number;
  distinctTypes: number;
  buildingsWithNoUnits: number;
  buildingsWithoutAddress: number;
  buildingsWithoutAddressButUnits: number;
  countryCount: number;
  byType: CountTable;
  bySubType: CountTable;
  byCountry: Record<string, CountryUnitCounts>;
}

export interface CountryBuildingCount {
  country: string;
  buildings: number;
}

export interface CountrySize {
  country: string;
  totalSizeSqM: number;
  count: number;
  avgSizeSqM: number;
  avgSizeSqFt: number;
}

export interface SizeByCountry {
  countries: CountrySize[];
  globalAvgSizeSqM: number;
  globalAvgSizeSqFt: number;
  skipped: {
    noAddress: number;
    noInteriorSize: number;
    noPropertySize: number;
    interiorExceedsProperty: number;
    zeroSize: number;
  };
}

export interface MeetingTimeMatch {
  buildingId: string;
  name: string | null;
  address: string | null;
  units: string[];
}

export interface AnalysisSummary {
  totalBuildings: number;
  totalUnits: number;
  buildingsWithoutAddress: number;
  unitsPerBuilding: UnitsPerBuilding;
  unitTypes: UnitTypeSummary;
}
