import type { Building } from '../../../shared/types/meetinghouse';
import type { CountrySize, SizeByCountry } from '../../../shared/types/stats';
import { countryOf } from './address';

const SQ_FT_PER_SQ_M = 10.7639;

/**
 * Average interior size per country, largest first
 *
 * Sizes are in square metres as reported by the service. Buildings without
 * a country or either size are skipped (one building may be counted under
 * several of those reasons); so are buildings whose interior is zero or
 * larger than the lot.
 */
export function averageSizeByCountry(buildings: Building[]): SizeByCountry {
  const skipped = {
    noAddress: 0,
    noInteriorSize: 0,
    noPropertySize: 0,
    interiorExceedsProperty: 0,
    zeroSize: 0,
  };
  const totals = new Map<string, { totalSizeSqM: number; count: number }>();
  let globalTotal = 0;
  let globalCount = 0;

  for (const building of buildings) {
    const country = countryOf(building);
    const interior = building.interiorSize?.value;
    const property = building.propertySize?.value;

    if (country === null) skipped.noAddress++;
    if (interior === undefined) skipped.noInteriorSize++;
    if (property === undefined) skipped.noPropertySize++;
    if (country === null || interior === undefined || property === undefined) continue;

    if (interior > property) {
      skipped.interiorExceedsProperty++;
      continue;
    }
    if (interior === 0) {
      skipped.zeroSize++;
      continue;
    }

    const entry = totals.get(country) ?? { totalSizeSqM: 0, count: 0 };
    entry.totalSizeSqM += interior;
    entry.count++;
    totals.set(country, entry);

    globalTotal += interior;
    globalCount++;
  }

  const countries: CountrySize[] = [...totals.entries()]
    .map(([country, { totalSizeSqM, count }]) => ({
      country,
      totalSizeSqM,
      count,
      avgSizeSqM: Math.floor(totalSizeSqM / count),
      avgSizeSqFt: Math.floor((totalSizeSqM / count) * SQ_FT_PER_SQ_M),
    }))
    .sort((a, b) => b.avgSizeSqM - a.avgSizeSqM || a.country.localeCompare(b.country));

  const globalAvgSizeSqM = globalCount > 0 ? Math.floor(globalTotal / globalCount) : 0;

  return {
    countries,
    globalAvgSizeSqM,
    globalAvgSizeSqFt: Math.floor(globalAvgSizeSqM * SQ_FT_PER_SQ_M),
    skipped,
  };
}
