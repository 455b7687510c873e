import type { Building } from '../../../shared/types/meetinghouse';
import { NO_ADDRESS_DATA } from '../../../shared/types/meetinghouse';
import type { CountryBuildingCount } from '../../../shared/types/stats';

/**
 * A building lacks an address when the field is missing or holds the
 * service's "No Address Data" placeholder.
 */
export function hasAddress(building: Building): boolean {
  return building.address !== undefined && building.address.formatted !== NO_ADDRESS_DATA;
}

/**
 * Country of an addressed building, or null
 */
export function countryOf(building: Building): string | null {
  if (!hasAddress(building)) {
    return null;
  }
  return building.address?.country ?? null;
}

export function countBuildingsWithoutAddress(buildings: Building[]): number {
  return buildings.filter((building) => !hasAddress(building)).length;
}

/**
 * Number of buildings per country, largest first (ties by name).
 * Only buildings with no address or no country are left out; a
 * "No Address Data" placeholder still counts when it names a country.
 */
export function groupBuildingsByCountry(buildings: Building[]): CountryBuildingCount[] {
  const counts = new Map<string, number>();
  for (const building of buildings) {
    const country = building.address?.country;
    if (country === undefined) continue;
    counts.set(country, (counts.get(country) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([country, count]) => ({ country, buildings: count }))
    .sort((a, b) => b.buildings - a.buildings || a.country.localeCompare(b.country));
}
