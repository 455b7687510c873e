import type { Position } from 'geojson';

// ============================================================================
// Locator Records
// ============================================================================

/**
 * Postal address attached to a building by the locator service
 */
export interface Address {
  street1?: string;
  street2?: string;
  city?: string;
  county?: string;
  state?: string;
  stateCode?: string;
  postalCode?: string;
  country?: string;
  countryCode2?: string;
  countryCode3?: string;
  formatted?: string;
  lines?: string[];
}

/**
 * Floor or lot area. The service reports square metres.
 */
export interface Size {
  value?: number;
  type?: string;
  display?: string;
}

export interface MeetingHours {
  code: string; // e.g. "Su 09:00, Su 11:00"
}

/**
 * A congregation (ward or branch) meeting in a building.
 *
 * `type` and `subType` are opaque tags ("WARD", "BRANCH", "WARD__ENGLISH",
 * "YSA", ...). Nothing should be inferred from their spelling.
 */
export interface Unit {
  id: string;
  type: string;
  subType?: string;
  name?: string;
  hours?: MeetingHours;
  [field: string]: unknown;
}

/**
 * A meetinghouse. Fields the service sends beyond these are kept as-is.
 */
export interface Building {
  id: string;
  type?: string;
  name?: string;
  address?: Address;
  coordinates?: Position; // [lon, lat]
  associated?: Unit[];
  interiorSize?: Size;
  propertySize?: Size;
  [field: string]: unknown;
}

/**
 * A unit together with the building it belongs to
 */
export interface UnitRecord {
  buildingId: string;
  unit: Unit;
}

// ============================================================================
// Locator Query
// ============================================================================

/**
 * Scope of a locator request. Values are sent as query parameters.
 */
export interface LocatorQuery {
  layers: string;
  filters: string;
  associated: string;
  coordinates: string; // "lat,lon" origin for the nearest-N search
}

export const DEFAULT_LOCATOR_QUERY: LocatorQuery = {
  layers: 'MEETINGHOUSE',
  filters: '',
  associated: 'WARDS',
  coordinates: '0,0',
};

/**
 * Sentinel the service puts in `address.formatted` when it has no address
 */
export const NO_ADDRESS_DATA = 'No Address Data';
