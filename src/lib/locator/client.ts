/**
 * Meetinghouse locator client
 *
 * Pages through the locator's identify endpoint and merges the pages into a
 * single building list. Any failure aborts the fetch; there is no retry.
 */

import type { Building, LocatorQuery } from '../../../shared/types/meetinghouse';
import { DEFAULT_LOCATOR_QUERY } from '../../../shared/types/meetinghouse';
import {
  DEFAULT_LOCATOR_BASE_URL,
  DEFAULT_LOCATOR_REFERER,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
} from '../config';
import { LocatorRequestError, errorMessage } from '../errors';
import { describeIssues } from '../snapshot/issues';
import { safeValidateBuildings } from '../snapshot/schema';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface LocatorClientOptions {
  baseUrl?: string;
  referer?: string;
  pageSize?: number;
  maxPages?: number;
  fetchFn?: FetchFn;
  log?: (message: string) => void;
  warn?: (message: string) => void;
}

type ResolvedOptions = Required<LocatorClientOptions>;

function resolveOptions(options: LocatorClientOptions): ResolvedOptions {
  return {
    baseUrl: options.baseUrl ?? DEFAULT_LOCATOR_BASE_URL,
    referer: options.referer ?? DEFAULT_LOCATOR_REFERER,
    pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
    maxPages: options.maxPages ?? DEFAULT_MAX_PAGES,
    fetchFn: options.fetchFn ?? ((input, init) => fetch(input, init)),
    log: options.log ?? (() => undefined),
    warn: options.warn ?? (() => undefined),
  };
}

/**
 * Build the request URL for one page
 */
export function buildPageUrl(
  baseUrl: string,
  query: LocatorQuery,
  offset: number,
  pageSize: number
): string {
  const params = new URLSearchParams({
    layers: query.layers,
    filters: query.filters,
    associated: query.associated,
    coordinates: query.coordinates,
    nearest: String(pageSize),
    offset: String(offset),
  });

  return `${baseUrl}?${params.toString()}`;
}

/**
 * Fetch one page of buildings
 *
 * @throws LocatorRequestError on network failure, non-2xx status, or a body
 *   that is not a list of buildings
 */
export async function fetchPage(
  query: LocatorQuery,
  offset: number,
  options: LocatorClientOptions = {}
): Promise<Building[]> {
  const opts = resolveOptions(options);
  const url = buildPageUrl(opts.baseUrl, query, offset, opts.pageSize);

  let response: Response;
  try {
    response = await opts.fetchFn(url, {
      headers: {
        Accept: 'application/json',
        Referer: opts.referer,
      },
    });
  } catch (error) {
    throw new LocatorRequestError(
      `Request failed: ${errorMessage(error)}`,
      0,
      url,
      { cause: error }
    );
  }

  if (!response.ok) {
    throw new LocatorRequestError(
      `HTTP ${response.status}: ${response.statusText}`,
      response.status,
      url
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new LocatorRequestError(
      `Response is not valid JSON: ${errorMessage(error)}`,
      response.status,
      url,
      { cause: error }
    );
  }

  const result = safeValidateBuildings(body);
  if (!result.success) {
    throw new LocatorRequestError(
      `Response is not a list of buildings: ${describeIssues(result.error)}`,
      response.status,
      url,
      { cause: result.error }
    );
  }

  return result.data;
}

/**
 * Fetch every building in scope, page by page
 *
 * Buildings are keyed by id; the first occurrence wins and arrival order is
 * kept. Paging stops on an empty page, a short page, a page that adds no new
 * ids, or after `maxPages` requests.
 */
export async function fetchAllBuildings(
  query: LocatorQuery = DEFAULT_LOCATOR_QUERY,
  options: LocatorClientOptions = {}
): Promise<Building[]> {
  const opts = resolveOptions(options);
  const buildings = new Map<string, Building>();
  let offset = 0;

  for (let page = 1; page <= opts.maxPages; page++) {
    opts.log(`  Fetching records ${offset} to ${offset + opts.pageSize}...`);
    const records = await fetchPage(query, offset, opts);

    if (records.length === 0) {
      return [...buildings.values()];
    }

    let added = 0;
    for (const building of records) {
      if (!buildings.has(building.id)) {
        buildings.set(building.id, building);
        added++;
      }
    }

    opts.log(`  ✓ Fetched ${records.length} buildings (${added} new, total: ${buildings.size})`);

    if (added === 0 || records.length < opts.pageSize) {
      return [...buildings.values()];
    }

    offset += opts.pageSize;
  }

  opts.warn(`  Warning: stopped after ${opts.maxPages} pages; snapshot may be incomplete`);
  return [...buildings.values()];
}
