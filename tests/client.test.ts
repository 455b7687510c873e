import { describe, expect, it, vi } from 'vitest';
import type { Building } from '../shared/types/meetinghouse';
import { DEFAULT_LOCATOR_QUERY } from '../shared/types/meetinghouse';
import { LocatorRequestError } from '../src/lib/errors';
import { buildPageUrl, fetchAllBuildings, fetchPage } from '../src/lib/locator/client';

const BASE_URL = 'https://locator.test/identify';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function building(id: string, name = `Building ${id}`): Building {
  return { id, name, associated: [{ id: `${id}-unit`, type: 'WARD' }] };
}

function offsetOf(url: string): number {
  return Number(new URL(url).searchParams.get('offset'));
}

/**
 * Fake locator serving `pages[offset / pageSize]`, or an empty page past the end
 */
function pagedFetch(pages: Building[][], pageSize: number) {
  return vi.fn(async (url: string) => jsonResponse(pages[offsetOf(url) / pageSize] ?? []));
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}

describe('buildPageUrl', () => {
  it('encodes the query scope, page size and offset', () => {
    expect(buildPageUrl(BASE_URL, DEFAULT_LOCATOR_QUERY, 200, 100)).toBe(
      'https://locator.test/identify?layers=MEETINGHOUSE&filters=&associated=WARDS&coordinates=0%2C0&nearest=100&offset=200'
    );
  });
});

describe('fetchPage', () => {
  it('sends JSON accept and referer headers', async () => {
    const fetchFn = vi.fn(async () => jsonResponse([building('a')]));

    await fetchPage(DEFAULT_LOCATOR_QUERY, 0, {
      baseUrl: BASE_URL,
      referer: 'https://locator.test/',
      pageSize: 10,
      fetchFn,
    });

    expect(fetchFn).toHaveBeenCalledWith(
      'https://locator.test/identify?layers=MEETINGHOUSE&filters=&associated=WARDS&coordinates=0%2C0&nearest=10&offset=0',
      { headers: { Accept: 'application/json', Referer: 'https://locator.test/' } }
    );
  });

  it('keeps fields it does not model', async () => {
    const fetchFn = vi.fn(async () =>
      jsonResponse([{ id: 'a', timeZone: { id: 'America/Boise' }, specialized: false }])
    );

    const [record] = await fetchPage(DEFAULT_LOCATOR_QUERY, 0, { baseUrl: BASE_URL, fetchFn });

    expect(record).toEqual({ id: 'a', timeZone: { id: 'America/Boise' }, specialized: false });
  });

  it('throws LocatorRequestError on a non-2xx status', async () => {
    const fetchFn = vi.fn(
      async () => new Response('busy', { status: 503, statusText: 'Service Unavailable' })
    );

    const error = await captureError(fetchPage(DEFAULT_LOCATOR_QUERY, 0, { baseUrl: BASE_URL, fetchFn }));

    expect(error).toBeInstanceOf(LocatorRequestError);
    if (error instanceof LocatorRequestError) {
      expect(error.message).toBe('HTTP 503: Service Unavailable');
      expect(error.statusCode).toBe(503);
      expect(offsetOf(error.url)).toBe(0);
    }
  });

  it('wraps network failures with status 0 and the cause', async () => {
    const cause = new Error('getaddrinfo ENOTFOUND locator.test');
    const fetchFn = vi.fn(async () => {
      throw cause;
    });

    const error = await captureError(fetchPage(DEFAULT_LOCATOR_QUERY, 0, { baseUrl: BASE_URL, fetchFn }));

    expect(error).toBeInstanceOf(LocatorRequestError);
    if (error instanceof LocatorRequestError) {
      expect(error.statusCode).toBe(0);
      expect(error.message).toBe('Request failed: getaddrinfo ENOTFOUND locator.test');
      expect(error.cause).toBe(cause);
    }
  });

  it('rejects a body that is not JSON', async () => {
    const fetchFn = vi.fn(async () => new Response('<html>maintenance</html>', { status: 200 }));

    await expect(
      fetchPage(DEFAULT_LOCATOR_QUERY, 0, { baseUrl: BASE_URL, fetchFn })
    ).rejects.toThrow('Response is not valid JSON');
  });

  it('rejects a body that is not a list of buildings', async () => {
    const fetchFn = vi.fn(async () => jsonResponse({ error: 'bad layer' }));

    await expect(
      fetchPage(DEFAULT_LOCATOR_QUERY, 0, { baseUrl: BASE_URL, fetchFn })
    ).rejects.toThrow('Response is not a list of buildings');
  });
});

describe('fetchAllBuildings', () => {
  it('stops after a short first page', async () => {
    const fetchFn = pagedFetch([[building('a'), building('b')]], 3);

    const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 3,
      fetchFn,
    });

    expect(buildings.map((b) => b.id)).toEqual(['a', 'b']);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('follows full pages until an empty page', async () => {
    const fetchFn = pagedFetch(
      [
        [building('a'), building('b')],
        [building('c'), building('d')],
      ],
      2
    );

    const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 2,
      fetchFn,
    });

    expect(buildings.map((b) => b.id)).toEqual(['a', 'b', 'c', 'd']);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fetchFn.mock.calls.map(([url]) => offsetOf(url))).toEqual([0, 2, 4]);
  });

  it('stops on a short final page', async () => {
    const fetchFn = pagedFetch([[building('a'), building('b')], [building('c')]], 2);

    const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 2,
      fetchFn,
    });

    expect(buildings.map((b) => b.id)).toEqual(['a', 'b', 'c']);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('keeps the first copy of a building repeated across pages', async () => {
    const fetchFn = pagedFetch(
      [
        [building('a'), building('b', 'first')],
        [building('b', 'second'), building('c')],
      ],
      2
    );

    const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 2,
      fetchFn,
    });

    expect(buildings.map((b) => b.id)).toEqual(['a', 'b', 'c']);
    expect(buildings[1].name).toBe('first');
  });

  it('stops when the service ignores the offset', async () => {
    const fetchFn = vi.fn(async () => jsonResponse([building('a'), building('b')]));

    const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 2,
      fetchFn,
    });

    expect(buildings.map((b) => b.id)).toEqual(['a', 'b']);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('stops after maxPages and reports it as a warning', async () => {
    const fetchFn = vi.fn(async (url: string) => {
      const offset = offsetOf(url);
      return jsonResponse([building(`x${offset}`), building(`x${offset + 1}`)]);
    });
    const log = vi.fn();
    const warn = vi.fn();

    const buildings = await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 2,
      maxPages: 3,
      fetchFn,
      log,
      warn,
    });

    expect(buildings).toHaveLength(6);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '  Warning: stopped after 3 pages; snapshot may be incomplete'
    );
    expect(log).toHaveBeenLastCalledWith('  ✓ Fetched 2 buildings (2 new, total: 6)');
  });

  it('does not warn when paging finishes normally', async () => {
    const warn = vi.fn();

    await fetchAllBuildings(DEFAULT_LOCATOR_QUERY, {
      baseUrl: BASE_URL,
      pageSize: 3,
      fetchFn: pagedFetch([[building('a')]], 3),
      warn,
    });

    expect(warn).not.toHaveBeenCalled();
  });

  it('aborts the whole fetch when a later page fails', async () => {
    const fetchFn = vi.fn(async (url: string) =>
      offsetOf(url) === 0
        ? jsonResponse([building('a'), building('b')])
        : new Response('', { status: 500, statusText: 'Internal Server Error' })
    );

    await expect(
      fetchAllBuildings(DEFAULT_LOCATOR_QUERY, { baseUrl: BASE_URL, pageSize: 2, fetchFn })
    ).rejects.toThrow('HTTP 500: Internal Server Error');
  });
});
