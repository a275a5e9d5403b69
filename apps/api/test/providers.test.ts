import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CompsAggregator } from '../src/core/compsAggregator.js';
import { NeighborhoodCache } from '../src/core/neighborhoodCache.js';
import {
  fetchDirectComps,
  fetchNeighborhoodComps,
  listNeighborhoods,
  mashvisorComps
} from '../src/providers/mashvisor.js';
import { extractAverageRent, fetchAverageRent, parseRentFigure } from '../src/providers/serpapi.js';
import { searchListings } from '../src/providers/zillow.js';
import type { CompTarget } from '../src/types.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(respond: (url: URL, init?: RequestInit) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (...[input, init]: FetchArgs) => respond(new URL(String(input)), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestedUrl(fetchMock: ReturnType<typeof stubFetch>, call = 0): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

function requestedHeaders(fetchMock: ReturnType<typeof stubFetch>, call = 0): Headers {
  return new Headers(fetchMock.mock.calls[call][1]?.headers);
}

const target: CompTarget = {
  address: '100 Target Ave',
  city: 'Austin',
  state: 'TX',
  zipcode: '78701',
  price: 2_000,
  bedrooms: 3,
  bathrooms: 2,
  squareFeet: 1500
};

beforeEach(() => {
  vi.stubEnv('ZILLOW_API_KEY', 'test-api-key');
  vi.stubEnv('ZILLOW_API_BASE_URL', 'https://zillow.test');
  vi.stubEnv('MASHVISOR_API_KEY', 'test-api-key');
  vi.stubEnv('MASHVISOR_API_BASE_URL', 'https://mashvisor.test/v1.1');
  vi.stubEnv('SERPAPI_KEY', 'test-api-key');
  vi.stubEnv('SERPAPI_BASE_URL', 'https://serp.test');
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
});

describe('Zillow provider', () => {
  it('searches for-sale houses in a city', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ props: [{ zpid: 1, address: '1 Main St, Austin, TX 78701', price: 300_000, bedrooms: 3 }] })
    );

    const result = await searchListings('Austin', 'TX', 80);

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/propertyExtendedSearch');
    expect(url.searchParams.get('location')).toBe('Austin, TX');
    expect(url.searchParams.get('status_type')).toBe('ForSale');
    expect(url.searchParams.get('home_type')).toBe('Houses');
    expect(url.searchParams.get('limit')).toBe('50');
    expect(requestedHeaders(fetchMock).get('X-RapidAPI-Key')).toBe('test-api-key');
    expect(requestedHeaders(fetchMock).get('X-RapidAPI-Host')).toBe('zillow-com1.p.rapidapi.com');

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.items[0]).toMatchObject({ zpid: '1', zipcode: '78701', city: 'Austin', state: 'TX' });
  });

  it('reports a search without matches as empty', async () => {
    stubFetch(() => jsonResponse({ totalResultCount: 0 }));
    expect(await searchListings('Nowhere', 'TX')).toEqual({ status: 'empty' });
  });

  it('fails on an upstream error status', async () => {
    stubFetch(() => new Response('rate limited', { status: 429 }));

    const result = await searchListings('Austin', 'TX');

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(result.error.provider).toBe('zillow');
    expect(result.error.upstreamStatus).toBe(429);
    expect(result.error.message).toBe('zillow request failed (429): rate limited');
  });

  it('fails when the network call throws', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    const result = await searchListings('Austin', 'TX');

    expect(result.status === 'failed' ? result.error.message : undefined).toBe('zillow request failed: fetch failed');
  });

  it('fails without calling out when no key is configured', async () => {
    vi.stubEnv('ZILLOW_API_KEY', '');
    const fetchMock = stubFetch(() => jsonResponse({}));

    const result = await searchListings('Austin', 'TX');

    expect(result.status === 'failed' ? result.error.message : undefined).toBe('ZILLOW_API_KEY is not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('Mashvisor provider', () => {
  it('lists neighborhoods for a city', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        status: 'success',
        content: { results: [{ id: 101, name: 'Downtown' }, { name: 'No id' }] }
      })
    );

    const result = await listNeighborhoods('Austin', 'TX');

    expect(requestedUrl(fetchMock).pathname).toBe('/v1.1/client/city/neighborhoods/TX/Austin');
    expect(requestedHeaders(fetchMock).get('x-api-key')).toBe('test-api-key');
    expect(result).toEqual({ status: 'ok', items: [{ id: '101', name: 'Downtown' }] });
  });

  it('fetches neighborhood listings tagged with the neighborhood', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        status: 'success',
        content: [{ address: '5 Hood Ln', price: 2_100, beds: 3, baths: 2, neighborhood_distance_miles: 1.2 }]
      })
    );

    const result = await fetchNeighborhoodComps({ id: '101', name: 'Downtown' }, 'TX', target);

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/v1.1/client/neighborhood/101/traditional/listing');
    expect(url.searchParams.get('format')).toBe('json');
    expect(url.searchParams.get('state')).toBe('TX');
    expect(result.status === 'ok' ? result.items : []).toMatchObject([
      { address: '5 Hood Ln', price: 2_100, distanceMiles: 1.2, neighborhood: 'Downtown' }
    ]);
  });

  it('filters direct comps by the price band', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        status: 'success',
        content: { content: { comps: [{ address: '1 A St', price: 2_050, beds: 3, baths: 2, distance: 0.4 }] } }
      })
    );

    const result = await fetchDirectComps(target, { minPrice: 1_400, maxPrice: 2_600 });

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/v1.1/client/rento-calculator/list-comps');
    expect(url.searchParams.get('min_price')).toBe('1400');
    expect(url.searchParams.get('max_price')).toBe('2600');
    expect(url.searchParams.get('zip_code')).toBe('78701');
    expect(url.searchParams.get('beds')).toBe('3');
    expect(url.searchParams.has('lat')).toBe(false);
    expect(result.status === 'ok' ? result.items.map((c) => c.address) : []).toEqual(['1 A St']);
  });

  it('fails on an error envelope', async () => {
    stubFetch(() => jsonResponse({ status: 'error', message: 'Invalid state' }));

    const result = await listNeighborhoods('Austin', 'ZZ');

    expect(result.status === 'failed' ? result.error.message : undefined).toBe('mashvisor responded with Invalid state');
  });

  it('reports an empty listing array as empty', async () => {
    stubFetch(() => jsonResponse({ status: 'success', content: { results: [] } }));
    expect(await fetchDirectComps(target, { minPrice: 1_400, maxPrice: 2_600 })).toEqual({ status: 'empty' });
  });
});

describe('Mashvisor rental comps', () => {
  const rentals: Record<string, unknown> = {
    '/v1.1/client/rento-calculator/list-comps': {
      status: 'success',
      content: { comps: [{ address: '1 Elm St', price: 2_100, beds: 3, baths: 2, sqft: 1450, distance: 0.6 }] }
    },
    '/v1.1/client/city/neighborhoods/TX/Austin': {
      status: 'success',
      content: { results: [{ id: 7, name: 'Hyde Park' }] }
    },
    '/v1.1/client/neighborhood/7/traditional/listing': {
      status: 'success',
      content: [
        { address: '2 Elm St', price: 1_950, beds: 3, baths: 2, sqft: 1600, neighborhood_distance_miles: 1.4 },
        { address: '3 Elm St', price: 2_050, beds: 2, baths: 1 }
      ]
    }
  };

  function aggregator() {
    return new CompsAggregator({ provider: mashvisorComps, cache: new NeighborhoodCache() });
  }

  it('ranks rent-priced listings against the monthly rent of the property', async () => {
    const fetchMock = stubFetch((url) => jsonResponse(rentals[url.pathname] ?? { status: 'success', content: [] }));

    const report = await aggregator().aggregate(target);

    const direct = requestedUrl(fetchMock);
    expect(direct.searchParams.get('min_price')).toBe('1400');
    expect(direct.searchParams.get('max_price')).toBe('2600');
    expect(report.comps.map((c) => [c.address, c.source, c.similarityScore, c.rent])).toEqual([
      ['1 Elm St', 'direct', 100, 2_100],
      ['2 Elm St', 'neighborhood', 95, 1_950],
      ['3 Elm St', 'neighborhood', 35, 2_050]
    ]);
    expect(report.diagnostics.rejected['price-out-of-range']).toBe(0);
  });

  it('reports a city the neighborhood path cannot encode as a failed source', async () => {
    stubFetch((url) => jsonResponse(rentals[url.pathname] ?? { status: 'success', content: [] }));

    const report = await aggregator().aggregate({ ...target, city: 'Aus\ud800tin' });

    expect(report.comps.map((c) => c.address)).toEqual(['1 Elm St']);
    expect(report.diagnostics.fallback).toMatchObject({ status: 'failed', error: 'URI malformed' });
  });
});

describe('SerpAPI provider', () => {
  it('parses the first figure in a snippet', () => {
    expect(parseRentFigure('$1,450')).toBe(1450);
    expect(parseRentFigure('1,450 - 1,800 per month')).toBe(1450);
    expect(parseRentFigure('no data')).toBeUndefined();
  });

  it('reads highlighted words before the plain answer', () => {
    expect(
      extractAverageRent({ answer_box: { snippet_highlighted_words: ['about', '$2,100 per month'], answer: '$1,000' } })
    ).toBe(2100);
    expect(extractAverageRent({ answer_box: { answer: '$1,975' } })).toBe(1975);
    expect(extractAverageRent({ organic_results: [] })).toBeUndefined();
  });

  it('asks for the average rent of a ZIP and bedroom count', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ answer_box: { snippet_highlighted_words: ['$1,850'] } }));

    const result = await fetchAverageRent('78701', 3);

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/search.json');
    expect(url.searchParams.get('q')).toBe('average rent for 3 bedroom home in 78701');
    expect(url.searchParams.get('api_key')).toBe('test-api-key');
    expect(result).toEqual({ status: 'ok', items: [1850] });
  });

  it('reports a result page without an answer as empty', async () => {
    stubFetch(() => jsonResponse({ organic_results: [] }));
    expect(await fetchAverageRent('78701', 3)).toEqual({ status: 'empty' });
  });
});
