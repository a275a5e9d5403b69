import { okOrEmpty, type CompsProvider, type PriceBand, type ProviderResult } from '../core/ports.js';
import { getString, isRecord, toCompCandidate, toNeighborhood, type Origin } from '../core/normalize.js';
import { ProviderUnavailableError } from '../errors.js';
import { getEnv } from '../env.js';
import type { CompCandidate, CompTarget, Neighborhood } from '../types.js';
import { buildUrl, getJson, missingKey, type FetchOutcome } from './http.js';

const LISTING_KEYS = ['results', 'properties', 'listings', 'items', 'data', 'comps'] as const;

type Content = { ok: true; content: unknown } | { ok: false; error: ProviderUnavailableError };

/** Mashvisor wraps every payload as `{ status: 'success', content }`. */
function unwrap(outcome: FetchOutcome): Content {
  if (!outcome.ok) return outcome;

  const payload = outcome.data;
  if (!isRecord(payload)) {
    return { ok: false, error: new ProviderUnavailableError('mashvisor', 'mashvisor returned a malformed payload') };
  }

  const status = getString(payload, 'status');
  if (status && status !== 'success') {
    const message = getString(payload, 'message') ?? status;
    return { ok: false, error: new ProviderUnavailableError('mashvisor', `mashvisor responded with ${message}`) };
  }

  return { ok: true, content: payload.content };
}

function getListingArray(content: unknown): unknown[] {
  if (Array.isArray(content)) return content;
  if (!isRecord(content)) return [];

  for (const key of LISTING_KEYS) {
    const value = content[key];
    if (Array.isArray(value)) return value;
  }

  // Some endpoints nest a second `content` object.
  const nested = content.content;
  return isRecord(nested) ? getListingArray(nested) : [];
}

function headers(apiKey: string): Record<string, string> {
  return { 'x-api-key': apiKey, 'Content-Type': 'application/json' };
}

function originOf(target: CompTarget): Origin {
  return { latitude: target.latitude, longitude: target.longitude };
}

async function mashvisorGet(
  pathname: string,
  query: Record<string, string | number | undefined>
): Promise<Content> {
  const env = getEnv();
  if (!env.MASHVISOR_API_KEY) return { ok: false, error: missingKey('mashvisor', 'MASHVISOR_API_KEY') };

  const url = buildUrl(env.MASHVISOR_API_BASE_URL, pathname, query);
  return unwrap(await getJson('mashvisor', url, headers(env.MASHVISOR_API_KEY), env.PROVIDER_TIMEOUT_MS));
}

export async function listNeighborhoods(city: string, state: string): Promise<ProviderResult<Neighborhood>> {
  const res = await mashvisorGet(
    `/client/city/neighborhoods/${encodeURIComponent(state)}/${encodeURIComponent(city)}`,
    {}
  );
  if (!res.ok) return { status: 'failed', error: res.error };

  const hoods = getListingArray(res.content)
    .map(toNeighborhood)
    .filter((n): n is Neighborhood => n !== null);

  return okOrEmpty(hoods);
}

/** Long-term rental listings in one neighborhood. */
export async function fetchNeighborhoodComps(
  neighborhood: Neighborhood,
  state: string,
  target: CompTarget
): Promise<ProviderResult<CompCandidate>> {
  const res = await mashvisorGet(`/client/neighborhood/${encodeURIComponent(neighborhood.id)}/traditional/listing`, {
    format: 'json',
    state
  });
  if (!res.ok) return { status: 'failed', error: res.error };

  const comps = getListingArray(res.content).map((listing) =>
    toCompCandidate(listing, originOf(target), { neighborhood: neighborhood.name })
  );
  return okOrEmpty(comps);
}

/** Comps from the rental calculator, filtered server-side to the price band. */
export async function fetchDirectComps(target: CompTarget, band: PriceBand): Promise<ProviderResult<CompCandidate>> {
  const res = await mashvisorGet('/client/rento-calculator/list-comps', {
    state: target.state,
    city: target.city,
    zip_code: target.zipcode,
    address: target.address,
    beds: target.bedrooms,
    baths: target.bathrooms,
    lat: target.latitude,
    lng: target.longitude,
    min_price: band.minPrice,
    max_price: band.maxPrice,
    resource: 'traditional'
  });
  if (!res.ok) return { status: 'failed', error: res.error };

  const comps = getListingArray(res.content).map((listing) => toCompCandidate(listing, originOf(target)));
  return okOrEmpty(comps);
}

export const mashvisorComps: CompsProvider = {
  name: 'mashvisor',
  fetchDirectComps,
  listNeighborhoods,
  fetchNeighborhoodComps
};
