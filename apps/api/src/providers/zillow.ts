import { okOrEmpty, type ListingsProvider, type ProviderResult } from '../core/ports.js';
import { isRecord, toListingRecord } from '../core/normalize.js';
import { ProviderUnavailableError } from '../errors.js';
import { getEnv } from '../env.js';
import type { ListingRecord } from '../types.js';
import { buildUrl, getJson, missingKey } from './http.js';

const MAX_LIMIT = 50;

function getPropsArray(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return null;
  const props = payload.props;
  if (Array.isArray(props)) return props;
  const results = payload.results;
  if (Array.isArray(results)) return results;
  // A search with no matches comes back without `props`.
  return [];
}

/** For-sale houses in a city via the RapidAPI Zillow extended search. */
export async function searchListings(
  city: string,
  state: string,
  maxResults = MAX_LIMIT
): Promise<ProviderResult<ListingRecord>> {
  const env = getEnv();
  if (!env.ZILLOW_API_KEY) return { status: 'failed', error: missingKey('zillow', 'ZILLOW_API_KEY') };

  const limit = Math.min(Math.max(Math.floor(maxResults), 1), MAX_LIMIT);
  const url = buildUrl(env.ZILLOW_API_BASE_URL, '/propertyExtendedSearch', {
    location: `${city}, ${state}`,
    status_type: 'ForSale',
    home_type: 'Houses',
    limit
  });

  const outcome = await getJson(
    'zillow',
    url,
    {
      'X-RapidAPI-Key': env.ZILLOW_API_KEY,
      'X-RapidAPI-Host': env.ZILLOW_API_HOST
    },
    env.PROVIDER_TIMEOUT_MS
  );
  if (!outcome.ok) return { status: 'failed', error: outcome.error };

  const props = getPropsArray(outcome.data);
  if (!props) {
    return { status: 'failed', error: new ProviderUnavailableError('zillow', 'zillow returned a malformed payload') };
  }

  return okOrEmpty(props.slice(0, limit).map(toListingRecord));
}

export const zillowListings: ListingsProvider = { searchListings };
