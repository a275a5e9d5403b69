import { CompsAggregator, type CompsReport } from '../core/compsAggregator.js';
import { RentResolver, analyzeListings } from '../core/dscr.js';
import { NeighborhoodCache } from '../core/neighborhoodCache.js';
import { getEnv } from '../env.js';
import { createLogger } from '../logger.js';
import { mashvisorComps } from '../providers/mashvisor.js';
import { serpApiRents } from '../providers/serpapi.js';
import { zillowListings } from '../providers/zillow.js';
import type { CompTarget, PropertyResult, SearchCriteria } from '../types.js';

const log = createLogger('analysis');

const LISTING_SEARCH_LIMIT = 50;

let aggregator: CompsAggregator | undefined;

/** Process-wide aggregator; its neighborhood cache is shared by every request. */
function getCompsAggregator(): CompsAggregator {
  if (!aggregator) {
    const env = getEnv();
    aggregator = new CompsAggregator({
      provider: mashvisorComps,
      cache: new NeighborhoodCache(env.NEIGHBORHOOD_CACHE_MAX_ENTRIES)
    });
  }
  return aggregator;
}

export function findComps(target: CompTarget, maxResults?: number): Promise<CompsReport> {
  return getCompsAggregator().aggregate(target, { maxResults });
}

/**
 * DSCR search for a city. Throws the provider's error when the listing search
 * itself fails; a failed market-rent lookup only drops that listing.
 */
export async function searchProperties(criteria: SearchCriteria): Promise<PropertyResult[]> {
  log.info({ city: criteria.city, state: criteria.state }, 'searching properties');

  const listings = await zillowListings.searchListings(criteria.city, criteria.state, LISTING_SEARCH_LIMIT);
  if (listings.status === 'failed') throw listings.error;
  if (listings.status === 'empty') return [];

  const results = await analyzeListings(listings.items, criteria, new RentResolver(serpApiRents));
  log.info({ fetched: listings.items.length, qualifying: results.length }, 'processed listings');
  return results;
}
