import type { ProviderName, ProviderUnavailableError } from '../errors.js';
import type { CompCandidate, CompTarget, ListingRecord, Neighborhood } from '../types.js';

export type ProviderResult<T> =
  | { status: 'ok'; items: T[] }
  | { status: 'empty' }
  | { status: 'failed'; error: ProviderUnavailableError };

export function okOrEmpty<T>(items: T[]): ProviderResult<T> {
  return items.length > 0 ? { status: 'ok', items } : { status: 'empty' };
}

export interface PriceBand {
  minPrice: number;
  maxPrice: number;
}

export interface CompsProvider {
  readonly name: ProviderName;
  /** Comps from the price-filtered endpoint. */
  fetchDirectComps(target: CompTarget, band: PriceBand): Promise<ProviderResult<CompCandidate>>;
  listNeighborhoods(city: string, state: string): Promise<ProviderResult<Neighborhood>>;
  fetchNeighborhoodComps(
    neighborhood: Neighborhood,
    state: string,
    target: CompTarget
  ): Promise<ProviderResult<CompCandidate>>;
}

export interface ListingsProvider {
  searchListings(city: string, state: string, maxResults?: number): Promise<ProviderResult<ListingRecord>>;
}

export interface RentProvider {
  /** Average monthly rent for a ZIP code and bedroom count. */
  fetchAverageRent(zipcode: string, bedrooms: number): Promise<ProviderResult<number>>;
}
