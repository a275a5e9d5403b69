import { errorMessage, InvalidInputError, ProviderUnavailableError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { CompCandidate, CompSource, CompTarget, Neighborhood, PropertyFeatures, ScoredComp } from '../types.js';
import { explainRejection, type RejectionReason } from './comparableFilter.js';
import type { NeighborhoodCache } from './neighborhoodCache.js';
import { normalizeAddressKey, toTargetFeatures } from './normalize.js';
import type { CompsProvider, PriceBand, ProviderResult } from './ports.js';
import { scoreSimilarity } from './similarity.js';

export const DEFAULT_MAX_RESULTS = 15;
export const MAX_NEIGHBORHOODS_SCANNED = 5;
export const NEIGHBORHOOD_COMP_TARGET = 10;

const PRICE_BAND_LOW = 0.7;
const PRICE_BAND_HIGH = 1.3;

const SOURCE_PRIORITY: Record<CompSource, number> = {
  direct: 0,
  neighborhood: 1
};

export type RejectionCounts = Record<RejectionReason, number>;

export interface RankingStats {
  seen: number;
  accepted: number;
  duplicates: number;
  rejected: RejectionCounts;
}

export interface RankingResult {
  comps: ScoredComp[];
  stats: RankingStats;
}

function emptyRejections(): RejectionCounts {
  return {
    'missing-address': 0,
    'invalid-price': 0,
    'price-out-of-range': 0,
    'bedrooms-out-of-range': 0,
    'bathrooms-out-of-range': 0
  };
}

function resolveLimit(maxResults: number): number {
  if (!Number.isFinite(maxResults)) return DEFAULT_MAX_RESULTS;
  return Math.max(0, Math.floor(maxResults));
}

/**
 * Filter, dedup, score, sort and truncate both candidate lists. Primary
 * candidates are discovered before fallback ones, so on a duplicate address
 * the primary record wins.
 */
export function rankComparablesWithStats(
  target: PropertyFeatures,
  primary: readonly CompCandidate[],
  fallback: readonly CompCandidate[],
  maxResults = DEFAULT_MAX_RESULTS
): RankingResult {
  const stats: RankingStats = { seen: 0, accepted: 0, duplicates: 0, rejected: emptyRejections() };
  const seenAddresses = new Set<string>();
  const ranked: Array<{ comp: ScoredComp; order: number }> = [];

  const discovered: Array<[CompCandidate, CompSource]> = [
    ...primary.map((c): [CompCandidate, CompSource] => [c, 'direct']),
    ...fallback.map((c): [CompCandidate, CompSource] => [c, 'neighborhood'])
  ];

  for (const [candidate, source] of discovered) {
    stats.seen += 1;

    const reason = explainRejection(target, candidate);
    if (reason) {
      stats.rejected[reason] += 1;
      continue;
    }

    const key = normalizeAddressKey(candidate.address);
    if (seenAddresses.has(key)) {
      stats.duplicates += 1;
      continue;
    }
    seenAddresses.add(key);

    stats.accepted += 1;
    ranked.push({
      comp: Object.freeze({ ...candidate, similarityScore: scoreSimilarity(target, candidate), source }),
      order: ranked.length
    });
  }

  ranked.sort(
    (a, b) =>
      b.comp.similarityScore - a.comp.similarityScore ||
      SOURCE_PRIORITY[a.comp.source] - SOURCE_PRIORITY[b.comp.source] ||
      a.order - b.order
  );

  return { comps: ranked.slice(0, resolveLimit(maxResults)).map((r) => r.comp), stats };
}

export function rankComparables(
  target: PropertyFeatures,
  primary: readonly CompCandidate[],
  fallback: readonly CompCandidate[],
  maxResults = DEFAULT_MAX_RESULTS
): ScoredComp[] {
  return rankComparablesWithStats(target, primary, fallback, maxResults).comps;
}

export function priceBandFor(price: number): PriceBand {
  return {
    minPrice: Math.floor(price * PRICE_BAND_LOW),
    maxPrice: Math.ceil(price * PRICE_BAND_HIGH)
  };
}

function validateTarget(target: CompTarget): void {
  if (typeof target.address !== 'string' || target.address.trim().length === 0) {
    throw new InvalidInputError('Target property is missing an address', 'address');
  }
  if (typeof target.price !== 'number' || !Number.isFinite(target.price) || target.price <= 0) {
    throw new InvalidInputError('Target property price must be greater than 0', 'price');
  }
  if (!Number.isFinite(target.bedrooms) || target.bedrooms < 0) {
    throw new InvalidInputError('Target property bedrooms must be 0 or more', 'bedrooms');
  }
  if (!Number.isFinite(target.bathrooms) || target.bathrooms < 0) {
    throw new InvalidInputError('Target property bathrooms must be 0 or more', 'bathrooms');
  }
}

export type SourceStatus = ProviderResult<unknown>['status'] | 'skipped';

export interface SourceDiagnostics {
  status: SourceStatus;
  candidates: number;
  error?: string;
}

export interface FallbackDiagnostics extends SourceDiagnostics {
  neighborhoodsAvailable: number;
  neighborhoodsScanned: number;
  failedCalls: number;
}

export interface CompsDiagnostics {
  primary: SourceDiagnostics;
  fallback: FallbackDiagnostics;
  priceBand: PriceBand;
  accepted: number;
  duplicates: number;
  rejected: RejectionCounts;
  reasons: string[];
}

export interface CompsReport {
  comps: ScoredComp[];
  diagnostics: CompsDiagnostics;
}

export interface CompsAggregatorDeps {
  provider: CompsProvider;
  cache: NeighborhoodCache;
  logger?: Logger;
}

export interface AggregateOptions {
  maxResults?: number;
}

export class CompsAggregator {
  private readonly provider: CompsProvider;
  private readonly cache: NeighborhoodCache;
  private readonly log: Logger;

  constructor(deps: CompsAggregatorDeps) {
    this.provider = deps.provider;
    this.cache = deps.cache;
    this.log = deps.logger ?? createLogger('comps');
  }

  async aggregate(target: CompTarget, options: AggregateOptions = {}): Promise<CompsReport> {
    validateTarget(target);

    const maxResults = resolveLimit(options.maxResults ?? DEFAULT_MAX_RESULTS);
    const band = priceBandFor(target.price);

    const primaryResult = await this.settle(() => this.provider.fetchDirectComps(target, band));
    const primary = this.describe('direct', primaryResult);
    const primaryItems = primaryResult.status === 'ok' ? primaryResult.items : [];

    let fallbackItems: CompCandidate[] = [];
    let fallback: FallbackDiagnostics = {
      status: 'skipped',
      candidates: 0,
      neighborhoodsAvailable: 0,
      neighborhoodsScanned: 0,
      failedCalls: 0
    };

    if (primaryItems.length < maxResults) {
      const scan = await this.scanNeighborhoods(target);
      fallbackItems = scan.items;
      fallback = scan.diagnostics;
    }

    const { comps, stats } = rankComparablesWithStats(
      toTargetFeatures(target),
      primaryItems,
      fallbackItems,
      maxResults
    );

    const diagnostics: CompsDiagnostics = {
      primary,
      fallback,
      priceBand: band,
      accepted: stats.accepted,
      duplicates: stats.duplicates,
      rejected: stats.rejected,
      reasons: comps.length === 0 ? explainEmpty(target, primary, fallback, stats) : []
    };

    this.log.info(
      {
        address: target.address,
        primary: primary.status,
        fallback: fallback.status,
        seen: stats.seen,
        returned: comps.length
      },
      comps.length === 0 ? 'no comps found' : 'comps ranked'
    );

    return { comps, diagnostics };
  }

  /** An adapter that throws counts as a failed call, not an aborted request. */
  private async settle<T>(call: () => Promise<ProviderResult<T>>): Promise<ProviderResult<T>> {
    try {
      return await call();
    } catch (err) {
      return {
        status: 'failed',
        error: new ProviderUnavailableError(this.provider.name, errorMessage(err), { cause: err })
      };
    }
  }

  private describe(source: CompSource, result: ProviderResult<CompCandidate>): SourceDiagnostics {
    if (result.status === 'failed') {
      this.log.warn({ source, provider: result.error.provider, error: result.error.message }, 'comp source failed');
      return { status: 'failed', candidates: 0, error: result.error.message };
    }
    return { status: result.status, candidates: result.status === 'ok' ? result.items.length : 0 };
  }

  private async scanNeighborhoods(
    target: CompTarget
  ): Promise<{ items: CompCandidate[]; diagnostics: FallbackDiagnostics }> {
    const diagnostics: FallbackDiagnostics = {
      status: 'empty',
      candidates: 0,
      neighborhoodsAvailable: 0,
      neighborhoodsScanned: 0,
      failedCalls: 0
    };

    if (!target.city?.trim() || !target.state?.trim()) {
      return { items: [], diagnostics: { ...diagnostics, status: 'skipped', error: 'city and state are required' } };
    }

    const hoods = await this.cache.getOrLoad(target.city, target.state, () =>
      this.settle(() => this.provider.listNeighborhoods(target.city, target.state))
    );

    if (hoods.status === 'failed') {
      this.log.warn({ city: target.city, state: target.state, error: hoods.error.message }, 'neighborhood lookup failed');
      return { items: [], diagnostics: { ...diagnostics, status: 'failed', error: hoods.error.message } };
    }
    if (hoods.status === 'empty') {
      return { items: [], diagnostics };
    }

    diagnostics.neighborhoodsAvailable = hoods.items.length;

    const items: CompCandidate[] = [];
    let lastError: string | undefined;

    for (const hood of hoods.items.slice(0, MAX_NEIGHBORHOODS_SCANNED)) {
      const result = await this.fetchNeighborhood(hood, target);
      diagnostics.neighborhoodsScanned += 1;

      if (result.status === 'failed') {
        diagnostics.failedCalls += 1;
        lastError = result.error.message;
        continue;
      }
      if (result.status === 'ok') items.push(...result.items);

      if (items.length >= NEIGHBORHOOD_COMP_TARGET) break;
    }

    diagnostics.candidates = items.length;
    if (items.length > 0) {
      diagnostics.status = 'ok';
    } else if (diagnostics.failedCalls === diagnostics.neighborhoodsScanned) {
      diagnostics.status = 'failed';
      diagnostics.error = lastError;
    }

    return { items, diagnostics };
  }

  private async fetchNeighborhood(hood: Neighborhood, target: CompTarget): Promise<ProviderResult<CompCandidate>> {
    const result = await this.settle(() => this.provider.fetchNeighborhoodComps(hood, target.state, target));
    if (result.status === 'failed') {
      this.log.warn({ neighborhood: hood.name, id: hood.id, error: result.error.message }, 'neighborhood comps failed');
    }
    return result;
  }
}

function explainEmpty(
  target: CompTarget,
  primary: SourceDiagnostics,
  fallback: FallbackDiagnostics,
  stats: RankingStats
): string[] {
  const reasons: string[] = [];

  if (primary.status === 'failed') reasons.push('The direct comps search is unavailable right now.');
  else if (primary.status === 'empty') reasons.push('The direct comps search returned no listings in this price range.');

  if (fallback.status === 'failed') {
    reasons.push('The neighborhood search is unavailable right now.');
  } else if (fallback.status === 'skipped' && fallback.error) {
    reasons.push('A city and state are needed to search neighborhoods.');
  } else if (fallback.neighborhoodsAvailable === 0 && fallback.status !== 'skipped') {
    reasons.push(`No neighborhoods were found for ${target.city}, ${target.state}.`);
  }

  const rejected = stats.seen - stats.accepted - stats.duplicates;
  if (rejected > 0) {
    reasons.push(
      `${rejected} listing(s) were outside the bedroom, bathroom or price range of this property.`
    );
  }

  if (stats.seen === 0) reasons.push('Limited rental data in this area.');

  return reasons;
}
