import type { PropertyFeatures } from '../types.js';

export const MAX_SCORE = 100;

/**
 * Relative deviation |candidate - target| / target, or null when the target
 * (or a zero candidate for optional features) leaves the feature unknown.
 */
function deviation(target: number, candidate: number, { zeroIsUnknown = false } = {}): number | null {
  if (!(target > 0)) return null;
  if (zeroIsUnknown && !(candidate > 0)) return null;
  return Math.abs(candidate - target) / target;
}

function bedroomPoints(target: number, candidate: number): number {
  const diff = Math.abs(candidate - target);
  if (diff === 0) return 25;
  if (diff === 1) return 15;
  return 0;
}

function bathroomPoints(target: number, candidate: number): number {
  const diff = Math.abs(candidate - target);
  if (diff === 0) return 20;
  if (diff <= 0.5) return 15;
  return 0;
}

function pricePoints(target: number, candidate: number): number {
  const dev = deviation(target, candidate);
  if (dev === null) return 0;
  if (dev <= 0.1) return 20;
  if (dev <= 0.2) return 15;
  return 0;
}

// A comp with no location data earns no distance points.
function distancePoints(distanceMiles: number | undefined): number {
  if (distanceMiles === undefined || !Number.isFinite(distanceMiles) || distanceMiles < 0) return 0;
  if (distanceMiles < 1) return 20;
  if (distanceMiles < 2) return 15;
  if (distanceMiles < 5) return 10;
  return 0;
}

function squareFeetPoints(target: number, candidate: number): number {
  const dev = deviation(target, candidate, { zeroIsUnknown: true });
  if (dev === null) return 0;
  if (dev <= 0.1) return 15;
  if (dev <= 0.2) return 12;
  return 0;
}

export interface SimilarityBreakdown {
  bedrooms: number;
  bathrooms: number;
  price: number;
  distance: number;
  squareFeet: number;
}

export function scoreBreakdown(target: PropertyFeatures, candidate: PropertyFeatures): SimilarityBreakdown {
  return {
    bedrooms: bedroomPoints(target.bedrooms, candidate.bedrooms),
    bathrooms: bathroomPoints(target.bathrooms, candidate.bathrooms),
    price: pricePoints(target.price, candidate.price),
    distance: distancePoints(candidate.distanceMiles),
    squareFeet: squareFeetPoints(target.squareFeet, candidate.squareFeet)
  };
}

/**
 * Weighted similarity of `candidate` to `target` in [0, 100].
 *
 * Weights: bedrooms 25, bathrooms 20, price 20, distance 20, square feet 15.
 * Deviations are absolute, so the score does not depend on whether the
 * candidate is larger or smaller than the target.
 */
export function scoreSimilarity(target: PropertyFeatures, candidate: PropertyFeatures): number {
  const parts = scoreBreakdown(target, candidate);
  const total = parts.bedrooms + parts.bathrooms + parts.price + parts.distance + parts.squareFeet;
  return Math.min(MAX_SCORE, Math.max(0, total));
}
