import type { PropertyFeatures } from '../types.js';

export type RejectionReason =
  | 'missing-address'
  | 'invalid-price'
  | 'price-out-of-range'
  | 'bedrooms-out-of-range'
  | 'bathrooms-out-of-range';

const MIN_PRICE_RATIO = 0.5;
const MAX_PRICE_RATIO = 2.0;
const ROOM_TOLERANCE = 1;

/** First rule the candidate breaks, or null when it is an acceptable comp. */
export function explainRejection(target: PropertyFeatures, candidate: PropertyFeatures): RejectionReason | null {
  if (typeof candidate.address !== 'string' || candidate.address.trim().length === 0) {
    return 'missing-address';
  }

  if (!Number.isFinite(candidate.price) || candidate.price <= 0) return 'invalid-price';
  if (candidate.price < target.price * MIN_PRICE_RATIO || candidate.price > target.price * MAX_PRICE_RATIO) {
    return 'price-out-of-range';
  }

  if (!(Math.abs(candidate.bedrooms - target.bedrooms) <= ROOM_TOLERANCE)) return 'bedrooms-out-of-range';
  if (!(Math.abs(candidate.bathrooms - target.bathrooms) <= ROOM_TOLERANCE)) return 'bathrooms-out-of-range';

  return null;
}

export function acceptComparable(target: PropertyFeatures, candidate: PropertyFeatures): boolean {
  return explainRejection(target, candidate) === null;
}
