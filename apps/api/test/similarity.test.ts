import { describe, expect, it } from 'vitest';
import { scoreBreakdown, scoreSimilarity } from '../src/core/similarity.js';
import type { PropertyFeatures } from '../src/types.js';

const target: PropertyFeatures = {
  address: '100 Target Ave',
  bedrooms: 3,
  bathrooms: 2,
  price: 300_000,
  squareFeet: 1500,
  distanceMiles: 0
};

function candidate(overrides: Partial<PropertyFeatures>): PropertyFeatures {
  return { ...target, address: '1 Comp St', distanceMiles: 0.5, ...overrides };
}

describe('scoreSimilarity', () => {
  it('scores a near-identical home 100', () => {
    const perfect = candidate({ price: 295_000, squareFeet: 1480, distanceMiles: 0.5 });
    expect(scoreSimilarity(target, perfect)).toBe(100);
  });

  it('scores a decent match 72', () => {
    const decent = candidate({ bedrooms: 4, price: 350_000, squareFeet: 1800, distanceMiles: 2.5 });
    expect(scoreBreakdown(target, decent)).toEqual({
      bedrooms: 15,
      bathrooms: 20,
      price: 15,
      distance: 10,
      squareFeet: 12
    });
    expect(scoreSimilarity(target, decent)).toBe(72);
  });

  it('scores the target against itself 100', () => {
    expect(scoreSimilarity(target, target)).toBe(100);
  });

  it('does not depend on the direction of a deviation', () => {
    const larger = candidate({ price: 330_000, squareFeet: 1650 });
    const smaller = candidate({ price: 270_000, squareFeet: 1350 });
    expect(scoreSimilarity(target, larger)).toBe(scoreSimilarity(target, smaller));
  });

  it('gives partial credit for a half-bath difference', () => {
    expect(scoreBreakdown(target, candidate({ bathrooms: 2.5 })).bathrooms).toBe(15);
    expect(scoreBreakdown(target, candidate({ bathrooms: 3 })).bathrooms).toBe(0);
  });

  it('uses strict distance thresholds', () => {
    expect(scoreBreakdown(target, candidate({ distanceMiles: 0.99 })).distance).toBe(20);
    expect(scoreBreakdown(target, candidate({ distanceMiles: 1 })).distance).toBe(15);
    expect(scoreBreakdown(target, candidate({ distanceMiles: 4.9 })).distance).toBe(10);
    expect(scoreBreakdown(target, candidate({ distanceMiles: 5 })).distance).toBe(0);
    expect(scoreBreakdown(target, candidate({ distanceMiles: undefined })).distance).toBe(0);
  });

  it('gives no square-footage points when either side is unknown', () => {
    expect(scoreBreakdown({ ...target, squareFeet: 0 }, candidate({})).squareFeet).toBe(0);
    expect(scoreBreakdown(target, candidate({ squareFeet: 0 })).squareFeet).toBe(0);
    expect(scoreSimilarity({ ...target, squareFeet: 0 }, { ...target, squareFeet: 0 })).toBe(85);
  });

  it('scores a dissimilar home 0', () => {
    const far = candidate({ bedrooms: 6, bathrooms: 5, price: 900_000, squareFeet: 4000, distanceMiles: 12 });
    expect(scoreSimilarity(target, far)).toBe(0);
  });
});
