import { describe, expect, it } from 'vitest';
import { averageRent, formatCurrency, gradeDscr } from '../src/lib/dscr';

describe('gradeDscr', () => {
  it.each([
    [2.0, 'A+'],
    [1.99, 'A'],
    [1.6, 'A-'],
    [1.35, 'B'],
    [1.0, 'B-'],
    [0.95, 'C+'],
    [0.7, 'C-'],
    [0.5, 'D'],
    [0.49, 'D-']
  ])('grades %s as %s', (dscr, grade) => {
    expect(gradeDscr(dscr).grade).toBe(grade);
  });

  it('has no grade without a ratio', () => {
    expect(gradeDscr(0)).toEqual({ grade: 'N/A', tone: 'none' });
    expect(gradeDscr(undefined)).toEqual({ grade: 'N/A', tone: 'none' });
  });
});

describe('formatting', () => {
  it('formats dollars', () => {
    expect(formatCurrency(1921.73, 2)).toBe('$1,921.73');
    expect(formatCurrency(300000)).toBe('$300,000');
    expect(formatCurrency(undefined)).toBe('Data not available');
  });

  it('averages known rents', () => {
    expect(averageRent([1900, undefined, 2100])).toBe(2000);
    expect(averageRent([])).toBeUndefined();
  });
});
