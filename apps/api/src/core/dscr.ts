import { createLogger } from '../logger.js';
import type { ListingRecord, PropertyResult, RentType, SearchCriteria } from '../types.js';
import { DEFAULT_TAX_RATE, DEFAULT_TERM_YEARS, INSURANCE_RATE, estimateMonthlyPayment } from './mortgage.js';
import type { RentProvider } from './ports.js';

const log = createLogger('dscr');

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function computeDscr(monthlyRent: number, monthlyPayment: number): number {
  if (!(monthlyPayment > 0)) return 0;
  return round2(monthlyRent / monthlyPayment);
}

export function zillowUrl(zpid: string): string {
  return `https://www.zillow.com/homedetails/${encodeURIComponent(zpid)}_zpid/`;
}

interface ResolvedRent {
  rent: number;
  rentType: RentType;
}

/**
 * Rent per listing: the listing's own estimate first, then the market average
 * for its ZIP and bedroom count. Market averages are looked up once per
 * request for each ZIP/bedroom pair.
 */
export class RentResolver {
  private readonly memo = new Map<string, Promise<number | null>>();

  constructor(private readonly fallback?: RentProvider) {}

  async resolve(listing: { rentEstimate?: number; zipcode: string; bedrooms: number }): Promise<ResolvedRent | null> {
    if (listing.rentEstimate && listing.rentEstimate > 0) {
      return { rent: listing.rentEstimate, rentType: 'Zestimate' };
    }

    const average = await this.marketAverage(listing.zipcode, listing.bedrooms);
    return average ? { rent: average, rentType: 'Market Average' } : null;
  }

  private marketAverage(zipcode: string, bedrooms: number): Promise<number | null> {
    const fallback = this.fallback;
    if (!fallback) return Promise.resolve(null);

    const key = `${zipcode}-${bedrooms}`;
    const cached = this.memo.get(key);
    if (cached) return cached;

    const pending = fallback.fetchAverageRent(zipcode, bedrooms).then((result) => {
      if (result.status === 'failed') {
        log.warn({ zipcode, bedrooms, error: result.error.message }, 'market rent lookup failed');
        return null;
      }
      return result.status === 'ok' ? (result.items[0] ?? null) : null;
    });

    this.memo.set(key, pending);
    return pending;
  }
}

function isQualified(
  listing: ListingRecord
): listing is ListingRecord & { zpid: string; address: string; price: number; bedrooms: number; zipcode: string } {
  return Boolean(
    listing.zpid &&
      listing.address &&
      typeof listing.price === 'number' &&
      listing.price > 0 &&
      typeof listing.bedrooms === 'number' &&
      listing.bedrooms > 0 &&
      listing.zipcode
  );
}

function withinPriceRange(price: number, criteria: SearchCriteria): boolean {
  if (price < criteria.minPrice) return false;
  if (criteria.maxPrice > 0 && price > criteria.maxPrice) return false;
  return true;
}

/**
 * Monthly payment, rent and DSCR for every qualifying listing, best DSCR
 * first. Listings without a usable rent figure are left out.
 */
export async function analyzeListings(
  listings: readonly ListingRecord[],
  criteria: SearchCriteria,
  rents: RentResolver
): Promise<PropertyResult[]> {
  const results: PropertyResult[] = [];

  // Sequential: market-rent lookups for the same ZIP/bedroom pair must see the memo.
  for (const listing of listings) {
    if (!isQualified(listing)) continue;
    if (!withinPriceRange(listing.price, criteria)) continue;

    const taxRate = listing.propertyTaxRate && listing.propertyTaxRate > 0 ? listing.propertyTaxRate : DEFAULT_TAX_RATE;
    const hoaFee = listing.hoaFee && listing.hoaFee > 0 ? listing.hoaFee : 0;

    const payment = estimateMonthlyPayment(listing.price, {
      downPaymentFraction: criteria.downPayment / 100,
      annualInterestRatePct: criteria.interestRate,
      termYears: criteria.termYears ?? DEFAULT_TERM_YEARS,
      taxRate,
      monthlyHoa: hoaFee
    });

    const rent = await rents.resolve(listing);
    if (!rent) continue;

    results.push({
      zpid: listing.zpid,
      address: listing.address,
      price: listing.price,
      monthlyPayment: payment.total,
      payment: {
        principalAndInterest: payment.principalAndInterest,
        propertyTax: payment.propertyTax,
        insurance: payment.insurance,
        hoa: payment.hoa,
        pmi: payment.pmi
      },
      rent: rent.rent,
      rentType: rent.rentType,
      dscr: computeDscr(rent.rent, payment.total),
      hoaFee,
      taxRate,
      insuranceCost: round2((listing.price * INSURANCE_RATE) / 12),
      zillowUrl: zillowUrl(listing.zpid),
      bedrooms: listing.bedrooms,
      bathrooms: listing.bathrooms,
      livingArea: listing.livingArea,
      zipcode: listing.zipcode,
      city: listing.city,
      state: listing.state,
      latitude: listing.latitude,
      longitude: listing.longitude
    });
  }

  return results.sort((a, b) => b.dscr - a.dscr);
}
