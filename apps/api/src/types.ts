export type CompSource = 'direct' | 'neighborhood';

export type RentType = 'Zestimate' | 'Market Average';

/** Canonical shape every comp candidate is parsed into before scoring. */
export interface PropertyFeatures {
  readonly bedrooms: number;
  readonly bathrooms: number; // half-bath steps
  readonly price: number; // monthly rent
  readonly squareFeet: number; // 0 = unknown
  readonly distanceMiles?: number; // undefined = unknown
  readonly address: string;
}

export interface CompCandidate extends PropertyFeatures {
  readonly rent?: number;
  readonly city?: string;
  readonly state?: string;
  readonly zipcode?: string;
  readonly neighborhood?: string;
  readonly propertyType?: string;
  readonly yearBuilt?: number;
  readonly latitude?: number;
  readonly longitude?: number;
}

export interface ScoredComp extends CompCandidate {
  readonly similarityScore: number;
  readonly source: CompSource;
}

/**
 * Property to find rental comps for. `price` is the monthly rent it is
 * analyzed at, the unit rental listings report their price in.
 */
export interface CompTarget {
  address: string;
  city: string;
  state: string;
  zipcode?: string;
  price: number;
  bedrooms: number;
  bathrooms: number;
  squareFeet?: number;
  latitude?: number;
  longitude?: number;
}

export interface Neighborhood {
  id: string;
  name: string;
  latitude?: number;
  longitude?: number;
}

/** A Zillow search result after normalization. */
export interface ListingRecord {
  zpid?: string;
  address?: string;
  price?: number;
  bedrooms?: number;
  bathrooms?: number;
  livingArea?: number;
  rentEstimate?: number;
  hoaFee?: number;
  propertyTaxRate?: number;
  zipcode?: string;
  city?: string;
  state?: string;
  latitude?: number;
  longitude?: number;
  detailUrl?: string;
}

export interface SearchCriteria {
  city: string;
  state: string;
  downPayment: number; // percent, e.g. 20
  interestRate: number; // percent, e.g. 7
  minPrice: number;
  maxPrice: number; // 0 = no cap
  termYears?: number;
}

export interface PaymentBreakdown {
  principalAndInterest: number;
  propertyTax: number;
  insurance: number;
  hoa: number;
  pmi: number;
}

export interface PropertyResult {
  zpid: string;
  address: string;
  price: number;
  monthlyPayment: number;
  payment: PaymentBreakdown;
  rent: number;
  rentType: RentType;
  dscr: number;
  hoaFee: number;
  taxRate: number;
  insuranceCost: number;
  zillowUrl: string;
  bedrooms: number;
  bathrooms?: number;
  livingArea?: number;
  zipcode: string;
  city?: string;
  state?: string;
  latitude?: number;
  longitude?: number;
}

export interface SavedSearch extends SearchCriteria {
  id: string;
  createdAt?: string; // ISO
}
