export type RentType = 'Zestimate' | 'Market Average';

export interface SearchCriteria {
  city: string;
  state: string;
  downPayment: number;
  interestRate: number;
  minPrice: number;
  maxPrice: number;
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

export interface SearchResponse {
  properties: PropertyResult[];
}

export interface CompsRequest {
  address: string;
  city: string;
  state: string;
  zipcode?: string;
  /** Monthly rent; rental comps are priced per month. */
  price: number;
  bedrooms: number;
  bathrooms: number;
  squareFeet?: number;
  latitude?: number;
  longitude?: number;
  maxResults?: number;
}

export interface RentalComp {
  address: string;
  price: number;
  rent?: number;
  bedrooms: number;
  bathrooms: number;
  squareFeet: number;
  distanceMiles?: number;
  neighborhood?: string;
  similarityScore: number;
  source: 'direct' | 'neighborhood';
}

export interface CompsResponse {
  comps: RentalComp[];
  diagnostics: {
    reasons: string[];
  };
}
