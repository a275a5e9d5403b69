import type { CompCandidate, ListingRecord, Neighborhood, PropertyFeatures } from '../types.js';

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(obj: RawRecord, key: string): string | undefined {
  const v = obj[key];
  if (typeof v === 'string') {
    const trimmed = v.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return undefined;
}

export function getNumeric(obj: RawRecord, key: string): number | undefined {
  const v = obj[key];

  if (typeof v === 'number') {
    return Number.isFinite(v) ? v : undefined;
  }

  if (typeof v === 'string') {
    const trimmed = v.trim();
    if (trimmed.length === 0) return undefined;
    const normalized = trimmed.replace(/[$,]/g, '');
    const n = Number(normalized);
    return Number.isFinite(n) ? n : undefined;
  }

  return undefined;
}

export function getNested(obj: RawRecord, key: string): RawRecord | undefined {
  const v = obj[key];
  return isRecord(v) ? v : undefined;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Dedup key: case-insensitive, whitespace-collapsed. */
export function normalizeAddressKey(address: string): string {
  return normalizeWhitespace(address).toLowerCase();
}

function firstNumeric(obj: RawRecord, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const n = getNumeric(obj, key);
    if (n !== undefined) return n;
  }
  return undefined;
}

function firstString(obj: RawRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const s = getString(obj, key);
    if (s !== undefined) return s;
  }
  return undefined;
}

/** Every field name a provider has been seen to put a monthly rent estimate under. */
export const RENT_KEYS = [
  'rentZestimate',
  'rentEstimate',
  'rent_estimate',
  'estimated_rent',
  'monthlyRent',
  'monthly_rent',
  'rent'
] as const;

export function extractRent(raw: RawRecord): number | undefined {
  const rent = firstNumeric(raw, RENT_KEYS);
  return rent !== undefined && rent > 0 ? rent : undefined;
}

/** Trailing 5-digit ZIP of a one-line US address ("..., Austin, TX 78701"). */
export function extractZipcode(address: string): string | undefined {
  const match = /(\d{5})(?:-\d{4})?\s*$/.exec(address.trim());
  return match?.[1];
}

export function parseCityState(address: string): { city?: string; state?: string } {
  const parts = address
    .split(',')
    .map((p) => normalizeWhitespace(p))
    .filter((p) => p.length > 0);

  if (parts.length < 3) return {};

  const city = parts[parts.length - 2];
  const stateToken = parts[parts.length - 1].split(/\s+/)[0] ?? '';
  const state = /^[A-Za-z]{2}$/.test(stateToken) ? stateToken.toUpperCase() : undefined;
  return { city, state };
}

export function toListingRecord(raw: unknown): ListingRecord {
  const prop = isRecord(raw) ? raw : {};
  const address = firstString(prop, ['address', 'streetAddress', 'fullAddress']);
  const priceComponent = getNested(prop, 'priceComponent');
  const fromAddress = address ? parseCityState(address) : {};

  return {
    zpid: getString(prop, 'zpid'),
    address: address ? normalizeWhitespace(address) : undefined,
    price: getNumeric(prop, 'price'),
    bedrooms: getNumeric(prop, 'bedrooms'),
    bathrooms: getNumeric(prop, 'bathrooms'),
    livingArea: firstNumeric(prop, ['livingArea', 'sqft']),
    rentEstimate: extractRent(prop),
    hoaFee: getNumeric(prop, 'hoaFee') ?? (priceComponent ? getNumeric(priceComponent, 'hoa') : undefined),
    propertyTaxRate: getNumeric(prop, 'propertyTaxRate'),
    zipcode: getString(prop, 'zipcode') ?? (address ? extractZipcode(address) : undefined),
    city: getString(prop, 'city') ?? fromAddress.city,
    state: getString(prop, 'state') ?? fromAddress.state,
    latitude: getNumeric(prop, 'latitude'),
    longitude: getNumeric(prop, 'longitude'),
    detailUrl: getString(prop, 'detailUrl')
  };
}

const EARTH_RADIUS_MILES = 3959;

export function haversineMiles(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a = Math.sin(dLat / 2) ** 2 + Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_MILES * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export interface Origin {
  latitude?: number;
  longitude?: number;
}

function resolveDistance(listing: RawRecord, origin?: Origin): number | undefined {
  const reported = firstNumeric(listing, ['distance', 'neighborhood_distance_miles', 'distanceMiles']);
  if (reported !== undefined && reported >= 0) return reported;

  const lat = firstNumeric(listing, ['latitude', 'lat']);
  const lon = firstNumeric(listing, ['longitude', 'lon', 'lng']);
  if (
    origin?.latitude !== undefined &&
    origin.longitude !== undefined &&
    lat !== undefined &&
    lon !== undefined
  ) {
    return haversineMiles(origin.latitude, origin.longitude, lat, lon);
  }

  return undefined;
}

function nonNegative(value: number | undefined): number {
  return value !== undefined && value > 0 ? value : 0;
}

/**
 * Maps a raw comp listing (Mashvisor traditional listing or direct comp) onto
 * the canonical candidate shape. Rental listings report monthly rent as
 * `price`. Distance stays undefined when neither a reported distance nor
 * coordinates are available. The result is frozen.
 */
export function toCompCandidate(raw: unknown, origin?: Origin, extra?: { neighborhood?: string }): CompCandidate {
  const listing = isRecord(raw) ? raw : {};
  const address = firstString(listing, ['address', 'full_address', 'street_address']) ?? '';
  const price = firstNumeric(listing, ['price', 'rent', 'rental_price']) ?? 0;

  const candidate: CompCandidate = {
    address: normalizeWhitespace(address),
    price,
    rent: extractRent(listing) ?? (price > 0 ? price : undefined),
    bedrooms: nonNegative(firstNumeric(listing, ['beds', 'bedrooms', 'num_of_beds'])),
    bathrooms: nonNegative(firstNumeric(listing, ['baths', 'bathrooms', 'num_of_baths'])),
    squareFeet: Math.round(nonNegative(firstNumeric(listing, ['sqft', 'square_feet', 'livingArea']))),
    distanceMiles: resolveDistance(listing, origin),
    city: getString(listing, 'city'),
    state: getString(listing, 'state'),
    zipcode: firstString(listing, ['zipcode', 'zip_code', 'zip']),
    neighborhood: extra?.neighborhood ?? getString(listing, 'neighborhood'),
    propertyType: firstString(listing, ['type', 'property_type', 'homeType']),
    yearBuilt: firstNumeric(listing, ['year_built', 'yearBuilt']),
    latitude: firstNumeric(listing, ['latitude', 'lat']),
    longitude: firstNumeric(listing, ['longitude', 'lon', 'lng'])
  };

  return Object.freeze(candidate);
}

export function toNeighborhood(raw: unknown): Neighborhood | null {
  if (!isRecord(raw)) return null;
  const id = getString(raw, 'id');
  if (!id) return null;
  return {
    id,
    name: getString(raw, 'name') ?? id,
    latitude: getNumeric(raw, 'latitude'),
    longitude: getNumeric(raw, 'longitude')
  };
}

/** Target description from the caller, frozen into scoring features. */
export function toTargetFeatures(target: {
  address: string;
  price: number;
  bedrooms: number;
  bathrooms: number;
  squareFeet?: number;
}): PropertyFeatures {
  return Object.freeze({
    address: normalizeWhitespace(target.address),
    price: target.price,
    bedrooms: target.bedrooms,
    bathrooms: target.bathrooms,
    squareFeet: target.squareFeet ?? 0,
    distanceMiles: 0
  });
}
