import { InvalidInputError } from '../errors.js';

export interface MortgageInputs {
  price: number;
  downPaymentFraction: number; // 0.2 = 20% down
  annualInterestRatePct: number; // 7 = 7.00%
  termYears: number;
  annualPropertyTax: number;
  annualInsurance: number;
  monthlyHoa: number;
  monthlyPmi?: number;
}

export interface MonthlyPayment {
  total: number;
  principalAndInterest: number;
  propertyTax: number;
  insurance: number;
  hoa: number;
  pmi: number;
  loanAmount: number;
}

export const DEFAULT_DOWN_PAYMENT_FRACTION = 0.2;
export const DEFAULT_INTEREST_RATE_PCT = 7.0;
export const DEFAULT_TERM_YEARS = 30;
export const DEFAULT_TAX_RATE = 0.0125;
export const INSURANCE_RATE = 0.0035;
export const PMI_RATE = 0.005;

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function requireFinite(name: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(`${name} must be a finite number`, name);
  }
}

/**
 * Amortized monthly payment: principal and interest plus monthly escrow
 * (tax, insurance), HOA dues and PMI.
 *
 * P&I = L * r(1+r)^n / ((1+r)^n - 1), or L / n when r is 0.
 */
export function computeMonthlyPayment(inputs: MortgageInputs): MonthlyPayment {
  const { price, downPaymentFraction, annualInterestRatePct, termYears } = inputs;
  const monthlyPmi = inputs.monthlyPmi ?? 0;

  requireFinite('price', price);
  requireFinite('downPaymentFraction', downPaymentFraction);
  requireFinite('annualInterestRatePct', annualInterestRatePct);
  requireFinite('termYears', termYears);
  requireFinite('annualPropertyTax', inputs.annualPropertyTax);
  requireFinite('annualInsurance', inputs.annualInsurance);
  requireFinite('monthlyHoa', inputs.monthlyHoa);
  requireFinite('monthlyPmi', monthlyPmi);

  if (price <= 0) throw new InvalidInputError('price must be greater than 0', 'price');
  if (termYears <= 0) throw new InvalidInputError('termYears must be greater than 0', 'termYears');
  if (downPaymentFraction < 0 || downPaymentFraction > 1) {
    throw new InvalidInputError('downPaymentFraction must be between 0 and 1', 'downPaymentFraction');
  }
  if (annualInterestRatePct < 0) {
    throw new InvalidInputError('annualInterestRatePct must not be negative', 'annualInterestRatePct');
  }

  const loanAmount = price * (1 - downPaymentFraction);
  const monthlyRate = annualInterestRatePct / 100 / 12;
  const n = termYears * 12;

  let principalAndInterest: number;
  if (monthlyRate === 0) {
    principalAndInterest = loanAmount / n;
  } else {
    const growth = Math.pow(1 + monthlyRate, n);
    principalAndInterest = (loanAmount * monthlyRate * growth) / (growth - 1);
  }

  const propertyTax = inputs.annualPropertyTax / 12;
  const insurance = inputs.annualInsurance / 12;
  const total = principalAndInterest + propertyTax + insurance + inputs.monthlyHoa + monthlyPmi;

  return {
    total: roundCents(total),
    principalAndInterest: roundCents(principalAndInterest),
    propertyTax: roundCents(propertyTax),
    insurance: roundCents(insurance),
    hoa: roundCents(inputs.monthlyHoa),
    pmi: roundCents(monthlyPmi),
    loanAmount: roundCents(loanAmount)
  };
}

export interface EstimateOptions {
  downPaymentFraction?: number;
  annualInterestRatePct?: number;
  termYears?: number;
  taxRate?: number;
  monthlyHoa?: number;
}

/**
 * Listing-level estimate: tax and insurance derived from the price, PMI added
 * while the down payment is under 20%.
 */
export function estimateMonthlyPayment(price: number, options: EstimateOptions = {}): MonthlyPayment {
  const downPaymentFraction = options.downPaymentFraction ?? DEFAULT_DOWN_PAYMENT_FRACTION;
  const taxRate = options.taxRate ?? DEFAULT_TAX_RATE;

  return computeMonthlyPayment({
    price,
    downPaymentFraction,
    annualInterestRatePct: options.annualInterestRatePct ?? DEFAULT_INTEREST_RATE_PCT,
    termYears: options.termYears ?? DEFAULT_TERM_YEARS,
    annualPropertyTax: price * taxRate,
    annualInsurance: price * INSURANCE_RATE,
    monthlyHoa: options.monthlyHoa ?? 0,
    monthlyPmi: downPaymentFraction < 0.2 ? (price * PMI_RATE) / 12 : 0
  });
}
