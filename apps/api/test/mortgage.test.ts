import { describe, expect, it } from 'vitest';
import { computeMonthlyPayment, estimateMonthlyPayment, type MortgageInputs } from '../src/core/mortgage.js';
import { InvalidInputError } from '../src/errors.js';

const baseInputs = {
  price: 300_000,
  downPaymentFraction: 0.2,
  annualInterestRatePct: 7,
  termYears: 30,
  annualPropertyTax: 3000,
  annualInsurance: 900,
  monthlyHoa: 0
};

describe('computeMonthlyPayment', () => {
  it('amortizes a 30-year loan and adds monthly escrow', () => {
    expect(computeMonthlyPayment(baseInputs)).toEqual({
      total: 1921.73,
      principalAndInterest: 1596.73,
      propertyTax: 250,
      insurance: 75,
      hoa: 0,
      pmi: 0,
      loanAmount: 240_000
    });
  });

  it('spreads the loan evenly when the rate is 0', () => {
    const payment = computeMonthlyPayment({
      ...baseInputs,
      price: 120_000,
      downPaymentFraction: 0,
      annualInterestRatePct: 0,
      termYears: 10,
      annualPropertyTax: 0,
      annualInsurance: 0
    });

    expect(payment.principalAndInterest).toBe(1000);
    expect(payment.total).toBe(1000);
  });

  it('adds HOA dues and PMI to the total', () => {
    const payment = computeMonthlyPayment({ ...baseInputs, monthlyHoa: 120, monthlyPmi: 50 });
    expect(payment.hoa).toBe(120);
    expect(payment.pmi).toBe(50);
    expect(payment.total).toBe(2091.73);
  });

  it('has no loan at 100% down', () => {
    const payment = computeMonthlyPayment({ ...baseInputs, downPaymentFraction: 1 });
    expect(payment.loanAmount).toBe(0);
    expect(payment.principalAndInterest).toBe(0);
    expect(payment.total).toBe(325);
  });

  const invalid: Array<[Partial<MortgageInputs>, string]> = [
    [{ price: 0 }, 'price'],
    [{ price: -5 }, 'price'],
    [{ termYears: 0 }, 'termYears'],
    [{ downPaymentFraction: 1.5 }, 'downPaymentFraction'],
    [{ downPaymentFraction: -0.1 }, 'downPaymentFraction'],
    [{ annualInterestRatePct: -1 }, 'annualInterestRatePct'],
    [{ annualPropertyTax: Number.NaN }, 'annualPropertyTax']
  ];

  it.each(invalid)('rejects %o', (override, field) => {
    expect.assertions(2);
    try {
      computeMonthlyPayment({ ...baseInputs, ...override });
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err instanceof InvalidInputError ? err.field : undefined).toBe(field);
    }
  });
});

describe('estimateMonthlyPayment', () => {
  it('derives tax and insurance from the price', () => {
    const payment = estimateMonthlyPayment(300_000, { taxRate: 0.01 });
    expect(payment.propertyTax).toBe(250);
    expect(payment.insurance).toBe(87.5);
    expect(payment.pmi).toBe(0);
    expect(payment.total).toBe(1934.23);
  });

  it('adds PMI while the down payment is under 20%', () => {
    const payment = estimateMonthlyPayment(200_000, {
      downPaymentFraction: 0.1,
      annualInterestRatePct: 0,
      termYears: 10,
      taxRate: 0.012
    });

    expect(payment.principalAndInterest).toBe(1500);
    expect(payment.propertyTax).toBe(200);
    expect(payment.insurance).toBe(58.33);
    expect(payment.pmi).toBe(83.33);
    expect(payment.total).toBe(1841.67);
  });
});
