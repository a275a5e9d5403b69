import { Router } from 'express';
import { z } from 'zod';
import { computeMonthlyPayment } from '../core/mortgage.js';
import { searchProperties } from '../services/analysis.js';
import { sendError, validationError } from './respond.js';

const router = Router();

const searchBodySchema = z
  .object({
    city: z.string().trim().min(2).max(100),
    state: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{2}$/, 'Use a 2-letter state code')
      .transform((s) => s.toUpperCase()),
    downPayment: z.coerce.number().min(0).max(100),
    interestRate: z.coerce.number().min(0).max(30),
    minPrice: z.coerce.number().int().min(0).default(0),
    maxPrice: z.coerce.number().int().min(0).default(0),
    termYears: z.coerce.number().int().min(1).max(40).optional()
  })
  .refine((b) => b.maxPrice === 0 || b.maxPrice >= b.minPrice, {
    message: 'maxPrice must be 0 (no cap) or at least minPrice',
    path: ['maxPrice']
  });

export const criteriaSchema = searchBodySchema;

const mortgageBodySchema = z.object({
  price: z.coerce.number(),
  downPaymentFraction: z.coerce.number().default(0.2),
  annualInterestRatePct: z.coerce.number().default(7),
  termYears: z.coerce.number().default(30),
  annualPropertyTax: z.coerce.number().default(0),
  annualInsurance: z.coerce.number().default(0),
  monthlyHoa: z.coerce.number().default(0),
  monthlyPmi: z.coerce.number().optional()
});

router.post('/v1/search', async (req, res) => {
  const parsed = searchBodySchema.safeParse(req.body);
  if (!parsed.success) return validationError(res, parsed.error);

  try {
    const properties = await searchProperties(parsed.data);
    return res.json({ properties });
  } catch (err) {
    return sendError(res, err, 'SEARCH_FAILED');
  }
});

router.post('/v1/mortgage', (req, res) => {
  const parsed = mortgageBodySchema.safeParse(req.body);
  if (!parsed.success) return validationError(res, parsed.error);

  try {
    return res.json(computeMonthlyPayment(parsed.data));
  } catch (err) {
    return sendError(res, err, 'MORTGAGE_FAILED');
  }
});

export default router;
