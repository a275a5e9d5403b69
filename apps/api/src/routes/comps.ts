import { Router } from 'express';
import { z } from 'zod';
import { DEFAULT_MAX_RESULTS } from '../core/compsAggregator.js';
import { findComps } from '../services/analysis.js';
import { sendError, validationError } from './respond.js';

const router = Router();

// `price` is the property's monthly rent. Price and address are checked by
// the aggregator so a malformed target surfaces as INVALID_INPUT rather than
// a schema error.
const compsBodySchema = z.object({
  address: z.string().max(200).default(''),
  city: z.string().trim().max(100).default(''),
  state: z.string().trim().max(50).default(''),
  zipcode: z.string().trim().max(10).optional(),
  price: z.coerce.number().default(0),
  bedrooms: z.coerce.number().min(0).max(20),
  bathrooms: z.coerce.number().min(0).max(20),
  squareFeet: z.coerce.number().min(0).optional(),
  latitude: z.coerce.number().min(-90).max(90).optional(),
  longitude: z.coerce.number().min(-180).max(180).optional(),
  maxResults: z.coerce.number().int().min(1).max(50).default(DEFAULT_MAX_RESULTS)
});

router.post('/v1/comps', async (req, res) => {
  const parsed = compsBodySchema.safeParse(req.body);
  if (!parsed.success) return validationError(res, parsed.error);

  const { maxResults, ...target } = parsed.data;

  try {
    const report = await findComps(target, maxResults);
    return res.json(report);
  } catch (err) {
    return sendError(res, err, 'COMPS_FAILED');
  }
});

export default router;
