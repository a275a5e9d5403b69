import { Router } from 'express';
import { z } from 'zod';
import { deleteSavedSearch, listSavedSearches, saveSearch } from '../repositories/savedSearchRepository.js';
import { sendError, validationError } from './respond.js';
import { criteriaSchema } from './search.js';

const router = Router();

const usernameSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_.@-]+$/, 'Invalid username');

const saveBodySchema = z.object({ username: usernameSchema.default('api_user') }).and(criteriaSchema);

router.post('/v1/saved-searches', async (req, res) => {
  const parsed = saveBodySchema.safeParse(req.body);
  if (!parsed.success) return validationError(res, parsed.error);

  const { username, ...criteria } = parsed.data;
  try {
    const { id } = await saveSearch(username, criteria);
    return res.status(201).json({ id });
  } catch (err) {
    return sendError(res, err, 'FIRESTORE_UNAVAILABLE', 503);
  }
});

router.get('/v1/saved-searches/:username', async (req, res) => {
  const username = usernameSchema.safeParse(req.params.username);
  if (!username.success) return validationError(res, username.error);

  try {
    const searches = await listSavedSearches(username.data);
    return res.json({ searches });
  } catch (err) {
    return sendError(res, err, 'FIRESTORE_UNAVAILABLE', 503);
  }
});

router.delete('/v1/saved-searches/:username/:searchId', async (req, res) => {
  const username = usernameSchema.safeParse(req.params.username);
  if (!username.success) return validationError(res, username.error);

  try {
    const deleted = await deleteSavedSearch(username.data, req.params.searchId);
    if (!deleted) return res.status(404).json({ error: 'NOT_FOUND' });
    return res.json({ ok: true });
  } catch (err) {
    return sendError(res, err, 'FIRESTORE_UNAVAILABLE', 503);
  }
});

export default router;
