import express from 'express';
import cors from 'cors';
import compsRouter from './routes/comps.js';
import savedSearchesRouter from './routes/savedSearches.js';
import searchRouter from './routes/search.js';
import { getEnv } from './env.js';
import { getFirestore } from './firebase.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('app');

export function createApp() {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // Unconfigured means any origin.
        if (allowedOrigins.length === 0) return callback(null, true);

        return callback(null, allowedOrigins.includes(normalizeOrigin(origin)));
      }
    })
  );

  app.get('/health', (_req, res) =>
    res.json({
      ok: true,
      providers: {
        zillow: Boolean(env.ZILLOW_API_KEY),
        mashvisor: Boolean(env.MASHVISOR_API_KEY),
        serpapi: Boolean(env.SERPAPI_KEY)
      }
    })
  );

  app.get('/health/firestore', async (_req, res) => {
    try {
      // Read-only probe of a document that need not exist.
      await getFirestore().doc('_health/ping').get();
      return res.json({ ok: true });
    } catch (err) {
      const message = errorMessage(err);
      log.warn({ error: message }, 'firestore probe failed');
      return res.status(500).json({ ok: false, error: 'FIRESTORE_UNAVAILABLE', message });
    }
  });

  app.use(searchRouter);
  app.use(compsRouter);
  app.use(savedSearchesRouter);

  return app;
}
