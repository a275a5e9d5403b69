import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Repo-root .env first, then apps/api/.env (cwd) overrides it.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

// Env must be loaded before the logger reads LOG_LEVEL.
const { getEnv } = await import('./env.js');
const { createApp } = await import('./app.js');
const { createLogger } = await import('./logger.js');

const env = getEnv();
const log = createLogger('server');

createApp().listen(env.PORT, () => {
  log.info({ port: env.PORT }, `API listening on http://localhost:${env.PORT}`);
});
