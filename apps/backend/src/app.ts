import express from 'express';
import cors from 'cors';
import { createHealthRouter } from './routes/health.js';
import { createRegistryRouter } from './routes/registry.js';
import { requestLogger } from './middleware/logger.js';
import type { RegistryBackend } from './services/registryBackend.js';

export function createApp(backend: RegistryBackend): express.Express {
  const app = express();

  // ─── Middleware ──────────────────────────────────────────
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // ─── Routes ─────────────────────────────────────────────
  app.use('/', createHealthRouter(backend));
  app.use('/api', createRegistryRouter(backend));

  return app;
}
