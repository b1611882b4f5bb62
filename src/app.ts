import express from 'express';
import { attackSurfaceRoutes } from './routes/attack-surface.js';
import { configure } from './services/attack-surface.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';

export const SERVICE_NAME = 'Retail Attack Surface Engine';
export const SERVICE_VERSION = '1.0.0';

export function createApp(config: AppConfig = loadConfig()): express.Express {
  const app = express();

  configure({ analysisDefaults: config.analysisDefaults, maxPathCutoff: config.maxPathCutoff });

  app.use(express.json());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'operational', service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.use('/api/attack-surface', attackSurfaceRoutes());

  return app;
}
