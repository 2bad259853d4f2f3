/**
 * Image Records API server
 *
 * ENVIRONMENT VARIABLES (see bootstrap/config.ts for defaults):
 * - AUTH_JWT_SECRET        (required)
 * - SERVICE_ENV            (dev | staging | prod)
 * - BLOB_STORE_TYPE        (memory | s3)
 * - METADATA_STORE_TYPE    (memory | supabase)
 * - PORT                   (optional, default 3000)
 */

import 'dotenv/config';
import express, { Express, Request, Response } from 'express';
import { Config, configProvider } from '../bootstrap/config';
import { Services, createServices } from '../bootstrap/serviceSelector';
import { createAuthenticator } from './auth/middleware';
import { createImageRoutes } from './routes/images';
import { globalErrorHandler } from './errors/errorHandler';
import { sanitizationErrorHandler } from './errors/validationErrors';
import { getRecordMetrics } from '../engine/observability/telemetry';

/* -------------------------------------------------------------------------- */
/*                               ENV VALIDATION                               */
/* -------------------------------------------------------------------------- */

function validateEnvironment(): Config {
  let config: Config;
  try {
    config = configProvider.load();
  } catch (error) {
    console.error(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  if (!config.jwtSecret) {
    console.error('FATAL: Missing required environment variable: AUTH_JWT_SECRET');
    process.exit(1);
  }

  return config;
}

/* -------------------------------------------------------------------------- */
/*                                APP FACTORY                                 */
/* -------------------------------------------------------------------------- */

export function createApp(services: Services, config: Config): Express {
  const app = express();

  /* ------------------------------- Body Parsers ------------------------------ */
  app.use(express.json({ limit: '64kb' }));

  /* --------------------------------- Health --------------------------------- */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ready',
      service: 'image-records',
      env: config.serviceEnv,
      metrics: getRecordMetrics(),
    });
  });

  /* ---------------------------------- Routes --------------------------------- */
  app.use('/images', createAuthenticator(config.jwtSecret), createImageRoutes(services));

  /* ----------------------------------- 404 ----------------------------------- */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ errorCode: 'NOT_FOUND' });
  });

  /* ---------------------------- Error Handlers ------------------------------- */
  app.use(sanitizationErrorHandler);
  app.use(globalErrorHandler);

  return app;
}

/* -------------------------------------------------------------------------- */
/*                                SERVER START                                */
/* -------------------------------------------------------------------------- */

export function startServer(): void {
  const config = validateEnvironment();
  const app = createApp(createServices(config), config);

  app.listen(config.port, () => {
    console.log(`Image records API listening on port ${config.port}`);
  });
}

if (require.main === module) {
  startServer();
}
