import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createPipelineRouter, type PipelineRouteDeps } from './routes/pipelineRoutes.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';

/**
 * Express application for the pipeline API. Services are passed in so tests
 * can run it against in-process stand-ins.
 */
export function createApp(deps: PipelineRouteDeps): Express {
  const app = express();

  app.use(helmet()); // Security headers - must be early
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createPipelineRouter(deps));

  app.use(notFoundHandler);
  // Error handler must be registered LAST
  app.use(errorHandler);

  return app;
}
