import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { Express } from 'express';

import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createProcessUrlRouter } from './routes/process-url.routes.js';
import type { VcPipelineService } from './services/vc-pipeline.service.js';

export interface AppOptions {
  pipeline: Pick<VcPipelineService, 'process'>;
  corsOrigin?: string;
  rateLimitPerMinute?: number;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Each processed URL costs a scrape, a model call and two embeddings
  const processLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: options.rateLimitPerMinute ?? 20,
    standardHeaders: true, // Return rate limit info in RateLimit-* headers
    legacyHeaders: false, // Disable X-RateLimit-* headers
    handler: (_req, res) => {
      res.status(429).json({
        error: {
          code: 'TOO_MANY_REQUESTS',
          message: 'Too many requests from this IP, please try again in a minute',
        },
        retryAfter: 60, // seconds
      });
    },
  });

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/process-url', processLimiter);
  app.use('/process-url', createProcessUrlRouter(options.pipeline));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
