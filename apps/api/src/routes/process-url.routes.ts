import { Router } from 'express';
import { body, validationResult } from 'express-validator';
import { AppError } from '../middleware/error-handler.js';
import type { Request, Response, NextFunction } from 'express';
import type { VcPipelineService } from '../services/vc-pipeline.service.js';

// Validation helper
const validate = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    next(new AppError(400, 'VALIDATION_ERROR', 'Invalid input', { errors: errors.array() }));
    return;
  }
  next();
};

export function createProcessUrlRouter(pipeline: Pick<VcPipelineService, 'process'>): Router {
  const router = Router();

  // Scrape a VC website, store it if new and list similar firms
  router.post(
    '/',
    [
      body('url')
        .isString()
        .trim()
        .isURL({ protocols: ['http', 'https'], require_protocol: true })
        .withMessage('url must be an http(s) URL'),
    ],
    validate,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const result = await pipeline.process(req.body.url as string);
        res.json(result);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
