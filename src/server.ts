import { timingSafeEqual } from 'crypto';
import cors from 'cors';
import express from 'express';
import { z } from 'zod';

import type { Settings } from './config';
import { httpStatusFor } from './errors';
import { logger } from './logger';
import type { CertificatePipeline } from './services/certificates/certificatePipeline';

const generateSchema = z.object({
  templateKey: z.string().min(1, 'templateKey must not be empty'),
  signatureKey: z.string().min(1, 'signatureKey must not be empty'),
  outputKey: z.string().optional(),
  outputFormat: z.enum(['docx', 'pdf']).optional(),
  data: z.record(z.unknown()),
});

interface ServerDependencies {
  settings: Settings['server'];
  pipeline: CertificatePipeline;
}

const API_KEY_HEADER = 'x-internal-api-key';

function matchesApiKey(expected: string, provided: string | undefined) {
  if (provided === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createServer({ settings, pipeline }: ServerDependencies) {
  const app = express();
  app.disable('x-powered-by');
  app.use(
    cors({
      origin: settings.corsOrigins.length > 0 ? settings.corsOrigins : false,
      credentials: true,
    })
  );
  app.use(express.json({ limit: settings.bodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  const requireApiKey: express.RequestHandler = (req, res, next) => {
    const expected = settings.internalApiKey;
    if (expected && !matchesApiKey(expected, req.get(API_KEY_HEADER))) {
      logger.warn(`[API] Rejected ${req.method} ${req.path}: bad or missing ${API_KEY_HEADER}`);
      res.status(403).json({ detail: 'Forbidden' });
      return;
    }
    next();
  };

  app.post('/generate-docx', requireApiKey, async (req, res, next) => {
    try {
      const parsed = generateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
          .join('; ');
        res.status(400).json({ detail });
        return;
      }

      const result = await pipeline.generate(parsed.data);
      if (!result.ok) {
        const status = httpStatusFor(result.error.code);
        logger.error(`[API] ${result.error.code}: ${result.error.message}`);
        res.status(status).json({ detail: result.error.message });
        return;
      }
      res.json({ key: result.value.key });
    } catch (error) {
      next(error);
    }
  });

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error & { status?: number; type?: string }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err.type === 'entity.parse.failed' || err.type === 'entity.too.large') {
        res.status(err.status ?? 400).json({ detail: err.message });
        return;
      }
      logger.error(`[API] ${err.message}`);
      res.status(500).json({ detail: err.message });
    }
  );

  return app;
}
