import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';

import { ComposeQrCommand, type ComposeQrHandler } from '@/application/qr-composition/index.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { toHttpError } from './error-response.js';
import { parseQrForm } from './qr-form.js';

export const SERVICE_NAME = 'qr-studio';

export interface HttpAppDependencies {
  readonly handler: ComposeQrHandler;
  readonly maxUploadBytes: number;
}

export function createHttpApp(deps: HttpAppDependencies): Express {
  const logger = createChildLogger({ module: 'HttpApp' });
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });

  app.disable('x-powered-by');
  app.use(cors());
  app.use(express.urlencoded({ extended: false }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: SERVICE_NAME });
  });

  app.post('/qr', upload.single('picture'), async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.once('close', () => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client closed the connection'));
      }
    });

    try {
      const payload = parseQrForm(req.body, req.file);
      const outcome = await deps.handler.execute(new ComposeQrCommand(payload), controller.signal);

      res.status(200);
      res.attachment(outcome.fileName);
      res.type(outcome.mimeType);
      if (outcome.warnings.length > 0) {
        res.set('X-QR-Warnings', outcome.warnings.join(','));
      }
      res.send(outcome.bytes);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toHttpError(error, deps.maxUploadBytes);

    if (status >= 500) {
      logger.error({ path: req.path, status, code: body.error }, 'Request failed');
    }

    res.status(status).json(body);
  });

  return app;
}
