import express from 'express';
import type { Request, Response, Express } from 'express';
import { verifySignature } from './auth.js';
import { errorMessage, ProcessorError, ValidationError } from './errors.js';
import { logger } from './logger.js';
import { isMediaType } from './media/catalog.js';
import type { MediaService } from './services/media-service.js';
import type { TaskManager } from './tasks/manager.js';

export interface ServerDeps {
  media: MediaService;
  tasks: TaskManager;
  /** Bucket that request paths are resolved against. */
  sourceBucket: string;
  sharedSecret?: string;
}

const CACHE_CONTROL = 'public, max-age=3600';

const operationsOf = (req: Request): string | undefined => {
  const { operations } = req.query;
  return typeof operations === 'string' && operations.length > 0 ? operations : undefined;
};

const sendError = (res: Response, err: unknown, context: Record<string, unknown>) => {
  if (err instanceof ProcessorError) {
    if (err.statusCode >= 500) {
      logger.error({ ...context, err, code: err.code }, 'Media request failed');
    } else {
      logger.warn({ ...context, code: err.code, reason: err.message }, 'Media request rejected');
    }
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError && {
        details: { operation: err.operation, position: err.position, key: err.key, reason: err.reason },
      }),
    });
    return;
  }

  logger.error({ ...context, err }, 'Unexpected error handling media request');
  res.status(500).json({ error: `Failed to process request: ${errorMessage(err)}` });
};

export const createServer = ({ media, tasks, sourceBucket, sharedSecret }: ServerDeps): Express => {
  const app: Express = express();
  const signed = verifySignature(sharedSecret);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/tasks/:taskId', signed, async (req: Request, res: Response) => {
    const { taskId } = req.params;
    try {
      const record = await tasks.get(taskId);
      if (!record) {
        res.status(404).json({ error: 'Task not found' });
        return;
      }
      res.json(record);
    } catch (err) {
      sendError(res, err, { taskId });
    }
  });

  app.post('/async/:mediaType/*', signed, async (req: Request, res: Response) => {
    const { mediaType } = req.params;
    const sourceKey = req.params[0];
    if (!isMediaType(mediaType)) {
      res.status(404).json({ error: `Unknown media type "${mediaType}"` });
      return;
    }

    const operations = operationsOf(req);
    if (!operations) {
      res.status(400).json({ error: 'The operations query parameter is required for async processing' });
      return;
    }

    try {
      const submitted = await tasks.submit({ mediaType, sourceKey, operations });
      res.status(202).json(submitted);
    } catch (err) {
      sendError(res, err, { mediaType, sourceKey });
    }
  });

  app.get('/:mediaType/*', signed, async (req: Request, res: Response) => {
    const { mediaType } = req.params;
    const key = req.params[0];
    if (!isMediaType(mediaType)) {
      res.status(404).json({ error: `Unknown media type "${mediaType}"` });
      return;
    }

    try {
      const operations = operationsOf(req);
      const pipeline = operations ? media.buildPipeline(mediaType, key, operations) : undefined;
      const result = await media.run(mediaType, { bucket: sourceBucket, key }, pipeline);

      res.set({
        'Content-Type': result.contentType,
        'Cache-Control': CACHE_CONTROL,
        ETag: `"${result.etag}"`,
      });
      res.status(200).send(result.artifact);
    } catch (err) {
      sendError(res, err, { mediaType, key });
    }
  });

  return app;
};
