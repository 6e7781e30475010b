/**
 * HMAC-SHA256 request signing.
 *
 * Expects headers:
 *   X-Signature: hex-encoded HMAC of `${timestamp}.${method} ${originalUrl}`
 *   X-Timestamp: Unix timestamp in milliseconds
 *
 * If the shared secret is not configured, verification is skipped (dev mode).
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHmac, timingSafeEqual } from 'crypto';
import { logger } from './logger.js';

const MAX_TIMESTAMP_DRIFT_MS = 5 * 60 * 1000; // 5 minutes

export const signRequest = (secret: string, timestamp: number | string, method: string, url: string): string =>
  createHmac('sha256', secret).update(`${timestamp}.${method.toUpperCase()} ${url}`).digest('hex');

export function verifySignature(sharedSecret: string | undefined, now: () => number = Date.now): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!sharedSecret) {
      next();
      return;
    }

    const signature = req.get('x-signature');
    const timestamp = req.get('x-timestamp');

    if (!signature || !timestamp) {
      res.status(401).json({ error: 'Missing authentication headers' });
      return;
    }

    const ts = parseInt(timestamp, 10);
    if (isNaN(ts) || Math.abs(now() - ts) > MAX_TIMESTAMP_DRIFT_MS) {
      res.status(401).json({ error: 'Request expired or invalid timestamp' });
      return;
    }

    const expected = signRequest(sharedSecret, timestamp, req.method, req.originalUrl);

    const sigBuffer = Buffer.from(signature);
    const expectedBuffer = Buffer.from(expected);

    if (sigBuffer.length !== expectedBuffer.length || !timingSafeEqual(sigBuffer, expectedBuffer)) {
      logger.warn({ timestamp, path: req.path }, 'Invalid HMAC signature on media request');
      res.status(401).json({ error: 'Invalid signature' });
      return;
    }

    next();
  };
}
