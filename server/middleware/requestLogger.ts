import type { Request, Response, NextFunction } from 'express';
import { log } from '../log';

const SLOW_REQUEST_THRESHOLD_MS = 10000;

/**
 * Logs every /api call once the response is finished. Planning requests fan
 * out to several upstream calls, so the slow threshold is generous.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (!path.startsWith("/api")) return;

    const duration = Date.now() - start;
    log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);

    if (duration > SLOW_REQUEST_THRESHOLD_MS) {
      console.warn(`🐢 [Slow Request] ${req.method} ${path} took ${duration}ms`);
    }
  });

  next();
}
