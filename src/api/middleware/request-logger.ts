import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'http' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const durationMs = Date.now() - start;
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : req.path === '/health' ? 'debug' : 'info';

    log[level]({ method: req.method, path: req.path, statusCode: res.statusCode, durationMs }, 'HTTP request');
  });

  next();
}
