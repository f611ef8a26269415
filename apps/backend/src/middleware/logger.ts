import type { Request, Response, NextFunction } from 'express';
import crypto from 'node:crypto';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Request logger middleware: attaches a short requestId to every incoming
 * request, logs method + path, and the status once the response is sent.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID().slice(0, 8);
  const started = Date.now();
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const timestamp = new Date().toISOString();
  console.log(`[${timestamp}] [${requestId}] ${req.method} ${req.path}`);
  res.on('finish', () => {
    console.log(`[${new Date().toISOString()}] [${requestId}] ${res.statusCode} ${Date.now() - started}ms`);
  });
  next();
}
