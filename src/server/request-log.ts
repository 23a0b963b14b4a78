/**
 * Request logging
 * One line per finished response: method, path (ids redacted), status, duration
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface RequestLogEntry {
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

/**
 * Replace numeric path segments: /update/12 -> /update/[id]
 */
export function redactPath(path: string): string {
  return path.replace(/\/(-?\d+)(?=\/|$)/g, '/[id]');
}

export function formatRequestLog(entry: RequestLogEntry): string {
  const { method, path, status, durationMs } = entry;
  return `[Request] ${method} ${redactPath(path)} ${status} ${durationMs}ms`;
}

export function requestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();

    res.on('finish', () => {
      console.debug(formatRequestLog({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      }));
    });

    next();
  };
}
