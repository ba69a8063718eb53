import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';

/**
 * Logs each request with method, path, status code and duration, tagged
 * with a request id that is also echoed back in `X-Request-Id`.
 */
export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();
  const { method, path } = req;

  const requestId = req.header('x-request-id') ?? uuidv4();
  res.setHeader('X-Request-Id', requestId);

  if (!config.server.logRequests) {
    next();
    return;
  }

  res.on('finish', () => {
    const duration = Date.now() - start;
    const { statusCode } = res;

    const logFn = statusCode >= 500 ? console.error : statusCode >= 400 ? console.warn : console.log;

    logFn(
      `[${new Date().toISOString()}] ${method} ${path} ${statusCode} ${duration}ms`,
      {
        requestId,
        ip: req.ip,
      }
    );
  });

  next();
}
