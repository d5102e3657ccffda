import type { NextFunction, Request, Response } from 'express';

import { Logger } from '../utils/logger';

import type { LogContext } from '../utils/logger';

// Extend Express Request interface to include logging properties
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

// Query parameters whose values never reach the logs
const SENSITIVE_QUERY_KEYS = new Set(['hub.verify_token']);

/**
 * Generate a unique correlation ID for request tracing.
 */
function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `req-${timestamp}-${random}`;
}

/**
 * Copy the query string for logging, masking verification tokens.
 */
export function getSafeQuery(query: Request['query']): LogContext | undefined {
  const keys = Object.keys(query);
  if (keys.length === 0) return undefined;

  const safe: LogContext = {};
  for (const key of keys) {
    safe[key] = SENSITIVE_QUERY_KEYS.has(key) ? '****' : query[key];
  }
  return safe;
}

/**
 * Extract safe headers for logging.
 */
function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  if (req.headers['content-type']) {
    headers.contentType = req.headers['content-type'];
  }
  if (req.headers['content-length']) {
    headers.contentLength = req.headers['content-length'];
  }
  if (req.headers['user-agent']) {
    headers.userAgent = req.headers['user-agent'];
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches logger to request, logs request and response.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = generateCorrelationId();
  req.startTime = Date.now();
  req.log = new Logger(req.correlationId);

  req.log.info('Incoming request', {
    headers: getSafeHeaders(req),
    ip: req.ip ?? req.socket.remoteAddress,
    method: req.method,
    path: req.path,
    query: getSafeQuery(req.query),
  });

  res.on('finish', () => {
    const durationMs = Date.now() - req.startTime;
    const statusCode = res.statusCode;
    const logLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    const context = {
      contentLength: res.get('content-length'),
      durationMs,
      method: req.method,
      path: req.path,
      statusCode,
    };

    if (logLevel === 'error') {
      req.log.error('Request completed', undefined, context);
    } else {
      req.log[logLevel]('Request completed', context);
    }
  });

  next();
}
