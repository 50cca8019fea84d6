import type { Request, Response, NextFunction, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import { config } from '../config/environment';
import { ServiceError } from '../utils/error-handling';
import { Logger } from '../utils/logger';

const logger = new Logger('HTTP');

const passThrough: RequestHandler = (_req, _res, next) => next();

export const createRateLimiter = (
  windowMs: number = config.security.rateLimitWindowMs,
  limit: number = config.security.rateLimitMaxRequests
): RequestHandler =>
  rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'Too many price requests, slow down and retry shortly.',
      code: 'RATE_LIMIT_EXCEEDED',
    },
  });

const rateLimitDisabled = config.server.nodeEnv === 'development' || config.server.nodeEnv === 'test';

export const generalRateLimit: RequestHandler = rateLimitDisabled ? passThrough : createRateLimiter();

export const corsOptions: cors.CorsOptions = {
  // Server-to-server calls send no Origin; outside production every origin is accepted
  origin: (origin, callback) => {
    const allowed = !origin
      || config.server.nodeEnv !== 'production'
      || config.security.corsAllowedOrigins.includes(origin);

    callback(allowed ? null : new Error(`Origin ${origin} not allowed by CORS`), allowed);
  },
  methods: ['GET', 'POST'],
  optionsSuccessStatus: 200,
};

// JSON-only API: nothing is ever framed or rendered
export const helmetConfig = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-site' },
});

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export const validateContentType = (req: Request, res: Response, next: NextFunction): void => {
  if (BODY_METHODS.has(req.method) && !req.is('application/json')) {
    res.status(400).json({ error: 'Request body must be sent as application/json', code: 'INVALID_CONTENT_TYPE' });
    return;
  }
  next();
};

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  COMMODITY_NOT_FOUND: 404,
  NO_PRICE_DATA: 422,
};

export function statusForErrorCode(code: string): number {
  return STATUS_BY_CODE[code] ?? 500;
}

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: 'ROUTE_NOT_FOUND' });
};

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof ServiceError) {
    const status = statusForErrorCode(err.code);
    if (status >= 500) {
      logger.error('Unhandled service error', { code: err.code, path: req.path, message: err.message });
    }
    res.status(status).json({ error: err.message, code: err.code });
    return;
  }

  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_JSON' });
    return;
  }

  logger.error('Unhandled error', { path: req.path, message: err.message, stack: err.stack });

  const message = config.server.nodeEnv === 'production' ? 'Internal server error' : err.message;
  res.status(500).json({ error: message, code: 'INTERNAL_SERVER_ERROR' });
};

// Clients can opt out with an x-no-compression header
export const compressionMiddleware = compression({
  filter: (req, res) => !req.headers['x-no-compression'] && compression.filter(req, res),
});

export const securityMiddleware: RequestHandler[] = [
  helmetConfig,
  cors(corsOptions),
  compressionMiddleware,
  generalRateLimit,
  validateContentType,
];
