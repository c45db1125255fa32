import express, { Request, Response, NextFunction, Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { AppSettings, settings } from './config';
import { AppServices } from './api/appServices';
import { createBearerAuth } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { RateLimiter, createRateLimitMiddleware } from './services/rateLimiter';
import { createDocumentRoutes } from './api/routes/documentRoutes';
import { createHealthRoutes } from './api/routes/healthRoutes';
import { createHistoryRoutes } from './api/routes/historyRoutes';
import { createQueryRoutes } from './api/routes/queryRoutes';
import { createLogger } from './utils/logger';

const logger = createLogger('App');

const resolveAllowedOrigins = (allowedOriginsStr: string): string[] | boolean => {
  if (allowedOriginsStr === '*') {
    if (process.env.NODE_ENV === 'production') {
      logger.warn('SECURITY WARNING: CORS is configured to allow all origins (*) in production.');
    }
    return true;
  }

  const origins = allowedOriginsStr.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0);
  if (origins.length === 0) {
    logger.warn('cors_allowed_origins_str was not \'*\' and parsed to empty list. Defaulting to localhost only.');
    return ['http://localhost:3000', 'https://localhost:3000'];
  }
  return origins;
};

export const createApp = (services: AppServices, appSettings: AppSettings = settings.app) => {
  const app = express();

  app.use(helmet());

  // Trust proxy for rate limiting
  app.set('trust proxy', 1);

  app.use(express.json({ limit: '10mb' }));

  // Request correlation ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = `req_${uuidv4()}`;
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);
    next();
  });

  const allowedOrigins = resolveAllowedOrigins(appSettings.cors_allowed_origins_str);
  app.use(cors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin'],
    exposedHeaders: [
      'X-Correlation-ID',
      'X-RateLimit-Limit',
      'X-RateLimit-Remaining',
      'X-RateLimit-Reset'
    ],
    maxAge: 86400,
  }));

  logger.info(`CORS middleware configured with origins: ${Array.isArray(allowedOrigins) ? allowedOrigins.join(', ') : 'all origins (*)'}`);

  app.use(createHealthRoutes(services));

  const apiRouter = Router();
  const rateLimitConfig = {
    maxRequests: appSettings.rate_limit_max_requests,
    perSeconds: appSettings.rate_limit_per_seconds,
  };
  apiRouter.use(createRateLimitMiddleware(rateLimitConfig, services.rateLimiter ?? new RateLimiter(rateLimitConfig)));
  apiRouter.use(createBearerAuth(appSettings.auth_token));
  apiRouter.use(createQueryRoutes(services));
  apiRouter.use(createDocumentRoutes(services));
  apiRouter.use(createHistoryRoutes(services));
  app.use(apiRouter);

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  logger.info(`${appSettings.name} v${appSettings.version} application instance created.`);

  return app;
};
