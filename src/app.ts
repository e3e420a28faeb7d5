import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { AppServices } from './container';
import { createApiRouter } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { rateLimiters } from './middlewares/rateLimit.middleware';
import { logger, toError } from './utils/logging';

const allowedOrigins = [appConfig.frontendUrl, ...appConfig.corsOrigins].filter((origin) => origin !== '');

const corsOptions: CorsOptions = {
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    // Requests without an Origin header come from non-browser clients
    if (!origin || allowedOrigins.includes(origin)) {
      return callback(null, true);
    }
    // Development without CORS_ORIGINS accepts any origin
    callback(null, appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0);
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

export const createApp = (services: AppServices) => {
  const app = express();

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await services.healthCheck();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('Health check failed', { error: toError(error).message });
      res.status(503).json({ status: 'error', database: 'disconnected' });
    }
  });

  // API Routes
  app.use('/api', rateLimiters.general, createApiRouter(services));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
