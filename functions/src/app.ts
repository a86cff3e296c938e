import express from 'express';
import type { Express } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import * as functions from 'firebase-functions';
import type { AppContext } from './context';
import { createErrorHandler } from './middlewares/errorHandler';
import { createAuthRouter } from './routes/auth';
import { createStatusRouter } from './routes/status';
import { setupSentryErrorHandler } from './utils/sentry';

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8080'];

export function resolveAllowedOrigins(context: AppContext): '*' | string[] {
  const { corsAllowedOrigins, isProduction } = context.config;
  if (corsAllowedOrigins === '*') {
    return '*';
  }

  const devOrigins = isProduction ? [] : DEV_ORIGINS;
  const frontendOrigin = new URL(context.config.frontendUrl).origin;
  return Array.from(new Set([...corsAllowedOrigins, frontendOrigin, ...devOrigins]));
}

export function createApp(context: AppContext): Express {
  const app = express();

  // Trust proxy - the OAuth callback URL is derived from the forwarded protocol/host
  app.set('trust proxy', true);

  const allowedOrigins = resolveAllowedOrigins(context);

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin || allowedOrigins === '*' || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
      callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  // Security headers with helmet.js
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    hsts: context.config.isProduction
      ? { maxAge: 31536000, includeSubDomains: true }
      : false,
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(cookieParser(context.config.secretKey));

  // Routes
  const api = express.Router();
  api.get('/', (req, res) => {
    res.json({ message: 'Hello World' });
  });
  api.use('/auth', createAuthRouter(context));
  api.use('/status', createStatusRouter(context));
  app.use('/api', api);

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);

  // Centralized error handling
  app.use(createErrorHandler({ exposeErrors: !context.config.isProduction }));

  return app;
}
