import { onRequest } from 'firebase-functions/v2/https';
import * as functions from 'firebase-functions';
import type { Express } from 'express';
import { bootstrap } from './bootstrap';

export { createApp } from './app';
export { createAppContext } from './context';
export { loadConfig } from './config';

let appPromise: Promise<Express> | null = null;

const getApp = (): Promise<Express> => {
  if (!appPromise) {
    appPromise = bootstrap().then(({ app }) => app);
    appPromise.catch((error) => {
      functions.logger.error('[bootstrap] Failed to start API:', error);
      // Retry on the next request
      appPromise = null;
    });
  }
  return appPromise;
};

// Export the API (v2)
export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '256MiB',
    maxInstances: 10,
  },
  async (req, res) => {
    let app: Express;
    try {
      app = await getApp();
    } catch {
      res.status(500).json({
        code: 'server_error',
        message: 'Service is starting up, please retry',
      });
      return;
    }
    app(req, res);
  },
);
