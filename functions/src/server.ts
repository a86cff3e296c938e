import 'dotenv/config';
import * as functions from 'firebase-functions';
import { bootstrap } from './bootstrap';
import { flushSentry } from './utils/sentry';

async function main(): Promise<void> {
  const { app, context } = await bootstrap();
  const { port } = context.config;

  const server = app.listen(port, () => {
    functions.logger.info(`[server] Listening on port ${port}`);
  });

  const shutdown = (signal: string) => {
    functions.logger.info(`[server] Received ${signal}, shutting down`);
    server.close(() => {
      flushSentry()
        .catch((error) => functions.logger.warn('[server] Failed to flush Sentry:', error))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  functions.logger.error('[server] Failed to start:', error);
  process.exit(1);
});
