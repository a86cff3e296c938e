import { getApp, getApps, initializeApp } from 'firebase-admin/app';
import type { App } from 'firebase-admin/app';
import { getFirestore } from 'firebase-admin/firestore';
import type { Express } from 'express';
import * as functions from 'firebase-functions';
import { createApp } from './app';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { createAppContext } from './context';
import type { AppContext } from './context';
import { loadProviderMetadata } from './services/oauth/providerMetadata';
import { initSentry } from './utils/sentry';

export type BootstrapResult = {
  app: Express;
  context: AppContext;
};

/** Reuses the default Firebase app when an earlier start-up attempt created it. */
function getOrInitializeFirebaseApp(config: AppConfig): App {
  if (getApps().length > 0) {
    return getApp();
  }
  return initializeApp(
    config.firestore.projectId ? { projectId: config.firestore.projectId } : undefined,
  );
}

/**
 * Builds the process-wide state: provider discovery metadata, the Firestore
 * client and the application context around them. Safe to call again after a
 * failed attempt.
 */
export async function bootstrap(config: AppConfig = loadConfig()): Promise<BootstrapResult> {
  // Initialize Sentry BEFORE other initializations
  initSentry({ dsn: config.sentryDsn, environment: config.nodeEnv });

  const providerMetadata = await loadProviderMetadata(config.google.discoveryUrl);

  const db = getFirestore(getOrInitializeFirebaseApp(config), config.firestore.databaseId);

  const context = createAppContext({ config, db, providerMetadata });
  functions.logger.info('[bootstrap] Application context ready', {
    environment: config.nodeEnv,
    databaseId: config.firestore.databaseId,
    resetProfileOnLogin: config.auth.resetProfileOnLogin,
  });

  return { app: createApp(context), context };
}
