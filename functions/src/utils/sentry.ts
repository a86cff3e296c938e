/**
 * Sentry error tracking.
 *
 * Enabled only when a DSN is configured (SENTRY_DSN); otherwise errors are
 * only written to the functions logger.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';

let enabled = false;

export type SentryOptions = {
    dsn?: string;
    environment: string;
};

export function initSentry(options: SentryOptions): void {
    if (enabled) {
        return;
    }

    if (!options.dsn) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        return;
    }

    Sentry.init({
        dsn: options.dsn,
        environment: options.environment,
        tracesSampleRate: options.environment === 'production' ? 0.1 : 1.0,
        enabled: options.environment !== 'test',

        beforeSend(event) {
            if (event.request?.headers?.authorization) {
                event.request.headers.authorization = '[REDACTED]';
            }
            if (event.request?.cookies) {
                event.request.cookies = {};
            }
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }
            return event;
        },

        ignoreErrors: ['ECONNRESET', 'ETIMEDOUT'],
    });

    functions.logger.info('[sentry] Sentry initialized');
    enabled = true;
}

export function isSentryEnabled(): boolean {
    return enabled;
}

/**
 * Log the error and, when Sentry is enabled, report it with optional context.
 */
export function captureException(
    error: unknown,
    context?: Record<string, unknown>,
): string | undefined {
    functions.logger.error('[error]', error);

    if (!enabled) {
        return undefined;
    }

    return Sentry.captureException(error, context ? { extra: context } : undefined);
}

/**
 * Call AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!enabled) return;
    Sentry.setupExpressErrorHandler(app);
}

export async function flushSentry(timeout = 2000): Promise<void> {
    if (!enabled) return;
    await Sentry.flush(timeout);
}
