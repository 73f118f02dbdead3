import * as Sentry from '@sentry/node';
import config from '../config';
import logger from './logger';

let initialized = false;

/**
 * Initialize Sentry error tracking
 * Only initializes if SENTRY_DSN is set in environment
 */
export function initSentry(): void {
  if (initialized) return;

  if (!config.sentry.enabled || !config.sentry.dsn) {
    return;
  }

  Sentry.init({
    dsn: config.sentry.dsn,
    environment: config.sentry.environment,
    tracesSampleRate: config.sentry.tracesSampleRate,
    integrations: [
      Sentry.httpIntegration(),
    ],
    // Payload snapshots may hold customer content
    sendDefaultPii: false,
  });

  initialized = true;
  logger.info({ environment: config.sentry.environment }, 'Sentry initialized');
}

export function isSentryEnabled(): boolean {
  return config.sentry.enabled && initialized;
}

/**
 * Capture an exception to Sentry
 */
export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!isSentryEnabled()) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Capture a message to Sentry
 */
export function captureMessage(message: string, level: Sentry.SeverityLevel = 'info', context?: Record<string, unknown>): void {
  if (!isSentryEnabled()) return;

  Sentry.withScope((scope) => {
    scope.setLevel(level);
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureMessage(message);
  });
}

/**
 * Flush Sentry events (call before process exit)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!isSentryEnabled()) return true;
  return Sentry.close(timeout);
}
