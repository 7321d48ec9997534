import * as Sentry from '@sentry/node';
import logger from './logger.js';

const SENSITIVE_ENV_KEYS = [
  'SUPABASE_SERVICE_ROLE_KEY',
  'OPENROUTER_API_KEY',
  'ANTHROPIC_API_KEY',
  'SENTRY_DSN',
];

const SENSITIVE_KEY_FRAGMENTS = ['key', 'token', 'secret', 'authorization'];

let initialized = false;

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend(event) {
      const extra = event.extra;
      if (extra) {
        for (const key of SENSITIVE_ENV_KEYS) {
          if (key in extra) {
            extra[key] = '[REDACTED]';
          }
        }
      }

      // Scrub breadcrumb data that might contain API keys
      for (const crumb of event.breadcrumbs ?? []) {
        const crumbData = crumb.data;
        if (!crumbData) continue;
        for (const key of Object.keys(crumbData)) {
          const lowerKey = key.toLowerCase();
          if (SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment))) {
            crumbData[key] = '[REDACTED]';
          }
        }
      }

      return event;
    },
  });

  initialized = true;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!initialized) return;

  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!initialized) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, 'Sentry flush failed during shutdown');
  }
}
