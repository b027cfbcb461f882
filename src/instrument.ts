import * as Sentry from '@sentry/node';

/**
 * Start Sentry error tracking. Without a DSN the gateway runs untracked and
 * the error handler's capture calls are no-ops.
 */
export function initSentry(
  dsn: string | undefined,
  environment: string,
  tracesSampleRate = 0.1
): void {
  if (!dsn) {
    console.log('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment,
    tracesSampleRate,
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  console.log(`Sentry initialized for environment: ${environment}`);
}

// Re-export Sentry for use in error handler
export { Sentry };
