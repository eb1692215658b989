/**
 * Sentry wiring for the gateway and the worker.
 * Nothing is reported until initSentry() runs with a DSN.
 */

import * as Sentry from '@sentry/node';

let enabled = false;

export function initSentry(opts: { dsn?: string; environment?: string; release?: string }): boolean {
  if (!opts.dsn) return false;
  Sentry.init({
    dsn: opts.dsn,
    environment: opts.environment,
    release: opts.release,
    tracesSampleRate: 0,
  });
  enabled = true;
  return true;
}

export function isSentryEnabled(): boolean {
  return enabled;
}

/**
 * Capture error with additional context
 */
export function captureError(
  error: Error,
  context?: {
    component?: string;
    action?: string;
    requestId?: string;
    [key: string]: unknown;
  }
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.component && { component: context.component }),
      ...(context?.action && { action: context.action }),
      ...(context?.requestId && { request_id: context.requestId }),
    },
    extra: context,
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
