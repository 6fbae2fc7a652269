import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  InvokerError,
  NotifyCategory,
  isPersistorError,
  errorMessage,
  notify,
} from '@persistor/shared';

// At most one Slack notification per distinct 5xx message per minute
const errorNotifyLastSent = new Map<string, number>();
const ERROR_NOTIFY_COOLDOWN_MS = 60_000;

function shouldNotify5xx(message: string): boolean {
  const now = Date.now();
  const last = errorNotifyLastSent.get(message) ?? 0;
  if (now - last < ERROR_NOTIFY_COOLDOWN_MS) return false;

  errorNotifyLastSent.set(message, now);
  if (errorNotifyLastSent.size > 200) {
    const cutoff = now - 5 * 60_000;
    for (const [key, sentAt] of errorNotifyLastSent) {
      if (sentAt < cutoff) errorNotifyLastSent.delete(key);
    }
  }
  return true;
}

export function _resetErrorNotifyState(): void {
  errorNotifyLastSent.clear();
}

function alertCategory(err: unknown): NotifyCategory {
  if (err instanceof InvokerError) return NotifyCategory.INVOKER_ERROR;
  return isPersistorError(err) ? NotifyCategory.RUN_FAILED : NotifyCategory.TRIGGER_ERROR;
}

/**
 * Validation and configuration problems answer 400; everything else 500.
 */
export function createErrorHandler(service: string): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof ZodError) {
      req.log?.warn('Invalid request', { issues: err.issues.length });
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request parameters',
          details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
      });
      return;
    }

    if (err instanceof ConfigurationError) {
      req.log?.warn('Invalid configuration', { message: err.message });
      res.status(400).json({ error: { code: err.code, message: err.message } });
      return;
    }

    const message = errorMessage(err);
    req.log?.error('Request failed', err);

    if (shouldNotify5xx(message)) {
      notify({
        category: alertCategory(err),
        title: `${service}: request failed`,
        message,
        fields: { method: req.method, path: req.path, requestId: req.requestId },
        error: err,
      }).catch(() => {});
    }

    res.status(500).json({
      error: {
        code: isPersistorError(err) ? err.code : 'INTERNAL_ERROR',
        message: isPersistorError(err) ? message : 'Internal server error',
      },
    });
  };
}
