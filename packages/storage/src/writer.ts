import {
  STORE_RETRY_BACKOFF_MS,
  STORE_RETRY_MAX_ATTEMPTS,
  StorageTargetError,
  errorMessage,
  nullLogger,
  withRetry,
  type Logger,
  type RetryOptions,
} from '@persistor/shared';
import type { BlobStore } from './blob-store.js';
import { generateBlobPath } from './paths.js';

export interface SaveOptions {
  storeKey: string;
  append: boolean;
  /** Target append blob; required when `append` is set */
  appendPath?: string;
  logger?: Logger;
  retry?: Partial<Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs'>>;
}

export interface SaveResult {
  path: string;
  success: boolean;
}

/**
 * Store serialized records as one blob write.
 *
 * Store failures are retried with a fixed backoff and reported through
 * `success: false`; only a missing append target throws.
 */
export async function saveToStorage(
  store: BlobStore,
  records: readonly string[],
  options: SaveOptions,
): Promise<SaveResult> {
  const log = options.logger ?? nullLogger;

  if (options.append && !options.appendPath) {
    throw new StorageTargetError(`Append mode is enabled but no append blob is set for ${options.storeKey}`);
  }

  const path = options.append && options.appendPath ? options.appendPath : generateBlobPath(options.storeKey);
  const body = records.join('\n');
  const maxAttempts = options.retry?.maxAttempts ?? STORE_RETRY_MAX_ATTEMPTS;

  try {
    await withRetry(
      () => (options.append ? store.appendBlock(path, `${body}\n`) : store.upload(path, body)),
      {
        maxAttempts,
        baseDelayMs: options.retry?.baseDelayMs ?? STORE_RETRY_BACKOFF_MS,
        backoffFactor: 1,
        onRetry: (error, attempt, delayMs) => {
          log.warn('Store attempt failed, retrying', {
            path,
            attempt,
            maxAttempts,
            delayMs,
            error: error.message,
          });
        },
      },
    );
    log.debug('Batch stored', { path, recordCount: records.length });
    return { path, success: true };
  } catch (error) {
    log.error('Batch could not be stored', error, {
      path,
      recordCount: records.length,
      attempts: maxAttempts,
      reason: errorMessage(error),
    });
    return { path, success: false };
  }
}
