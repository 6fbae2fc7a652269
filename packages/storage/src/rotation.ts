import { Mutex } from 'async-mutex';
import { StorageTargetError, errorMessage, nullLogger, type Logger } from '@persistor/shared';
import type { BlobStore } from './blob-store.js';
import { generateBlobPath, sameMinuteBucket, timeBucketName } from './paths.js';

/**
 * Append destination shared by every task of one run. Only touched while
 * holding `mutex`.
 */
export interface RotationState {
  currentPath?: string;
  lastRotatedAt?: Date;
  readonly mutex: Mutex;
}

export function createRotationState(): RotationState {
  return { mutex: new Mutex() };
}

/**
 * Resolve the append blob for the current moment, creating it when it does not
 * exist yet.
 *
 * Untimed: every call picks a fresh UUID-named blob. Timed: the blob is named
 * `{hour}-{minute}` and only changes when the calendar minute differs from the
 * last rotation (a clock moving backwards also rotates).
 */
export async function resolveAppendPath(
  store: BlobStore,
  state: RotationState,
  storeKey: string,
  timeBased: boolean,
  now: Date = new Date(),
  logger: Logger = nullLogger,
): Promise<string> {
  return state.mutex.runExclusive(async () => {
    const rotate =
      !timeBased || !state.lastRotatedAt || !sameMinuteBucket(now, state.lastRotatedAt);

    if (rotate) {
      const path = generateBlobPath(storeKey, timeBased ? timeBucketName(now) : undefined, now);

      if (!(await store.exists(path))) {
        try {
          await store.createAppendable(path);
          logger.info('Created append blob', { path });
        } catch (error) {
          // Another task or instance created it first
          logger.debug('Append blob creation skipped', { path, error: errorMessage(error) });
        }
      }

      state.currentPath = path;
      state.lastRotatedAt = now;
    }

    if (!state.currentPath) {
      throw new StorageTargetError(`No append blob resolved for ${storeKey}`);
    }
    return state.currentPath;
  });
}

export interface RotatorOptions {
  store: BlobStore;
  storeKey: string;
  /** Name blobs by minute and rotate on minute boundaries */
  timeBased: boolean;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Owns one RotationState. Created per orchestrator run or push persistor.
 */
export class Rotator {
  private readonly state = createRotationState();
  private readonly clock: () => Date;

  constructor(private readonly options: RotatorOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  get timeBased(): boolean {
    return this.options.timeBased;
  }

  resolve(): Promise<string> {
    const { store, storeKey, timeBased, logger } = this.options;
    return resolveAppendPath(store, this.state, storeKey, timeBased, this.clock(), logger);
  }

  /** Path from the last resolve. Reads are unlocked; a write may land on the previous minute's blob. */
  current(): string | undefined {
    return this.state.currentPath;
  }
}
