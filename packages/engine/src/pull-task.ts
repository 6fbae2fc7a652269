import {
  FormatError,
  StoreFailure,
  errorMessage,
  nullLogger,
  type Logger,
} from '@persistor/shared';
import { formatRecord, serializeRecord, type Delivery, type MessageSource } from '@persistor/sources';
import { saveToStorage, type BlobStore, type Rotator, type SaveOptions } from '@persistor/storage';
import type { ProcessedCounter } from './counter.js';

export interface PullTaskOptions {
  taskId: string;
  openSource: () => MessageSource | Promise<MessageSource>;
  store: BlobStore;
  storeKey: string;
  /** Records per stored blob write */
  batchSize: number;
  /** Max deliveries per receive call */
  receiveBatchSize: number;
  receiveWaitMs: number;
  includeMetadata: boolean;
  append: boolean;
  /** Supplies the append blob; required when `append` is set */
  rotator?: Rotator;
  counter: ProcessedCounter;
  signal: AbortSignal;
  logger?: Logger;
  retry?: SaveOptions['retry'];
}

export type PullTaskEnd = 'idle' | 'cancelled' | 'receiver-error';

export interface PullTaskResult {
  taskId: string;
  /** Messages this task stored and acknowledged */
  processed: number;
  batches: number;
  skipped: number;
  endedBy: PullTaskEnd;
  receiverError?: unknown;
}

/**
 * Receive, batch, store and acknowledge until the stream goes idle, the
 * signal aborts or the receiver fails.
 *
 * A batch is acknowledged only after it is stored. When a batch cannot be
 * stored its deliveries go back to the source and the task rejects with
 * `StoreFailure`. On every other exit the partial batch is flushed and
 * deliveries that never made it into a batch are released.
 */
export async function runPullTask(options: PullTaskOptions): Promise<PullTaskResult> {
  const { taskId, store, storeKey, batchSize, signal } = options;
  const log = (options.logger ?? nullLogger).child({ taskId });

  const result: PullTaskResult = { taskId, processed: 0, batches: 0, skipped: 0, endedBy: 'idle' };
  let records: string[] = [];
  let batchDeliveries: Delivery[] = [];

  // Deliveries of the latest receive call from `next` onwards are not in a batch yet
  let received: Delivery[] = [];
  let next = 0;

  const source = await options.openSource();

  const acknowledge = async (deliveries: Delivery[]): Promise<number> => {
    try {
      return await source.acknowledge(deliveries);
    } catch (error) {
      log.error('Stored batch could not be acknowledged', error, { count: deliveries.length });
      return 0;
    }
  };

  const releaseUnstored = async (deliveries: Delivery[]): Promise<void> => {
    if (deliveries.length === 0) return;
    try {
      await source.release(deliveries);
    } catch (error) {
      log.warn('Deliveries could not be released', { count: deliveries.length, error: errorMessage(error) });
    }
  };

  const flush = async (): Promise<void> => {
    const batch = records;
    const deliveries = batchDeliveries;
    records = [];
    batchDeliveries = [];

    let stored = false;
    let path: string | undefined;
    try {
      const saved = await saveToStorage(store, batch, {
        storeKey,
        append: options.append,
        appendPath: options.rotator?.current(),
        logger: log,
        retry: options.retry,
      });
      stored = saved.success;
      path = saved.path;
    } finally {
      if (!stored) await releaseUnstored(deliveries);
    }

    if (!stored) {
      throw new StoreFailure(`Failed to store a batch of ${batch.length} records`, path);
    }

    result.batches += 1;
    const acknowledged = await acknowledge(deliveries);
    options.counter.add(acknowledged);
    result.processed += acknowledged;
    log.debug('Batch stored and acknowledged', { path, recordCount: batch.length, acknowledged });
  };

  try {
    receiving: while (!signal.aborted) {
      try {
        received = await source.receive(options.receiveBatchSize, {
          maxWaitTimeInMs: options.receiveWaitMs,
          abortSignal: signal,
        });
        next = 0;
      } catch (error) {
        received = [];
        next = 0;
        if (signal.aborted) break;
        log.error('Receiver failed, ending task', error);
        result.endedBy = 'receiver-error';
        result.receiverError = error;
        break;
      }

      if (received.length === 0) break;

      while (next < received.length) {
        if (signal.aborted) break receiving;

        const delivery = received[next];
        let line: string;
        try {
          line = serializeRecord(formatRecord(delivery.message, options.includeMetadata));
        } catch (error) {
          if (!(error instanceof FormatError)) throw error;
          next += 1;
          log.warn('Skipping undecodable message', { error: error.message });
          result.skipped += 1;
          await source.release([delivery]);
          continue;
        }

        next += 1;
        records.push(line);
        batchDeliveries.push(delivery);
        if (records.length >= batchSize) await flush();
      }
    }

    if (signal.aborted && result.endedBy === 'idle') result.endedBy = 'cancelled';

    const pending = received.slice(next);
    received = [];
    if (pending.length > 0) {
      log.info('Releasing deliveries received after cancellation', { count: pending.length });
      await source.release(pending);
    }
    if (records.length > 0) await flush();
  } catch (error) {
    await releaseUnstored([...batchDeliveries, ...received.slice(next)]);
    throw error;
  } finally {
    try {
      await source.close();
    } catch (error) {
      log.warn('Source did not close cleanly', { error: errorMessage(error) });
    }
  }

  log.info('Pull task finished', {
    endedBy: result.endedBy,
    processed: result.processed,
    batches: result.batches,
    skipped: result.skipped,
  });
  return result;
}
