import {
  ConfigurationError,
  MAX_TASK_COUNT,
  NotifyCategory,
  ROTATION_REFRESH_INTERVAL_MS,
  StorageTargetError,
  StoreFailure,
  errorMessage,
  generateRunId,
  interruptibleSleep,
  notify,
  nullLogger,
  reportError,
  type Logger,
} from '@persistor/shared';
import type { MessageSource } from '@persistor/sources';
import { Rotator, type BlobStore, type SaveOptions } from '@persistor/storage';
import { ProcessedCounter } from './counter.js';
import { runPullTask, type PullTaskResult } from './pull-task.js';

export interface OrchestratorOptions {
  /** Opens a dedicated source (receiver) for one task */
  openSource: (taskId: string) => MessageSource | Promise<MessageSource>;
  store: BlobStore;
  storeKey: string;
  append: boolean;
  timedAppend: boolean;
  includeMetadata: boolean;
  receiveBatchSize: number;
  receiveWaitMs: number;
  /** Time budget used when a run does not set its own */
  defaultReceiveDurationMs?: number;
  refreshIntervalMs?: number;
  retry?: SaveOptions['retry'];
  logger?: Logger;
  /** Service name used in alerts */
  service?: string;
  clock?: () => Date;
}

export interface PullRunOptions {
  taskCount: number;
  batchSize: number;
  receiveDurationMs?: number;
}

export interface PullRunResult {
  runId: string;
  processed: number;
  tasks: number;
  failedTasks: number;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Runs a set of concurrent pull tasks against one source and store key.
 */
export class Orchestrator {
  private readonly log: Logger;
  private readonly service: string;

  constructor(private readonly options: OrchestratorOptions) {
    this.log = (options.logger ?? nullLogger).child({ component: 'orchestrator', storeKey: options.storeKey });
    this.service = options.service ?? 'persistor';
  }

  async run(runOptions: PullRunOptions): Promise<PullRunResult> {
    const { taskCount, batchSize } = runOptions;
    if (!Number.isInteger(taskCount) || taskCount < 1 || taskCount > MAX_TASK_COUNT) {
      throw new ConfigurationError(`Task count must be an integer between 1 and ${MAX_TASK_COUNT}, got ${taskCount}`);
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`);
    }

    const runId = generateRunId();
    const log = this.log.child({ runId });
    const startedAt = Date.now();
    const { append, timedAppend } = this.options;

    let rotator: Rotator | undefined;
    if (append) {
      rotator = new Rotator({
        store: this.options.store,
        storeKey: this.options.storeKey,
        timeBased: timedAppend,
        logger: log,
        clock: this.options.clock,
      });
      try {
        await rotator.resolve();
      } catch (error) {
        throw new StorageTargetError(
          `Could not resolve an append blob for ${this.options.storeKey}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }

    const counter = new ProcessedCounter();
    const cancel = new AbortController();
    const finished = new AbortController();
    const refresh = rotator && timedAppend ? this.refreshLoop(rotator, finished.signal, log) : Promise.resolve();

    const receiveDurationMs = runOptions.receiveDurationMs ?? this.options.defaultReceiveDurationMs;
    let timedOut = false;
    const timer =
      receiveDurationMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            log.info('Receive duration elapsed, cancelling tasks', { receiveDurationMs });
            cancel.abort();
          }, receiveDurationMs)
        : undefined;

    log.info('Pull run started', { taskCount, batchSize, receiveDurationMs, append, timedAppend });

    const settled = await Promise.allSettled(
      Array.from({ length: taskCount }, (_, index) => {
        const taskId = String(index + 1);
        return runPullTask({
          taskId,
          openSource: () => this.options.openSource(taskId),
          store: this.options.store,
          storeKey: this.options.storeKey,
          batchSize,
          receiveBatchSize: this.options.receiveBatchSize,
          receiveWaitMs: this.options.receiveWaitMs,
          includeMetadata: this.options.includeMetadata,
          append,
          rotator,
          counter,
          signal: cancel.signal,
          logger: log,
          retry: this.options.retry,
        });
      }),
    );

    clearTimeout(timer);
    finished.abort();
    await refresh;

    const failures = settled.filter((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    const completed = settled
      .filter((outcome): outcome is PromiseFulfilledResult<PullTaskResult> => outcome.status === 'fulfilled')
      .map((outcome) => outcome.value);

    for (const failure of failures) {
      reportError(log, this.service, 'Pull task failed', failure.reason, { runId }, NotifyCategory.STORE_FAILURE);
    }
    for (const task of completed) {
      if (task.endedBy === 'receiver-error') {
        reportError(
          log,
          this.service,
          'Pull task receiver failed',
          task.receiverError,
          { runId, taskId: task.taskId },
          NotifyCategory.RECEIVER_ERROR,
        );
      }
    }

    const result: PullRunResult = {
      runId,
      processed: counter.value,
      tasks: taskCount,
      failedTasks: failures.length,
      timedOut,
      durationMs: Date.now() - startedAt,
    };

    if (failures.length === taskCount) {
      throw new StoreFailure(
        `All ${taskCount} pull tasks failed: ${errorMessage(failures[0]?.reason)}`,
        undefined,
        { cause: failures[0]?.reason },
      );
    }

    if (failures.length > 0) {
      notify({
        category: NotifyCategory.RUN_PARTIAL_FAILURE,
        title: `${this.service}: ${failures.length} of ${taskCount} pull tasks failed`,
        message: `Stored ${result.processed} messages for ${this.options.storeKey}; failed batches were handed back to the source.`,
        fields: {
          runId,
          storeKey: this.options.storeKey,
          processed: result.processed,
          failedTasks: result.failedTasks,
          tasks: result.tasks,
        },
      }).catch(() => {});
    }

    log.info('Pull run finished', { ...result });
    return result;
  }

  private async refreshLoop(rotator: Rotator, finished: AbortSignal, log: Logger): Promise<void> {
    const interval = this.options.refreshIntervalMs ?? ROTATION_REFRESH_INTERVAL_MS;
    while (!finished.aborted) {
      await interruptibleSleep(interval, finished);
      if (finished.aborted) break;
      try {
        const path = await rotator.resolve();
        log.debug('Append blob refreshed', { path });
      } catch (error) {
        reportError(log, this.service, 'Append blob refresh failed', error, {}, NotifyCategory.ROTATION_FAILED);
      }
    }
  }
}
