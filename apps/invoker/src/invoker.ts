import { InvokerError, errorMessage, nullLogger, sleep, type Logger } from '@persistor/shared';

export interface InvokerOptions {
  /** URL of the puller's `/api/persist` route */
  targetUrl: string | undefined;
  delayMs: number;
  timeoutMs: number;
  logger?: Logger;
  fetch?: FetchLike;
}

export type FetchLike = (url: URL, init: { signal: AbortSignal }) => Promise<{ status: number; text(): Promise<string> }>;

type CallOutcome = { text: string } | { error: InvokerError };

export interface InvokeRequest {
  count: number;
  tasksPerCall: number;
  batchStoreSize?: number;
}

/**
 * Fans a pull run out over several puller instances. Calls are started one
 * after another, `delayMs` apart, and awaited together.
 */
export class Invoker {
  private readonly log: Logger;
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: InvokerOptions) {
    this.log = (options.logger ?? nullLogger).child({ component: 'invoker' });
    this.fetchFn = options.fetch ?? fetch;
  }

  /** Response text of each call keyed by its index; a timed out call maps to "". */
  async invoke(request: InvokeRequest): Promise<Record<string, string>> {
    const targetUrl = this.options.targetUrl;
    if (!targetUrl) {
      throw new InvokerError('No target URL configured (INVOKER_TARGET_URL)');
    }

    const url = new URL(targetUrl);
    url.searchParams.set('N', String(request.tasksPerCall));
    if (request.batchStoreSize !== undefined) {
      url.searchParams.set('batch_store_size', String(request.batchStoreSize));
    }

    this.log.info('Invoking pullers', { count: request.count, tasksPerCall: request.tasksPerCall });

    // Each call resolves to an outcome; none rejects
    const calls: Promise<CallOutcome>[] = [];
    for (let i = 0; i < request.count; i++) {
      calls.push(this.call(url, i));
      if (i < request.count - 1) {
        await sleep(this.options.delayMs);
      }
    }

    const outcomes = await Promise.all(calls);
    const failed = outcomes.find((outcome) => 'error' in outcome);
    if (failed && 'error' in failed) {
      throw failed.error;
    }
    return Object.fromEntries(outcomes.map((outcome, index) => [String(index), 'text' in outcome ? outcome.text : '']));
  }

  private async call(url: URL, index: number): Promise<CallOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const res = await this.fetchFn(url, { signal: controller.signal });
      const text = await res.text();
      this.log.debug('Puller answered', { index, status: res.status });
      return { text };
    } catch (error) {
      if (controller.signal.aborted) {
        this.log.warn('Puller call timed out', { index, timeoutMs: this.options.timeoutMs });
        return { text: '' };
      }
      this.log.error('Puller call failed', error, { index });
      return { error: new InvokerError(`Puller call ${index} failed: ${errorMessage(error)}`, { cause: error }) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
