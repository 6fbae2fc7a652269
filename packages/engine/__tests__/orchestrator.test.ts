import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigurationError, StorageTargetError, StoreFailure, _resetSlackState } from '@persistor/shared';
import { createMockLogger, type MockLogger } from '@persistor/shared/testing';
import { FakeBroker, serviceBusMessages } from '@persistor/sources/testing';
import { MemoryBlobStore } from '@persistor/storage';
import { Orchestrator, type OrchestratorOptions } from '../src/orchestrator.js';

const bodies = (count: number) => Array.from({ length: count }, (_, i) => `m${i + 1}`);

function lineCount(content: string | undefined): number {
  return content ? content.split('\n').filter((line) => line.length > 0).length : 0;
}

/** Rejects every write of the batch holding m1 */
class FailingFirstBatchStore extends MemoryBlobStore {
  async upload(path: string, content: string): Promise<void> {
    if (content.includes('"m1"')) throw new Error('storage unavailable');
    return super.upload(path, content);
  }
}

describe('Orchestrator', () => {
  let store: MemoryBlobStore;
  let logger: MockLogger;

  beforeEach(() => {
    store = new MemoryBlobStore();
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function orchestrator(broker: FakeBroker, overrides: Partial<OrchestratorOptions> = {}): Orchestrator {
    return new Orchestrator({
      openSource: () => broker.open(),
      store,
      storeKey: 'orders',
      append: false,
      timedAppend: false,
      includeMetadata: false,
      receiveBatchSize: 100,
      receiveWaitMs: 60_000,
      retry: { baseDelayMs: 0 },
      logger,
      ...overrides,
    });
  }

  it('should drain a shared backlog with concurrent tasks', async () => {
    const broker = new FakeBroker(serviceBusMessages(bodies(1000)));

    const result = await orchestrator(broker).run({ taskCount: 5, batchSize: 200 });

    expect(result).toMatchObject({ processed: 1000, tasks: 5, failedTasks: 0, timedOut: false });
    const uploads = store.callsFor('upload');
    expect(uploads.reduce((sum, call) => sum + lineCount(call.content), 0)).toBe(1000);
    expect(uploads.every((call) => lineCount(call.content) <= 200)).toBe(true);
    expect(broker.sources).toHaveLength(5);
    expect(broker.sources.every((source) => source.closed)).toBe(true);
    expect(broker.acknowledged).toHaveLength(1000);
  });

  it('should cancel every task when the receive duration elapses', async () => {
    const broker = new FakeBroker(serviceBusMessages(bodies(37)), { holdWhenEmpty: true });

    const result = await orchestrator(broker).run({ taskCount: 2, batchSize: 200, receiveDurationMs: 50 });

    expect(result.timedOut).toBe(true);
    expect(result.processed).toBe(37);
    expect(store.callsFor('upload').reduce((sum, call) => sum + lineCount(call.content), 0)).toBe(37);
  });

  it('should fall back to the configured receive duration', async () => {
    const broker = new FakeBroker([], { holdWhenEmpty: true });

    const result = await orchestrator(broker, { defaultReceiveDurationMs: 20 }).run({ taskCount: 1, batchSize: 10 });

    expect(result.timedOut).toBe(true);
    expect(result.processed).toBe(0);
  });

  it('should reject out-of-range task counts', async () => {
    const broker = new FakeBroker();

    await expect(orchestrator(broker).run({ taskCount: 0, batchSize: 10 })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(orchestrator(broker).run({ taskCount: 65, batchSize: 10 })).rejects.toBeInstanceOf(ConfigurationError);
    expect(broker.sources).toHaveLength(0);
  });

  it('should throw when every task failed', async () => {
    store.failNext('upload', new Error('storage unavailable'), 100);
    const broker = new FakeBroker(serviceBusMessages(bodies(4)));

    await expect(
      orchestrator(broker, { receiveBatchSize: 2 }).run({ taskCount: 2, batchSize: 2 }),
    ).rejects.toBeInstanceOf(StoreFailure);
    expect(broker.acknowledged).toHaveLength(0);
  });

  it('should report partial failures without throwing', async () => {
    store = new FailingFirstBatchStore();
    const broker = new FakeBroker(serviceBusMessages(bodies(4)));

    const result = await orchestrator(broker, { receiveBatchSize: 2 }).run({ taskCount: 2, batchSize: 2 });

    expect(result.failedTasks).toBe(1);
    expect(result.processed).toBe(2);
    expect(logger.hasLog('error', 'Pull task failed')).toBe(true);
  });

  it('should alert a partial failure with the run counts', async () => {
    _resetSlackState();
    vi.stubEnv('SLACK_WEBHOOK_PIPELINE', 'https://hooks.slack.test/pipeline');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const posted: unknown[] = [];
    const fetchSpy = vi.fn((_url: string, init: { body: string }) => {
      posted.push(JSON.parse(init.body));
      return Promise.resolve({ ok: true, status: 200, text: () => Promise.resolve('ok') });
    });
    vi.stubGlobal('fetch', fetchSpy);
    store = new FailingFirstBatchStore();
    const broker = new FakeBroker(serviceBusMessages(bodies(4)));

    try {
      const result = await orchestrator(broker, { receiveBatchSize: 2 }).run({ taskCount: 2, batchSize: 2 });
      await vi.waitFor(() => expect(fetchSpy).toHaveBeenCalledTimes(1));

      expect(posted[0]).toMatchObject({
        text: 'persistor: 1 of 2 pull tasks failed',
        attachments: [
          {
            blocks: expect.arrayContaining([
              {
                type: 'section',
                fields: [
                  { type: 'mrkdwn', text: `*runId*\n${result.runId}` },
                  { type: 'mrkdwn', text: '*storeKey*\norders' },
                  { type: 'mrkdwn', text: '*processed*\n2' },
                  { type: 'mrkdwn', text: '*failedTasks*\n1' },
                  { type: 'mrkdwn', text: '*tasks*\n2' },
                ],
              },
            ]),
          },
        ],
      });
    } finally {
      vi.unstubAllGlobals();
      vi.unstubAllEnvs();
      vi.restoreAllMocks();
    }
  });

  describe('append mode', () => {
    it('should fail before starting tasks when no append blob can be resolved', async () => {
      store.failNext('exists', new Error('forbidden'));
      const broker = new FakeBroker(serviceBusMessages(['a']));

      await expect(orchestrator(broker, { append: true }).run({ taskCount: 1, batchSize: 10 })).rejects.toBeInstanceOf(
        StorageTargetError,
      );
      expect(broker.sources).toHaveLength(0);
    });

    it('should write one untimed blob per run', async () => {
      const broker = new FakeBroker(serviceBusMessages(['a', 'b', 'c']));

      await orchestrator(broker, { append: true }).run({ taskCount: 1, batchSize: 2 });

      const [path] = store.paths();
      expect(store.paths()).toHaveLength(1);
      expect(path).toMatch(/^orders\/\d{4}\/\d{1,2}\/\d{1,2}\/[0-9a-f-]{36}\.txt$/);
      expect(store.content(path ?? '')).toBe('{"DATA":"a"}\n{"DATA":"b"}\n{"DATA":"c"}\n');
    });

    it('should rotate the timed blob from the refresh loop', async () => {
      vi.useFakeTimers();
      let now = new Date(2024, 0, 1, 10, 0, 30);
      const broker = new FakeBroker([], { holdWhenEmpty: true });

      const pending = orchestrator(broker, { append: true, timedAppend: true, clock: () => now }).run({
        taskCount: 1,
        batchSize: 10,
        receiveDurationMs: 12_000,
      });
      now = new Date(2024, 0, 1, 10, 1, 2);

      await vi.advanceTimersByTimeAsync(5_000);
      expect(store.paths()).toEqual(['orders/2024/1/1/10-0.txt', 'orders/2024/1/1/10-1.txt']);

      store.failNext('exists', new Error('throttled'));
      now = new Date(2024, 0, 1, 10, 2, 0);
      await vi.advanceTimersByTimeAsync(5_000);
      expect(logger.hasLog('error', 'Append blob refresh failed')).toBe(true);

      await vi.advanceTimersByTimeAsync(2_000);
      const result = await pending;

      expect(result.timedOut).toBe(true);
      expect(store.paths()).toHaveLength(2);
    });
  });
});
