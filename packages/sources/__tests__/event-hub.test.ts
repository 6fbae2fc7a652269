import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { createMockLogger, type MockLogger } from '@persistor/shared/testing';
import { EventHubPullSource, type HubEvent, type HubEventSink } from '../src/event-hub.js';

function hubEvent(body: string): HubEvent & { checkpoint: Mock<[], Promise<void>> } {
  return { body, checkpoint: vi.fn(async () => {}) };
}

describe('EventHubPullSource', () => {
  let sink: HubEventSink | undefined;
  let closeSubscription: Mock<[], Promise<void>>;
  let closeClient: Mock<[], Promise<void>>;
  let logger: MockLogger;
  let source: EventHubPullSource;

  function connectedSink(): HubEventSink {
    if (!sink) throw new Error('not subscribed');
    return sink;
  }

  beforeEach(() => {
    sink = undefined;
    closeSubscription = vi.fn(async () => {});
    closeClient = vi.fn(async () => {});
    logger = createMockLogger();
    source = new EventHubPullSource({
      subscribe: (s) => {
        sink = s;
        return { close: closeSubscription };
      },
      closeClient,
      checkpointRate: 2,
      logger,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should subscribe on the first receive and hand over delivered events', async () => {
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000 });
    const delivered = connectedSink().deliver('0', [hubEvent('a'), hubEvent('b')]);

    const deliveries = await pending;

    expect(deliveries.map((d) => d.message)).toEqual([
      { kind: 'event-hub', body: 'a', properties: undefined },
      { kind: 'event-hub', body: 'b', properties: undefined },
    ]);
    await expect(delivered).resolves.toBeUndefined();
  });

  it('should hold the partition batch until every event is taken', async () => {
    const first = source.receive(2, { maxWaitTimeInMs: 60_000 });
    let released = false;
    const delivered = connectedSink()
      .deliver('0', [hubEvent('a'), hubEvent('b'), hubEvent('c')])
      .then(() => {
        released = true;
      });

    expect(await first).toHaveLength(2);
    await Promise.resolve();
    expect(released).toBe(false);

    const second = await source.receive(2, { maxWaitTimeInMs: 60_000 });
    await delivered;

    expect(second.map((d) => d.message)).toEqual([{ kind: 'event-hub', body: 'c', properties: undefined }]);
    expect(released).toBe(true);
  });

  it('should end the receive when the subscription reports an idle partition', async () => {
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000 });

    await connectedSink().deliver('0', []);

    expect(await pending).toEqual([]);
  });

  it('should keep waiting while another partition is still delivering', async () => {
    const first = source.receive(10, { maxWaitTimeInMs: 60_000 });
    void connectedSink().deliver('1', [hubEvent('a')]);
    expect(await first).toHaveLength(1);

    const second = source.receive(10, { maxWaitTimeInMs: 60_000 });
    await connectedSink().deliver('0', []);
    void connectedSink().deliver('1', [hubEvent('b')]);

    const deliveries = await second;
    expect(deliveries.map((d) => d.message)).toEqual([{ kind: 'event-hub', body: 'b', properties: undefined }]);
  });

  it('should end the receive once every partition is idle', async () => {
    const first = source.receive(10, { maxWaitTimeInMs: 60_000 });
    void connectedSink().deliver('1', [hubEvent('a')]);
    await first;

    const second = source.receive(10, { maxWaitTimeInMs: 60_000 });
    await connectedSink().deliver('0', []);
    await connectedSink().deliver('1', []);

    expect(await second).toEqual([]);
  });

  it('should return nothing after the wait time', async () => {
    vi.useFakeTimers();
    const pending = source.receive(10, { maxWaitTimeInMs: 1_000 });

    await vi.advanceTimersByTimeAsync(1_000);

    await expect(pending).resolves.toEqual([]);
  });

  it('should stop waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000, abortSignal: controller.signal });

    controller.abort();

    await expect(pending).resolves.toEqual([]);
  });

  it('should checkpoint the latest event once the cadence is reached', async () => {
    const events = [hubEvent('a'), hubEvent('b'), hubEvent('c')];
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000 });
    void connectedSink().deliver('0', events);
    const deliveries = await pending;

    expect(await source.acknowledge(deliveries.slice(0, 1))).toBe(1);
    expect(events[0]?.checkpoint).not.toHaveBeenCalled();

    expect(await source.acknowledge(deliveries.slice(1))).toBe(2);
    expect(events[2]?.checkpoint).toHaveBeenCalledTimes(1);
    expect(events[1]?.checkpoint).not.toHaveBeenCalled();
  });

  it('should flush pending checkpoints and shut down on close', async () => {
    const events = [hubEvent('a')];
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000 });
    void connectedSink().deliver('3', events);
    await source.acknowledge(await pending);

    await source.close();

    expect(events[0]?.checkpoint).toHaveBeenCalledTimes(1);
    expect(closeSubscription).toHaveBeenCalledTimes(1);
    expect(closeClient).toHaveBeenCalledTimes(1);
  });

  it('should release held partition batches on close', async () => {
    const pending = source.receive(1, { maxWaitTimeInMs: 60_000 });
    const delivered = connectedSink().deliver('0', [hubEvent('a'), hubEvent('b')]);
    await pending;

    await source.close();

    await expect(delivered).resolves.toBeUndefined();
    expect(await source.receive(10, { maxWaitTimeInMs: 60_000 })).toEqual([]);
  });

  it('should not checkpoint released events', async () => {
    const events = [hubEvent('a'), hubEvent('b')];
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000 });
    void connectedSink().deliver('0', events);
    const deliveries = await pending;

    await source.release(deliveries);

    expect(await source.acknowledge(deliveries)).toBe(0);
    await source.close();
    expect(events[1]?.checkpoint).not.toHaveBeenCalled();
  });

  it('should log subscription errors', async () => {
    const pending = source.receive(10, { maxWaitTimeInMs: 60_000 });
    connectedSink().fail(new Error('partition stolen'), '2');
    void connectedSink().deliver('0', []);
    await pending;

    const [entry] = logger.getLogsByLevel('error');
    expect(entry?.message).toBe('Event Hub subscription error');
    expect(entry?.data).toMatchObject({ partitionId: '2', component: 'event-hub-source' });
  });
});
