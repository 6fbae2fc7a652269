import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError, FormatError, StoreFailure } from '@persistor/shared';
import { MemoryBlobStore } from '@persistor/storage';
import { PushPersistor, type PushPersistorOptions } from '../src/push.js';

describe('PushPersistor', () => {
  let store: MemoryBlobStore;

  beforeEach(() => {
    store = new MemoryBlobStore();
  });

  function persistor(overrides: Partial<PushPersistorOptions> = {}): PushPersistor {
    return new PushPersistor({
      store,
      storeKey: 'orders',
      append: false,
      includeMetadata: false,
      retry: { baseDelayMs: 0 },
      ...overrides,
    });
  }

  describe('persist', () => {
    it('should store a single message in its own blob and answer OK', async () => {
      const answer = await persistor().persist({ kind: 'service-bus', body: 'hello' });

      expect(answer).toBe('OK');
      const [path] = store.paths();
      expect(path).toMatch(/^orders\/\d{4}\/\d{1,2}\/\d{1,2}\/[0-9a-f-]{36}\.txt$/);
      expect(store.content(path ?? '')).toBe('{"DATA":"hello"}');
    });

    it('should store a list of events as one blob', async () => {
      await persistor({ includeMetadata: true }).persist([
        { kind: 'event-hub', body: 'e1', properties: { device: 'd1' } },
        { kind: 'event-hub', body: 'e2' },
      ]);

      const [path] = store.paths();
      expect(store.content(path ?? '')).toBe('{"DATA":"e1","METADATA":{"device":"d1"}}\n{"DATA":"e2"}');
    });

    it('should do nothing for an empty list', async () => {
      expect(await persistor().persist([])).toBe('OK');
      expect(store.calls).toHaveLength(0);
    });

    it('should append to the blob of the current minute', async () => {
      let now = new Date(2024, 0, 1, 10, 0, 5);
      const push = persistor({ append: true, clock: () => now });

      await push.persist({ kind: 'service-bus', body: 'a' });
      now = new Date(2024, 0, 1, 10, 0, 40);
      await push.persist({ kind: 'service-bus', body: 'b' });
      now = new Date(2024, 0, 1, 10, 1, 0);
      await push.persist({ kind: 'service-bus', body: 'c' });

      expect(store.content('orders/2024/1/1/10-0.txt')).toBe('{"DATA":"a"}\n{"DATA":"b"}\n');
      expect(store.content('orders/2024/1/1/10-1.txt')).toBe('{"DATA":"c"}\n');
    });

    it('should key Event Grid deliveries by topic subscription when no store key is set', async () => {
      await persistor({ storeKey: undefined }).persist({
        kind: 'event-grid',
        data: { id: 1 },
        topic: '/subscriptions/sub-123/resourceGroups/rg/providers/Microsoft.Storage/storageAccounts/acct',
      });

      const [path] = store.paths();
      expect(path?.startsWith('sub-123/')).toBe(true);
      expect(store.content(path ?? '')).toBe('{"DATA":"{\\"id\\":1}"}');
    });

    it('should refuse messages it cannot key', async () => {
      await expect(persistor({ storeKey: undefined }).persist({ kind: 'service-bus', body: 'a' })).rejects.toBeInstanceOf(
        ConfigurationError,
      );
    });

    it('should reject when the store keeps failing', async () => {
      store.failNext('upload', new Error('storage unavailable'), 3);

      await expect(persistor().persist({ kind: 'service-bus', body: 'a' })).rejects.toBeInstanceOf(StoreFailure);
      expect(store.callsFor('upload')).toHaveLength(3);
    });

    it('should reject undecodable payloads', async () => {
      await expect(
        persistor().persist({ kind: 'service-bus', body: new Uint8Array([0xc3, 0x28]) }),
      ).rejects.toBeInstanceOf(FormatError);
      expect(store.calls).toHaveLength(0);
    });
  });

  describe('persistToOutput', () => {
    it('should write newline-joined records into the slot', async () => {
      const written: string[] = [];

      await persistor().persistToOutput(
        [
          { kind: 'service-bus', body: 'a' },
          { kind: 'service-bus', body: 'b' },
        ],
        { set: (content) => void written.push(content) },
      );

      expect(written).toEqual(['{"DATA":"a"}\n{"DATA":"b"}']);
      expect(store.calls).toHaveLength(0);
    });

    it('should fail without a slot', async () => {
      await expect(persistor().persistToOutput({ kind: 'service-bus', body: 'a' }, undefined)).rejects.toThrow(
        'No output slot given; failed to store: {"DATA":"a"}',
      );
    });
  });
});
