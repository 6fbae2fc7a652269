import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { PushPersistor } from '@persistor/engine';
import { createMockLogger } from '@persistor/shared/testing';
import { MemoryBlobStore } from '@persistor/storage';
import { createApp } from '../src/app.js';
import { SUBSCRIPTION_VALIDATION_EVENT } from '../src/event-grid.js';

describe('pusher app', () => {
  let store: MemoryBlobStore;
  let app: ReturnType<typeof createApp>;

  function appWith(storeKey?: string) {
    const eventGrid = new PushPersistor({ store, storeKey, append: false, includeMetadata: false });
    return createApp({ eventGrid, logger: createMockLogger() });
  }

  beforeEach(() => {
    store = new MemoryBlobStore();
    app = appWith();
  });

  it('should answer the health check', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.text).toBe('OK');
  });

  describe('POST /api/eventgrid', () => {
    it('should answer the subscription validation handshake', async () => {
      const res = await request(app)
        .post('/api/eventgrid')
        .send([{ eventType: SUBSCRIPTION_VALIDATION_EVENT, data: { validationCode: 'code-123' } }]);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ validationResponse: 'code-123' });
      expect(store.paths()).toEqual([]);
    });

    it('should store events under the subscription id of their topic', async () => {
      const res = await request(app)
        .post('/api/eventgrid')
        .send([
          {
            id: 'e1',
            topic: '/subscriptions/sub-123/resourceGroups/rg/providers/Microsoft.Storage/storageAccounts/acct',
            eventType: 'Microsoft.Storage.BlobCreated',
            data: { size: 42 },
          },
          { id: 'e2', eventType: 'Microsoft.Storage.BlobCreated', data: 'plain' },
        ]);

      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');

      const [path] = store.paths();
      expect(path).toMatch(/^sub-123\/\d{4}\/\d{1,2}\/\d{1,2}\/[0-9a-f-]+\.txt$/);
      expect(store.content(path ?? '')).toBe('{"DATA":"{\\"size\\":42}"}\n{"DATA":"\\"plain\\""}');
    });

    it('should prefer a configured store key', async () => {
      app = appWith('grid');

      await request(app)
        .post('/api/eventgrid')
        .send({ topic: '/subscriptions/sub-123/resourceGroups/rg', eventType: 'Custom.Event', data: { ok: true } });

      expect(store.paths()[0]).toMatch(/^grid\//);
    });

    it('should answer 400 when no store key can be derived', async () => {
      const res = await request(app)
        .post('/api/eventgrid')
        .send([{ eventType: 'Custom.Event', data: { ok: true } }]);

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('CONFIGURATION_ERROR');
    });

    it('should reject a body that is not an event', async () => {
      const res = await request(app).post('/api/eventgrid').send({ hello: 'world' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });
  });
});
