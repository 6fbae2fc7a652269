import { describe, it, expect } from 'vitest';
import { FormatError } from '@persistor/shared';
import { decodeBody, formatRecord, serializeRecord } from '../src/formatter.js';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('decodeBody', () => {
  it('should pass strings through', () => {
    expect(decodeBody('plain')).toBe('plain');
  });

  it('should decode UTF-8 bytes', () => {
    expect(decodeBody(Buffer.from('héllo', 'utf8'))).toBe('héllo');
  });

  it('should join byte chunks before decoding', () => {
    const euro = bytes('€');
    // Split a multi-byte character across chunks
    const chunks = [bytes('price: '), euro.slice(0, 1), euro.slice(1)];

    expect(decodeBody(chunks)).toBe('price: €');
  });

  it('should JSON-encode structured bodies', () => {
    expect(decodeBody({ id: 7, tags: ['a'] })).toBe('{"id":7,"tags":["a"]}');
    expect(decodeBody(42)).toBe('42');
    expect(decodeBody(false)).toBe('false');
  });

  it('should reject invalid UTF-8', () => {
    expect(() => decodeBody(new Uint8Array([0xff, 0xfe]))).toThrow(FormatError);
  });

  it('should reject missing bodies', () => {
    expect(() => decodeBody(undefined)).toThrow('Message has no body');
    expect(() => decodeBody(null)).toThrow(FormatError);
  });
});

describe('formatRecord', () => {
  describe('service-bus', () => {
    it('should skip metadata unless requested', () => {
      const record = formatRecord(
        { kind: 'service-bus', body: 'hello', applicationProperties: { source: 'crm' } },
        false,
      );

      expect(record).toEqual({ payload: 'hello' });
    });

    it('should stringify application properties', () => {
      const record = formatRecord(
        {
          kind: 'service-bus',
          body: bytes('{"a":1}'),
          applicationProperties: {
            source: 'crm',
            attempt: 2,
            urgent: true,
            sentAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
            missing: null,
          },
        },
        true,
      );

      expect(record).toEqual({
        payload: '{"a":1}',
        metadata: {
          source: 'crm',
          attempt: '2',
          urgent: 'true',
          sentAt: '2024-01-02T03:04:05.000Z',
        },
      });
    });

    it('should leave out empty metadata', () => {
      const record = formatRecord({ kind: 'service-bus', body: 'x', applicationProperties: {} }, true);

      expect(record).toEqual({ payload: 'x' });
    });
  });

  describe('event-hub', () => {
    it('should decode byte property values', () => {
      const record = formatRecord(
        { kind: 'event-hub', body: 'reading', properties: { device: bytes('sensor-1') } },
        true,
      );

      expect(record).toEqual({ payload: 'reading', metadata: { device: 'sensor-1' } });
    });
  });

  describe('event-grid', () => {
    it('should JSON-encode the event data and never attach metadata', () => {
      const record = formatRecord(
        { kind: 'event-grid', data: { blobUrl: 'https://example.test/a' }, topic: '/subscriptions/sub-1/x' },
        true,
      );

      expect(record).toEqual({ payload: '{"blobUrl":"https://example.test/a"}' });
    });

    it('should reject events without data', () => {
      expect(() => formatRecord({ kind: 'event-grid', data: undefined }, false)).toThrow(FormatError);
    });
  });
});

describe('serializeRecord', () => {
  it('should write DATA only when there is no metadata', () => {
    expect(serializeRecord({ payload: 'a' })).toBe('{"DATA":"a"}');
  });

  it('should write METADATA after DATA', () => {
    expect(serializeRecord({ payload: '{"x":1}', metadata: { k: 'v' } })).toBe(
      '{"DATA":"{\\"x\\":1}","METADATA":{"k":"v"}}',
    );
  });
});
