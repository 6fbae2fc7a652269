import { FormatError, errorMessage } from '@persistor/shared';
import type { PersistedRecord, SourceMessage } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new FormatError(`${what} is not valid UTF-8: ${errorMessage(error)}`, { cause: error });
  }
}

function isByteChunks(value: unknown): value is Uint8Array[] {
  return Array.isArray(value) && value.length > 0 && value.every((chunk) => chunk instanceof Uint8Array);
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    joined.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return joined;
}

function toJson(value: unknown, what: string): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    throw new FormatError(`${what} cannot be encoded as JSON: ${errorMessage(error)}`, { cause: error });
  }
  if (encoded === undefined) {
    throw new FormatError(`${what} cannot be encoded as JSON`);
  }
  return encoded;
}

/**
 * Turn a message body into text: strings pass through, bytes are strict UTF-8,
 * anything else is JSON-encoded.
 */
export function decodeBody(body: unknown): string {
  if (body === undefined || body === null) {
    throw new FormatError('Message has no body');
  }
  if (typeof body === 'string') return body;
  if (body instanceof Uint8Array) return decodeUtf8(body, 'Message body');
  if (isByteChunks(body)) return decodeUtf8(concatChunks(body), 'Message body');
  return toJson(body, 'Message body');
}

function metadataValue(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return decodeUtf8(value, 'Metadata value');
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return toJson(value, 'Metadata value');
  return String(value);
}

function toMetadata(properties: Record<string, unknown> | undefined): Record<string, string> | undefined {
  if (!properties) return undefined;

  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(properties)) {
    const text = metadataValue(value);
    if (text !== undefined) metadata[key] = text;
  }
  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

/**
 * Extract the payload (and, when asked, the metadata) of a source message.
 * Throws `FormatError` when the payload cannot be decoded.
 */
export function formatRecord(message: SourceMessage, includeMetadata: boolean): PersistedRecord {
  switch (message.kind) {
    case 'event-grid':
      if (message.data === undefined) {
        throw new FormatError('Event Grid event has no data');
      }
      return { payload: toJson(message.data, 'Event Grid data') };
    case 'service-bus': {
      const payload = decodeBody(message.body);
      const metadata = includeMetadata ? toMetadata(message.applicationProperties) : undefined;
      return metadata ? { payload, metadata } : { payload };
    }
    case 'event-hub': {
      const payload = decodeBody(message.body);
      const metadata = includeMetadata ? toMetadata(message.properties) : undefined;
      return metadata ? { payload, metadata } : { payload };
    }
  }
}

/** JSON line written to storage: `{"DATA": ..., "METADATA": {...}}`. */
export function serializeRecord(record: PersistedRecord): string {
  return JSON.stringify(record.metadata ? { DATA: record.payload, METADATA: record.metadata } : { DATA: record.payload });
}
