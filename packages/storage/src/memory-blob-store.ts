import type { BlobStore } from './blob-store.js';

type Operation = 'exists' | 'createAppendable' | 'appendBlock' | 'upload';

export interface BlobCall {
  operation: Operation;
  path: string;
  content?: string;
}

/**
 * In-process BlobStore for tests and local runs. Failures can be queued per
 * operation with `failNext`.
 */
export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, { kind: 'block' | 'append'; content: string }>();
  readonly calls: BlobCall[] = [];
  private failures = new Map<Operation, Error[]>();

  failNext(operation: Operation, error: Error = new Error(`${operation} failed`), times = 1): void {
    const queued = this.failures.get(operation) ?? [];
    for (let i = 0; i < times; i++) queued.push(error);
    this.failures.set(operation, queued);
  }

  content(path: string): string | undefined {
    return this.blobs.get(path)?.content;
  }

  paths(): string[] {
    return [...this.blobs.keys()];
  }

  callsFor(operation: Operation): BlobCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  private record(operation: Operation, path: string, content?: string): void {
    this.calls.push({ operation, path, content });
    const error = this.failures.get(operation)?.shift();
    if (error) throw error;
  }

  async exists(path: string): Promise<boolean> {
    this.record('exists', path);
    return this.blobs.has(path);
  }

  async createAppendable(path: string): Promise<void> {
    this.record('createAppendable', path);
    if (this.blobs.has(path)) {
      throw new Error(`Blob already exists: ${path}`);
    }
    this.blobs.set(path, { kind: 'append', content: '' });
  }

  async appendBlock(path: string, content: string): Promise<void> {
    this.record('appendBlock', path, content);
    const blob = this.blobs.get(path);
    if (!blob || blob.kind !== 'append') {
      throw new Error(`Append blob not found: ${path}`);
    }
    blob.content += content;
  }

  async upload(path: string, content: string): Promise<void> {
    this.record('upload', path, content);
    this.blobs.set(path, { kind: 'block', content });
  }
}
