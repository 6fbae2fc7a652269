/**
 * Minimal blob operations the persistor needs. Paths are relative to the
 * configured container.
 */
export interface BlobStore {
  exists(path: string): Promise<boolean>;
  /** Create an empty append blob; rejects if it cannot be created. */
  createAppendable(path: string): Promise<void>;
  appendBlock(path: string, content: string): Promise<void>;
  /** Write a block blob, replacing any existing content. */
  upload(path: string, content: string): Promise<void>;
}
