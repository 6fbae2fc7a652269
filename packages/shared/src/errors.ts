export type PersistorErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'FORMAT_ERROR'
  | 'STORE_FAILURE'
  | 'STORAGE_TARGET_ERROR'
  | 'INVOKER_ERROR';

export class PersistorError extends Error {
  readonly code: PersistorErrorCode;

  constructor(code: PersistorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid environment / request configuration. */
export class ConfigurationError extends PersistorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
  }
}

/** A message payload could not be decoded as text. The message is skipped. */
export class FormatError extends PersistorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FORMAT_ERROR', message, options);
  }
}

/**
 * A batch could not be stored after every retry. Fatal to the pull task that
 * owns the batch; the batch is neither acknowledged nor checkpointed.
 */
export class StoreFailure extends PersistorError {
  readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('STORE_FAILURE', message, options);
    this.path = path;
  }
}

/** Append mode is enabled but no append blob could be resolved. */
export class StorageTargetError extends PersistorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_TARGET_ERROR', message, options);
  }
}

export class InvokerError extends PersistorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVOKER_ERROR', message, options);
  }
}

export function isPersistorError(error: unknown): error is PersistorError {
  return error instanceof PersistorError;
}
