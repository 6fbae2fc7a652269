/**
 * Provider-specific message as handed over by a source.
 */
export type SourceMessage =
  | {
      kind: 'service-bus';
      body: unknown;
      applicationProperties?: Record<string, unknown>;
    }
  | {
      kind: 'event-hub';
      body: unknown;
      properties?: Record<string, unknown>;
    }
  | {
      kind: 'event-grid';
      data: unknown;
      /** Full topic resource id, `/subscriptions/{id}/resourceGroups/...` */
      topic?: string;
      eventType?: string;
    };

/** A received message plus whatever the source needs to settle it later. */
export interface Delivery {
  readonly message: SourceMessage;
}

export interface ReceiveOptions {
  /** How long to wait for the first message before returning an empty batch */
  maxWaitTimeInMs: number;
  abortSignal?: AbortSignal;
}

/**
 * Pull side of a message broker. One instance per pull task.
 */
export interface MessageSource {
  /** Resolves with no deliveries when the stream is idle or the signal aborts. */
  receive(maxCount: number, options: ReceiveOptions): Promise<Delivery[]>;
  /** Mark deliveries as stored. Resolves with how many were acknowledged. */
  acknowledge(deliveries: readonly Delivery[]): Promise<number>;
  /** Hand deliveries back for redelivery. */
  release(deliveries: readonly Delivery[]): Promise<void>;
  close(): Promise<void>;
}

export interface PersistedRecord {
  payload: string;
  metadata?: Record<string, string>;
}
