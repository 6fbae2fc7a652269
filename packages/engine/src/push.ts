import {
  ConfigurationError,
  PUSH_ACK_RESPONSE,
  StoreFailure,
  capErrorMessage,
  nullLogger,
  type Logger,
} from '@persistor/shared';
import { formatRecord, serializeRecord, type SourceMessage } from '@persistor/sources';
import { Rotator, saveToStorage, type BlobStore, type SaveOptions } from '@persistor/storage';

/** Destination handed in by the host instead of a store path. */
export interface OutputSlot {
  set(content: string): void | Promise<void>;
}

export interface PushPersistorOptions {
  store: BlobStore;
  /** Top-level folder; Event Grid deliveries fall back to the topic's subscription id */
  storeKey?: string;
  /** Append to a blob rotated every minute instead of one blob per delivery */
  append: boolean;
  includeMetadata: boolean;
  logger?: Logger;
  retry?: SaveOptions['retry'];
  clock?: () => Date;
}

/**
 * Stores messages a host has already received. A rejection leaves the
 * delivery unsettled so the broker can retry it.
 */
export class PushPersistor {
  private readonly rotators = new Map<string, Rotator>();
  private readonly log: Logger;

  constructor(private readonly options: PushPersistorOptions) {
    this.log = (options.logger ?? nullLogger).child({ component: 'push-persistor' });
  }

  async persist(messages: SourceMessage | SourceMessage[]): Promise<string> {
    const list = Array.isArray(messages) ? messages : [messages];
    const first = list[0];
    if (!first) return PUSH_ACK_RESPONSE;

    const storeKey = this.storeKeyFor(first);
    const records = this.serialize(list);
    const appendPath = this.options.append ? await this.rotatorFor(storeKey).resolve() : undefined;

    const saved = await saveToStorage(this.options.store, records, {
      storeKey,
      append: this.options.append,
      appendPath,
      logger: this.log,
      retry: this.options.retry,
    });

    if (!saved.success) {
      throw new StoreFailure(`Failed to store ${records.length} pushed message(s)`, saved.path);
    }
    this.log.debug('Pushed messages stored', { path: saved.path, count: records.length });
    return PUSH_ACK_RESPONSE;
  }

  /** Write newline-joined records into a host-provided slot. */
  async persistToOutput(messages: SourceMessage | SourceMessage[], output: OutputSlot | undefined): Promise<void> {
    const records = this.serialize(Array.isArray(messages) ? messages : [messages]);
    if (!output) {
      throw new StoreFailure(`No output slot given; failed to store: ${capErrorMessage(records.join('\n'), 500)}`);
    }
    await output.set(records.join('\n'));
  }

  private serialize(messages: SourceMessage[]): string[] {
    return messages.map((message) => serializeRecord(formatRecord(message, this.options.includeMetadata)));
  }

  private storeKeyFor(message: SourceMessage): string {
    if (this.options.storeKey) return this.options.storeKey;
    if (message.kind === 'event-grid' && message.topic) {
      // /subscriptions/{id}/resourceGroups/...
      const subscriptionId = message.topic.split('/')[2];
      if (subscriptionId) return subscriptionId;
    }
    throw new ConfigurationError('No store key configured for pushed messages');
  }

  private rotatorFor(storeKey: string): Rotator {
    let rotator = this.rotators.get(storeKey);
    if (!rotator) {
      rotator = new Rotator({
        store: this.options.store,
        storeKey,
        timeBased: true,
        logger: this.log,
        clock: this.options.clock,
      });
      this.rotators.set(storeKey, rotator);
    }
    return rotator;
  }
}
