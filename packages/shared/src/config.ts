import { z, type ZodTypeAny } from 'zod';
import { ConfigurationError } from './errors.js';
import {
  EVENT_HUB_DEFAULT_CHECKPOINT_RATE,
  EVENT_HUB_DEFAULT_CONSUMER_GROUP,
  EVENT_HUB_DEFAULT_IDLE_TIMEOUT_SECONDS,
  EVENT_HUB_DEFAULT_MAX_BATCH,
  EVENT_HUB_DEFAULT_PREFETCH,
  SERVICE_BUS_DEFAULT_PREFETCH,
  SERVICE_BUS_RECEIVE_WAIT_MS,
} from './constants.js';

export type ServiceType = 'SERVICE_BUS_PULL' | 'EVENT_HUB_PULL' | 'PUSH';
export type PushSourceType = 'SERVICE_BUS' | 'EVENT_HUB';

export interface StorageConfig {
  connectionString: string;
  container: string;
  append: boolean;
  /** Rotate the append blob every minute. Implies `append`. */
  timedAppend: boolean;
  getMetadata: boolean;
  /** Overrides the top-level folder, which defaults to the source name */
  storeKey?: string;
}

export type ServiceBusEntity =
  | { type: 'QUEUE'; queueName: string }
  | { type: 'TOPIC'; topicName: string; subscriptionName: string };

export interface ServiceBusConfig {
  connectionString: string;
  entity: ServiceBusEntity;
  /** Max messages per receive call */
  prefetch: number;
  receiveWaitMs: number;
  receiveDurationSeconds?: number;
}

export interface EventHubConfig {
  connectionString: string;
  eventHubName: string;
  consumerGroup: string;
  prefetch: number;
  maxBatchSize: number;
  idleTimeoutSeconds: number;
  receiveDurationSeconds?: number;
  checkpoint: {
    connectionString: string;
    container: string;
    /** Acknowledged events per partition between checkpoint writes */
    updateRate: number;
  };
}

export type PersistorConfig =
  | { serviceType: 'SERVICE_BUS_PULL'; storage: StorageConfig; serviceBus: ServiceBusConfig }
  | { serviceType: 'EVENT_HUB_PULL'; storage: StorageConfig; eventHub: EventHubConfig }
  | {
      serviceType: 'PUSH';
      storage: StorageConfig;
      pushSource: 'SERVICE_BUS';
      serviceBus: ServiceBusConfig;
    }
  | {
      serviceType: 'PUSH';
      storage: StorageConfig;
      pushSource: 'EVENT_HUB';
      eventHub: EventHubConfig;
    };

type Env = Record<string, string | undefined>;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const flag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toUpperCase() === 'TRUE');

const requiredString = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }));

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const positiveInt = (defaultValue: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(defaultValue));

const optionalSeconds = z.preprocess(blankToUndefined, z.coerce.number().positive().optional());

const storageSchema = z.object({
  STORAGE_CONNECTION_STRING: requiredString('STORAGE_CONNECTION_STRING'),
  STORAGE_CONTAINER: requiredString('STORAGE_CONTAINER'),
  APPEND: flag,
  TIMED_APPEND: flag,
  GET_METADATA: flag,
  STORE_KEY: optionalString,
});

const serviceBusSchema = z
  .object({
    SERVICE_BUS_CONNECTION_STRING: requiredString('SERVICE_BUS_CONNECTION_STRING'),
    SERVICE_BUS_TYPE: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      z.enum(['QUEUE', 'TOPIC'], {
        errorMap: () => ({ message: 'SERVICE_BUS_TYPE must be QUEUE or TOPIC' }),
      }),
    ),
    SERVICE_BUS_QUEUE_NAME: optionalString,
    SERVICE_BUS_TOPIC_NAME: optionalString,
    SERVICE_BUS_SUB_NAME: optionalString,
    SERVICE_BUS_PREFETCH: positiveInt(SERVICE_BUS_DEFAULT_PREFETCH),
    SERVICE_BUS_RECEIVE_WAIT_MS: positiveInt(SERVICE_BUS_RECEIVE_WAIT_MS),
    SERVICE_BUS_RECEIVE_DURATION: optionalSeconds,
  })
  .superRefine((value, ctx) => {
    if (value.SERVICE_BUS_TYPE === 'QUEUE' && !value.SERVICE_BUS_QUEUE_NAME) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'SERVICE_BUS_QUEUE_NAME is required for QUEUE' });
    }
    if (value.SERVICE_BUS_TYPE === 'TOPIC' && (!value.SERVICE_BUS_TOPIC_NAME || !value.SERVICE_BUS_SUB_NAME)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'SERVICE_BUS_TOPIC_NAME and SERVICE_BUS_SUB_NAME are required for TOPIC',
      });
    }
  });

const eventHubSchema = z.object({
  EVENT_HUB_CONNECTION_STRING: requiredString('EVENT_HUB_CONNECTION_STRING'),
  EVENT_HUB_NAME: requiredString('EVENT_HUB_NAME'),
  EVENT_HUB_CONSUMER_GROUP: z.preprocess(
    blankToUndefined,
    z.string().default(EVENT_HUB_DEFAULT_CONSUMER_GROUP),
  ),
  EVENT_HUB_PREFETCH: positiveInt(EVENT_HUB_DEFAULT_PREFETCH),
  EVENT_HUB_PULL_MAX_BATCH: positiveInt(EVENT_HUB_DEFAULT_MAX_BATCH),
  EVENT_HUB_IDLE_TIMEOUT: positiveInt(EVENT_HUB_DEFAULT_IDLE_TIMEOUT_SECONDS),
  EVENT_HUB_RECEIVE_DURATION: optionalSeconds,
  EVENT_HUB_CHECKPOINT_CONTAINER: requiredString('EVENT_HUB_CHECKPOINT_CONTAINER'),
  EVENT_HUB_CHECKPOINT_CONNECTION_STRING: optionalString,
  EVENT_HUB_CHECKPOINT_UPDATE_RATE: positiveInt(EVENT_HUB_DEFAULT_CHECKPOINT_RATE),
});

const serviceTypeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(['SERVICE_BUS_PULL', 'EVENT_HUB_PULL', 'PUSH'], {
    errorMap: () => ({ message: 'SERVICE_TYPE must be one of SERVICE_BUS_PULL, EVENT_HUB_PULL, PUSH' }),
  }),
);

const pushSourceSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(['SERVICE_BUS', 'EVENT_HUB'], {
    errorMap: () => ({ message: 'PUSH_SOURCE must be SERVICE_BUS or EVENT_HUB' }),
  }),
);

function parseSection<T extends ZodTypeAny>(schema: T, input: unknown, section: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid ${section} configuration: ${details}`, { cause: result.error });
  }
  return result.data;
}

function toStorageConfig(env: Env): StorageConfig {
  const raw = parseSection(storageSchema, env, 'storage');
  return {
    connectionString: raw.STORAGE_CONNECTION_STRING,
    container: raw.STORAGE_CONTAINER,
    append: raw.APPEND || raw.TIMED_APPEND,
    timedAppend: raw.TIMED_APPEND,
    getMetadata: raw.GET_METADATA,
    storeKey: raw.STORE_KEY,
  };
}

function toServiceBusConfig(env: Env): ServiceBusConfig {
  const raw = parseSection(serviceBusSchema, env, 'Service Bus');
  const entity: ServiceBusEntity =
    raw.SERVICE_BUS_TYPE === 'QUEUE'
      ? { type: 'QUEUE', queueName: raw.SERVICE_BUS_QUEUE_NAME ?? '' }
      : {
          type: 'TOPIC',
          topicName: raw.SERVICE_BUS_TOPIC_NAME ?? '',
          subscriptionName: raw.SERVICE_BUS_SUB_NAME ?? '',
        };

  return {
    connectionString: raw.SERVICE_BUS_CONNECTION_STRING,
    entity,
    prefetch: raw.SERVICE_BUS_PREFETCH,
    receiveWaitMs: raw.SERVICE_BUS_RECEIVE_WAIT_MS,
    receiveDurationSeconds: raw.SERVICE_BUS_RECEIVE_DURATION,
  };
}

function toEventHubConfig(env: Env, storage: StorageConfig): EventHubConfig {
  const raw = parseSection(eventHubSchema, env, 'Event Hub');
  return {
    connectionString: raw.EVENT_HUB_CONNECTION_STRING,
    eventHubName: raw.EVENT_HUB_NAME,
    consumerGroup: raw.EVENT_HUB_CONSUMER_GROUP,
    prefetch: raw.EVENT_HUB_PREFETCH,
    maxBatchSize: raw.EVENT_HUB_PULL_MAX_BATCH,
    idleTimeoutSeconds: raw.EVENT_HUB_IDLE_TIMEOUT,
    receiveDurationSeconds: raw.EVENT_HUB_RECEIVE_DURATION,
    checkpoint: {
      // Checkpoints live in the persistor's own storage account unless told otherwise
      connectionString: raw.EVENT_HUB_CHECKPOINT_CONNECTION_STRING ?? storage.connectionString,
      container: raw.EVENT_HUB_CHECKPOINT_CONTAINER,
      updateRate: raw.EVENT_HUB_CHECKPOINT_UPDATE_RATE,
    },
  };
}

/**
 * Load and validate the persistor configuration from environment variables.
 * Throws `ConfigurationError` describing every invalid setting of the failing section.
 */
export function loadConfig(env: Env = process.env): PersistorConfig {
  const serviceType: ServiceType = parseSection(serviceTypeSchema, env.SERVICE_TYPE, 'SERVICE_TYPE');
  const storage = toStorageConfig(env);

  switch (serviceType) {
    case 'SERVICE_BUS_PULL':
      return { serviceType, storage, serviceBus: toServiceBusConfig(env) };
    case 'EVENT_HUB_PULL':
      return { serviceType, storage, eventHub: toEventHubConfig(env, storage) };
    case 'PUSH': {
      const pushSource: PushSourceType = parseSection(pushSourceSchema, env.PUSH_SOURCE, 'PUSH_SOURCE');
      return pushSource === 'SERVICE_BUS'
        ? { serviceType, storage, pushSource, serviceBus: toServiceBusConfig(env) }
        : { serviceType, storage, pushSource, eventHub: toEventHubConfig(env, storage) };
    }
  }
}

/** Name of the queue/topic/event hub the config reads from. */
export function sourceName(config: PersistorConfig): string {
  if ('serviceBus' in config) {
    const { entity } = config.serviceBus;
    return entity.type === 'QUEUE' ? entity.queueName : entity.topicName;
  }
  return config.eventHub.eventHubName;
}

/** Top-level folder for stored blobs: STORE_KEY, else the source name. */
export function resolveStoreKey(config: PersistorConfig): string {
  return config.storage.storeKey ?? sourceName(config);
}
