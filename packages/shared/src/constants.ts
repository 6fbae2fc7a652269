// Durable store writer
/** Attempts per batch write, including the first one */
export const STORE_RETRY_MAX_ATTEMPTS = 3;
/** Fixed delay between write attempts */
export const STORE_RETRY_BACKOFF_MS = 500;

// Destination rotation
/** How often the timed-append refresh loop re-resolves the append blob */
export const ROTATION_REFRESH_INTERVAL_MS = 5_000;
/** Extension of every blob written by the persistor */
export const BLOB_EXTENSION = 'txt';

// Pull runs
/** Records per stored batch when the trigger does not say otherwise */
export const DEFAULT_BATCH_STORE_SIZE = 200;
/** Hard ceiling for batch size + source prefetch */
export const MAX_ALLOWED_BATCH_SIZE = 10_000;
export const DEFAULT_TASK_COUNT = 1;
export const MAX_TASK_COUNT = 64;

// Service Bus
export const SERVICE_BUS_DEFAULT_PREFETCH = 512;
/** How long a receive call waits for messages before the stream counts as drained */
export const SERVICE_BUS_RECEIVE_WAIT_MS = 10_000;

// Event Hubs
export const EVENT_HUB_DEFAULT_PREFETCH = 512;
export const EVENT_HUB_DEFAULT_MAX_BATCH = 128;
export const EVENT_HUB_DEFAULT_IDLE_TIMEOUT_SECONDS = 10;
export const EVENT_HUB_DEFAULT_CHECKPOINT_RATE = 200;
export const EVENT_HUB_DEFAULT_CONSUMER_GROUP = '$Default';

// Invoker
export const INVOKER_DEFAULT_DELAY_MS = 250;
export const INVOKER_DEFAULT_TIMEOUT_MS = 180_000;

/** Body returned by the push path once a delivery is stored */
export const PUSH_ACK_RESPONSE = 'OK';
