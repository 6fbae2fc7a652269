import { optionalEnv } from './env.js';
import { sleep, withRetry } from './retry.js';

export type NotifyChannel = 'errors' | 'pipeline' | 'ops';

export enum NotifyCategory {
  // Pull runs
  RUN_PARTIAL_FAILURE = 'run_partial_failure',
  RUN_FAILED = 'run_failed',

  // Storage
  STORE_FAILURE = 'store_failure',
  ROTATION_FAILED = 'rotation_failed',

  // Sources
  RECEIVER_ERROR = 'receiver_error',

  // Hosts
  CONFIGURATION_ERROR = 'configuration_error',
  TRIGGER_ERROR = 'trigger_error',
  INVOKER_ERROR = 'invoker_error',
}

type Severity = 'failure' | 'warning';

const ROUTES: Record<NotifyCategory, { channel: NotifyChannel; severity: Severity }> = {
  [NotifyCategory.RUN_PARTIAL_FAILURE]: { channel: 'pipeline', severity: 'warning' },
  [NotifyCategory.RUN_FAILED]: { channel: 'errors', severity: 'failure' },
  [NotifyCategory.STORE_FAILURE]: { channel: 'errors', severity: 'failure' },
  [NotifyCategory.ROTATION_FAILED]: { channel: 'ops', severity: 'warning' },
  [NotifyCategory.RECEIVER_ERROR]: { channel: 'ops', severity: 'warning' },
  [NotifyCategory.CONFIGURATION_ERROR]: { channel: 'errors', severity: 'failure' },
  [NotifyCategory.TRIGGER_ERROR]: { channel: 'errors', severity: 'failure' },
  [NotifyCategory.INVOKER_ERROR]: { channel: 'errors', severity: 'failure' },
};

const SEVERITY_COLOR: Record<Severity, string> = {
  failure: '#dc3545',
  warning: '#ffc107',
};

export type AlertFieldValue = string | number | boolean | undefined;

export interface NotifyOptions {
  category: NotifyCategory;
  title: string;
  message: string;
  /** Facts shown as a two-column grid (runId, storeKey, task counts, partitionId); undefined values are left out */
  fields?: Record<string, AlertFieldValue>;
  /** Shown in its own section with its first stack frames */
  error?: unknown;
}

interface TextObject {
  type: 'plain_text' | 'mrkdwn';
  text: string;
}

export type SlackBlock =
  | { type: 'header'; text: TextObject }
  | { type: 'section'; text: TextObject }
  | { type: 'section'; fields: TextObject[] }
  | { type: 'context'; elements: TextObject[] };

export interface SlackPayload {
  /** Notification preview */
  text: string;
  attachments: Array<{ color: string; blocks: SlackBlock[] }>;
}

// Block Kit limits
const HEADER_MAX = 150;
const SECTION_MAX = 3000;
const FIELD_MAX = 2000;
const FIELDS_PER_SECTION = 10;

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength - 3) + '...' : text;
}

function mrkdwn(text: string): TextObject {
  return { type: 'mrkdwn', text };
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return `*Error:* \`${String(error)}\``;
  const frames = (error.stack ?? '')
    .split('\n')
    .slice(1, 5)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const heading = `*Error:* \`${error.name}: ${error.message}\``;
  return frames.length > 0 ? `${heading}\n\`\`\`${frames.join('\n')}\`\`\`` : heading;
}

/**
 * Block Kit payload for one alert: header, message, fact grid, error and a
 * category/environment/time footer.
 */
export function buildSlackPayload(options: NotifyOptions, environment: string, sentAt: Date): SlackPayload {
  const title = truncate(options.title, HEADER_MAX);
  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: title } },
    { type: 'section', text: mrkdwn(truncate(options.message, SECTION_MAX) || '_(no details)_') },
  ];

  const facts = Object.entries(options.fields ?? {})
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .slice(0, FIELDS_PER_SECTION)
    .map(([name, value]) => mrkdwn(truncate(`*${name}*\n${String(value)}`, FIELD_MAX)));
  if (facts.length > 0) blocks.push({ type: 'section', fields: facts });

  if (options.error !== undefined) {
    blocks.push({ type: 'section', text: mrkdwn(truncate(describeError(options.error), SECTION_MAX)) });
  }

  blocks.push({
    type: 'context',
    elements: [mrkdwn(`${options.category} | env: ${environment} | ${sentAt.toISOString()}`)],
  });

  return { text: title, attachments: [{ color: SEVERITY_COLOR[ROUTES[options.category].severity], blocks }] };
}

/** A 5xx answer; anything else is final */
class WebhookUnavailable extends Error {}

async function post(webhookUrl: string, payload: SlackPayload): Promise<void> {
  await withRetry(
    async () => {
      const response = await fetch(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
      if (response.ok) return;

      const detail = `Slack webhook returned ${response.status}: ${await response.text()}`;
      throw response.status >= 500 ? new WebhookUnavailable(detail) : new Error(detail);
    },
    {
      maxAttempts: 4,
      baseDelayMs: 1000,
      backoffFactor: 2,
      isRetryable: (error) => error instanceof WebhookUnavailable,
    },
  );
}

// Slack allows about one message per second per webhook
const MIN_SEND_INTERVAL_MS = 500;

/** Sends on one channel, one at a time and spaced out */
class ChannelQueue {
  private tail: Promise<void> = Promise.resolve();
  private lastSentAt = 0;

  /** `send` must not reject */
  enqueue(send: () => Promise<void>): Promise<void> {
    const run = this.tail.then(async () => {
      const wait = this.lastSentAt + MIN_SEND_INTERVAL_MS - Date.now();
      if (wait > 0) await sleep(wait);
      this.lastSentAt = Date.now();
      await send();
    });
    this.tail = run;
    return run;
  }
}

const queues = new Map<NotifyChannel, ChannelQueue>();
const missingWebhookWarned = new Set<NotifyChannel>();

function webhookEnvVar(channel: NotifyChannel): string {
  return `SLACK_WEBHOOK_${channel.toUpperCase()}`;
}

/**
 * Post an alert to the Slack channel its category routes to
 * (`SLACK_WEBHOOK_ERRORS`, `SLACK_WEBHOOK_PIPELINE` or `SLACK_WEBHOOK_OPS`).
 *
 * An unset webhook skips the alert with one warning per channel. 5xx answers
 * are retried with backoff. The returned promise never rejects; send failures
 * go to the console.
 *
 * @example
 * ```typescript
 * await notify({
 *   category: NotifyCategory.RUN_PARTIAL_FAILURE,
 *   title: 'puller: 1 of 4 pull tasks failed',
 *   message: 'Stored 800 messages for orders',
 *   fields: { runId: 'abc', storeKey: 'orders', processed: 800, failedTasks: 1, tasks: 4 },
 * });
 * ```
 */
export function notify(options: NotifyOptions): Promise<void> {
  const { channel } = ROUTES[options.category];
  const envVar = webhookEnvVar(channel);
  const webhookUrl = optionalEnv(envVar, '');

  if (!webhookUrl) {
    if (!missingWebhookWarned.has(channel)) {
      missingWebhookWarned.add(channel);
      console.warn(`[slack] ${envVar} not configured, ${channel} channel notifications will be skipped`);
    }
    return Promise.resolve();
  }

  let queue = queues.get(channel);
  if (!queue) {
    queue = new ChannelQueue();
    queues.set(channel, queue);
  }

  return queue.enqueue(async () => {
    try {
      await post(webhookUrl, buildSlackPayload(options, optionalEnv('ENVIRONMENT', 'unknown'), new Date()));
    } catch (err) {
      console.error('[slack] Failed to send notification', {
        category: options.category,
        title: options.title,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });
}

/** Reset internal state (for testing only) */
export function _resetSlackState(): void {
  missingWebhookWarned.clear();
  queues.clear();
}
