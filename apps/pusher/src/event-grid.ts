import { z } from 'zod';
import type { SourceMessage } from '@persistor/sources';

export const SUBSCRIPTION_VALIDATION_EVENT = 'Microsoft.EventGrid.SubscriptionValidationEvent';

const eventSchema = z.object({
  id: z.string().optional(),
  topic: z.string().optional(),
  subject: z.string().optional(),
  eventType: z.string(),
  data: z.unknown(),
});

/** Event Grid posts either one event or an array of them. */
export const eventGridBodySchema = z.union([z.array(eventSchema).min(1), eventSchema.transform((event) => [event])]);

export type EventGridEvent = z.infer<typeof eventSchema>;

/** Validation code of a subscription handshake delivery, if the delivery is one. */
export function validationCode(events: EventGridEvent[]): string | undefined {
  const handshake = events.find((event) => event.eventType === SUBSCRIPTION_VALIDATION_EVENT);
  if (!handshake) return undefined;
  const parsed = z.object({ validationCode: z.string() }).safeParse(handshake.data);
  return parsed.success ? parsed.data.validationCode : undefined;
}

export function toSourceMessage(event: EventGridEvent): SourceMessage {
  return { kind: 'event-grid', data: event.data, topic: event.topic, eventType: event.eventType };
}
