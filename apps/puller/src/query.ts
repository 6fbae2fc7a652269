import { z } from 'zod';
import {
  DEFAULT_BATCH_STORE_SIZE,
  DEFAULT_TASK_COUNT,
  MAX_ALLOWED_BATCH_SIZE,
  MAX_TASK_COUNT,
} from '@persistor/shared';

/**
 * Query of `GET /api/persist`. The batch size is capped so that a batch plus
 * the receiver's prefetch stays under the allowed maximum.
 */
export function persistQuerySchema(prefetch: number) {
  const maxBatchSize = Math.max(1, MAX_ALLOWED_BATCH_SIZE - prefetch);

  return z.object({
    N: z.coerce.number().int().min(1).max(MAX_TASK_COUNT).default(DEFAULT_TASK_COUNT),
    batch_store_size: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_BATCH_STORE_SIZE)
      .transform((size) => Math.min(size, maxBatchSize)),
    /** Seconds */
    receive_duration: z.coerce.number().positive().optional(),
  });
}

export type PersistQuery = z.infer<ReturnType<typeof persistQuerySchema>>;
