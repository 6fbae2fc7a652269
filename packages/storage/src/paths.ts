import { randomUUID } from 'node:crypto';
import { BLOB_EXTENSION } from '@persistor/shared';

/** `{hour}-{minute}` name used by timed append blobs. */
export function timeBucketName(now: Date): string {
  return `${now.getHours()}-${now.getMinutes()}`;
}

/**
 * `{storeKey}/{year}/{month}/{day}/{name}.txt` in local time, without zero
 * padding. `name` defaults to a fresh UUID.
 */
export function generateBlobPath(storeKey: string, name: string = randomUUID(), now: Date = new Date()): string {
  return `${storeKey}/${now.getFullYear()}/${now.getMonth() + 1}/${now.getDate()}/${name}.${BLOB_EXTENSION}`;
}

/** True when both dates fall in the same calendar minute. */
export function sameMinuteBucket(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate() &&
    a.getHours() === b.getHours() &&
    a.getMinutes() === b.getMinutes()
  );
}
