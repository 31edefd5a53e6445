import { createHash } from 'node:crypto';
import type { IngestionKey } from '../core/types/index.js';

/**
 * Stable shard of a key; every change to one key lands on the same shard, so
 * per-key order is per-shard order.
 */
export function shardFor(key: IngestionKey, shardCount: number): number {
  const digest = createHash('sha1').update(`${key.created_by}#${key.id}`).digest();
  return digest.readUInt32BE(0) % shardCount;
}
