/**
 * The fetch loop shared by every connector: stamp, push, flush, yield.
 */

import type { WriteAheadCache } from '../cache';
import { CacheError } from '../errors';
import type { RecordStamper } from '../identity';
import type { RawRecord, StampedRecord } from '../schemas';

export interface HarvestOptions {
  cache?: WriteAheadCache;
  // Epoch seconds; records updated earlier are skipped
  since?: number;
}

/**
 * Dates at or before the epoch mean "no lower bound", never "now".
 */
export function sinceToEpoch(since?: Date | null): number | undefined {
  if (!since) return undefined;

  const ms = since.getTime();
  if (Number.isNaN(ms)) {
    throw new TypeError('since is an invalid date');
  }
  return ms > 0 ? ms / 1000 : undefined;
}

export async function* harvest<R extends RawRecord>(
  records: AsyncIterable<R>,
  stamper: RecordStamper<R>,
  options: HarvestOptions = {}
): AsyncGenerator<StampedRecord, void, undefined> {
  const { cache, since } = options;

  cache?.purgeQueue();

  try {
    for await (const raw of records) {
      const item = stamper.stamp(raw);
      if (since !== undefined && item.updated_on < since) continue;

      if (cache) {
        cache.push(item);
        cache.flush();
      }
      yield item;
    }
  } finally {
    // Consumer stopped early, or threshold left entries staged
    if (cache && cache.pending > 0) {
      cache.flush(true);
    }
  }
}

export async function* replay(cache?: WriteAheadCache): AsyncGenerator<StampedRecord, void, undefined> {
  if (!cache) {
    throw new CacheError('cache instance was not provided');
  }
  yield* cache.retrieve();
}
