import { createHash } from 'crypto';
import { join } from 'path';
import type { JsonValue, StampedRecord } from '@harvester/core';

/**
 * Copy of a JSON value with object keys in sorted order, so the same record
 * always prints the same way.
 */
export function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

export function formatRecord(record: StampedRecord): string {
  return JSON.stringify(sortKeys(record), null, 4);
}

/**
 * Filesystem-safe directory name for an origin or repository URI. The
 * digest suffix keeps values that flatten alike (`a/b`, `a_b`) apart.
 */
export function safeName(value: string): string {
  const name = value.replace(/^\/+/, '').replace(/[^\w.-]+/g, '_') || '_';
  const digest = createHash('sha256').update(value).digest('hex').slice(0, 8);
  return `${name}-${digest}`;
}

/** Cache directory of one origin under a base cache path. */
export function originCacheDir(base: string, origin: string): string {
  return join(base, safeName(origin));
}
