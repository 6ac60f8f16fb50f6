/**
 * Record identity and incrementality.
 *
 * Every record leaving a connector carries a stable `uuid` derived from where
 * it came from, and an `updated_on` watermark pulled out of the record itself.
 */

import { createHash } from 'crypto';
import { MalformedRecordError } from './errors';
import type { RawRecord, StampedRecord } from './schemas';

export type IdComponent = string | number;

/**
 * Returns the update instant of a record: epoch seconds, a numeric string,
 * an ISO-8601 string or a Date. `undefined` means the field is missing.
 */
export type TimestampExtractor<R extends RawRecord = RawRecord> = (
  record: R
) => number | string | Date | null | undefined;

export interface RecordIdentity<R extends RawRecord = RawRecord> {
  origin: string;
  backendName: string;
  backendVersion: string;
  discriminator: (record: R) => IdComponent[];
  updatedAt: TimestampExtractor<R>;
}

/**
 * SHA-256 over length-prefixed components, so `('a:b', 'c')` and
 * `('a', 'b:c')` never hash the same input.
 */
export function computeId(
  origin: IdComponent,
  backendName: IdComponent,
  backendVersion: IdComponent,
  ...discriminator: IdComponent[]
): string {
  const parts = [origin, backendName, backendVersion, ...discriminator].map((part, position) => {
    if (typeof part === 'number') {
      if (!Number.isFinite(part)) {
        throw new TypeError(`identifier component ${position} is not a finite number`);
      }
      return String(part);
    }
    if (typeof part !== 'string') {
      throw new TypeError(`identifier component ${position} must be a string or number`);
    }
    if (part.length === 0) {
      throw new TypeError(`identifier component ${position} is empty`);
    }
    return part;
  });

  const hash = createHash('sha256');
  hash.update(parts.map(p => `${p.length}:${p}`).join('|'), 'utf8');
  return hash.digest('hex');
}

export function extractTimestamp<R extends RawRecord>(
  record: R,
  extractor: TimestampExtractor<R>
): number {
  const value = extractor(record);

  if (value === undefined || value === null) {
    throw new MalformedRecordError('record has no update timestamp');
  }

  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new MalformedRecordError('record update timestamp is an invalid date');
    }
    return ms / 1000;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MalformedRecordError(`record update timestamp is not finite: ${value}`);
    }
    return value;
  }

  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const ms = Date.parse(trimmed);
  if (trimmed.length === 0 || Number.isNaN(ms)) {
    throw new MalformedRecordError(`record update timestamp is not a valid date: '${value}'`);
  }
  return ms / 1000;
}

/**
 * Field extractor for the common case of a timestamp stored under one key.
 * Raises with the field name when it is missing.
 */
export function fieldTimestamp<R extends RawRecord>(field: string): TimestampExtractor<R> {
  return (record: R) => {
    const value = record[field];
    if (value === undefined || value === null) {
      throw new MalformedRecordError(`record is missing '${field}'`, field);
    }
    if (typeof value === 'number' || typeof value === 'string') {
      return value;
    }
    throw new MalformedRecordError(`record field '${field}' is not a timestamp`, field);
  };
}

export class RecordStamper<R extends RawRecord = RawRecord> {
  constructor(
    private identity: RecordIdentity<R>,
    private clock: () => number = () => Date.now() / 1000
  ) {}

  get origin(): string {
    return this.identity.origin;
  }

  stamp(record: R): StampedRecord {
    const { origin, backendName, backendVersion } = this.identity;

    return {
      backend_name: backendName,
      backend_version: backendVersion,
      origin,
      uuid: computeId(origin, backendName, backendVersion, ...this.identity.discriminator(record)),
      updated_on: extractTimestamp(record, this.identity.updatedAt),
      fetched_on: this.clock(),
      data: record
    };
  }
}
