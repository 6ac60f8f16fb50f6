/**
 * Harvest Run - drive one connector and write its records
 *
 * Before a fetch the cache is backed up (or cleaned, then backed up), so a
 * failed run can be rolled back to where it started.
 */

import { appendFileSync, writeFileSync } from 'fs';
import {
  HarvestError,
  WriteAheadCache,
  errorMessage,
  type Logger,
  type SourceConnector,
  type StampedRecord
} from '@harvester/core';
import { formatRecord } from './format';

/** Writing records to the output failed; the harvest itself did not. */
export class OutputError extends HarvestError {}

export type Writer = (text: string) => void;

export interface RunOptions {
  fromDate?: Date;
  fetchCache?: boolean;
  write: Writer;
  logger?: Logger;
  onRecord?: (record: StampedRecord, count: number) => void;
}

export interface RunResult {
  count: number;
}

export function createWriter(outfile?: string): Writer {
  if (!outfile) {
    return text => {
      process.stdout.write(text);
    };
  }

  writeFileSync(outfile, '');
  return text => appendFileSync(outfile, text, 'utf8');
}

/**
 * Prepare a connector's cache for a fetch run.
 */
export function prepareCache(cache: WriteAheadCache, clean: boolean): void {
  if (clean) {
    cache.clean();
  }
  cache.backup();
}

export async function runConnector(connector: SourceConnector, options: RunOptions): Promise<RunResult> {
  const items = options.fetchCache ? connector.fetchFromCache() : connector.fetch(options.fromDate);
  let count = 0;

  try {
    for await (const item of items) {
      try {
        options.write(formatRecord(item) + '\n');
      } catch (error) {
        throw new OutputError(`failed to write record: ${errorMessage(error)}`, { cause: error });
      }
      count++;
      options.onRecord?.(item, count);
    }
  } catch (error) {
    if (!options.fetchCache && !(error instanceof OutputError) && connector.cache) {
      recoverCache(connector.cache, options.logger);
    }
    throw error;
  }

  return { count };
}

function recoverCache(cache: WriteAheadCache, logger?: Logger): void {
  try {
    cache.recover();
  } catch (recoverError) {
    // The run's own error is the one the caller gets
    logger?.error({ err: recoverError }, 'cache recovery failed');
  }
}
