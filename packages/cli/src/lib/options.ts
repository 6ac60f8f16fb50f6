import { Command, InvalidArgumentError } from 'commander';
import { WriteAheadCache, makeLogger, type Logger } from '@harvester/core';
import { getConfig } from './config';
import { originCacheDir } from './format';

export interface CommonOptions {
  origin?: string;
  fromDate?: Date;
  cachePath?: string;
  cache: boolean;
  cleanCache?: boolean;
  fetchCache?: boolean;
  output?: string;
  verbose?: boolean;
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Not a valid date: ${value}`);
  }
  return date;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Not a positive integer: ${value}`);
  }
  return n;
}

/**
 * Options every connector command shares
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('--origin <origin>', 'Origin recorded on every item (defaults to the source)')
    .option('--from-date <date>', 'Fetch items updated since this date', parseDate)
    .option('--cache-path <path>', 'Base directory for caches (defaults to config cacheDir)')
    .option('--no-cache', 'Do not cache fetched items')
    .option('--clean-cache', 'Remove the cache before fetching')
    .option('--fetch-cache', 'Replay items from the cache instead of fetching')
    .option('-o, --output <file>', 'Write items to a file instead of stdout')
    .option('-v, --verbose', 'Debug logging');
}

export function createLogger(options: CommonOptions, name: string): Logger {
  const config = getConfig();
  return makeLogger({ level: options.verbose ? 'debug' : config.logLevel, name });
}

/**
 * Cache for `origin`, or undefined when caching is turned off. A fetch run
 * backs it up first; a replay leaves it untouched.
 */
export function openCache(options: CommonOptions, origin: string, logger: Logger): WriteAheadCache | undefined {
  if (!options.cache) {
    return undefined;
  }

  const base = options.cachePath ?? getConfig().cacheDir;
  return new WriteAheadCache({ dir: originCacheDir(base, origin) }, logger);
}
