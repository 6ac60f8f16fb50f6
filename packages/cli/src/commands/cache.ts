/**
 * Cache Command - inspect and repair the per-origin caches
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { WriteAheadCache, errorMessage, makeLogger } from '@harvester/core';
import { getConfig } from '../lib/config';
import { originCacheDir } from '../lib/format';

interface CacheCommandOptions {
  cachePath?: string;
}

function openCache(origin: string, options: CacheCommandOptions): WriteAheadCache {
  const config = getConfig();
  const base = options.cachePath ?? config.cacheDir;
  return new WriteAheadCache({ dir: originCacheDir(base, origin) }, makeLogger({ level: config.logLevel, name: 'cache' }));
}

export const cacheCommand = new Command('cache')
  .description('Manage item caches');

cacheCommand
  .command('path <origin>')
  .description('Print the cache directory of an origin')
  .option('--cache-path <path>', 'Base directory for caches')
  .action((origin: string, options: CacheCommandOptions) => {
    const cache = openCache(origin, options);
    console.log(cache.dir);
  });

cacheCommand
  .command('clean <origin>')
  .description('Remove the cached items and backup of an origin')
  .option('--cache-path <path>', 'Base directory for caches')
  .action((origin: string, options: CacheCommandOptions) => {
    try {
      openCache(origin, options).clean();
      console.log(chalk.green(`Cache of ${origin} cleaned`));
    } catch (error) {
      console.error(chalk.red(`Failed to clean cache: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

cacheCommand
  .command('recover <origin>')
  .description('Restore the cache of an origin from its last backup')
  .option('--cache-path <path>', 'Base directory for caches')
  .action((origin: string, options: CacheCommandOptions) => {
    try {
      openCache(origin, options).recover();
      console.log(chalk.green(`Cache of ${origin} recovered from backup`));
    } catch (error) {
      console.error(chalk.red(`Failed to recover cache: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
