/**
 * GitBlame Command - line attribution of a git repository
 */

import { Command } from 'commander';
import ora from 'ora';
import { join } from 'path';
import { GitBlameConnector, errorMessage } from '@harvester/core';
import { getConfig } from '../lib/config';
import { safeName } from '../lib/format';
import { addCommonOptions, createLogger, openCache, type CommonOptions } from '../lib/options';
import { createWriter, prepareCache, runConnector } from '../lib/run';

interface GitBlameCommandOptions extends CommonOptions {
  gitPath?: string;
  rev: string;
}

export const gitblameCommand = addCommonOptions(
  new Command('gitblame')
    .description('Fetch line attribution of every tracked file of a git repository')
    .argument('<uri>', 'Repository to clone')
    .option('--git-path <path>', 'Local working copy (defaults to config repositoriesDir)')
    .option('--rev <rev>', 'Revision to blame', 'HEAD')
).action(async (uri: string, options: GitBlameCommandOptions) => {
  const logger = createLogger(options, 'gitblame');
  const spinner = ora(options.fetchCache ? 'Reading cache...' : `Blaming ${uri}...`).start();

  try {
    const gitPath = options.gitPath ?? join(getConfig().repositoriesDir, `${safeName(uri)}-git`);
    const origin = options.origin || uri;
    const cache = openCache(options, origin, logger);
    if (cache && !options.fetchCache) {
      prepareCache(cache, options.cleanCache === true);
    }

    const connector = new GitBlameConnector({ uri, gitPath, rev: options.rev, origin }, { cache, logger });

    const { count } = await runConnector(connector, {
      fromDate: options.fromDate,
      fetchCache: options.fetchCache,
      write: createWriter(options.output),
      logger,
      onRecord: (record, n) => {
        spinner.text = `${uri}: ${n} attributions (${String(record.data.file_blamed)})`;
      }
    });

    spinner.succeed(`${uri}: ${count} attributions`);
  } catch (error) {
    spinner.fail(`Git blame failed: ${errorMessage(error)}`);
    logger.error({ err: error }, 'gitblame fetch failed');
    process.exit(1);
  }
});
