/**
 * StackExchange Command - fetch questions of a site and tag
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { MAX_QUESTIONS, StackExchangeConnector, errorMessage } from '@harvester/core';
import { getConfig } from '../lib/config';
import { addCommonOptions, createLogger, openCache, parsePositiveInt, type CommonOptions } from '../lib/options';
import { createWriter, prepareCache, runConnector } from '../lib/run';

interface StackExchangeCommandOptions extends CommonOptions {
  site: string;
  tagged: string;
  token?: string;
  maxQuestions: number;
}

export const stackexchangeCommand = addCommonOptions(
  new Command('stackexchange')
    .description('Fetch questions from a StackExchange site')
    .requiredOption('--site <site>', 'StackExchange site, e.g. stackoverflow')
    .requiredOption('--tagged <tag>', 'Only questions with this tag')
    .option('--token <token>', 'StackExchange API key (defaults to config stackexchangeToken)')
    .option('--max-questions <n>', 'Questions per request', parsePositiveInt, MAX_QUESTIONS)
).action(async (options: StackExchangeCommandOptions) => {
  const logger = createLogger(options, 'stackexchange');
  const token = options.token ?? getConfig().stackexchangeToken;

  if (!token) {
    console.error(chalk.red('StackExchange token not configured. Pass --token or run: harvest config set stackexchangeToken <token>'));
    process.exit(1);
  }

  const spinner = ora(options.fetchCache ? 'Reading cache...' : `Fetching questions from ${options.site}...`).start();

  try {
    const origin = options.origin || options.site;
    const cache = openCache(options, origin, logger);
    if (cache && !options.fetchCache) {
      prepareCache(cache, options.cleanCache === true);
    }

    const connector = new StackExchangeConnector(
      {
        site: options.site,
        tagged: options.tagged,
        token,
        maxQuestions: options.maxQuestions,
        origin
      },
      { cache, logger }
    );

    const { count } = await runConnector(connector, {
      fromDate: options.fromDate,
      fetchCache: options.fetchCache,
      write: createWriter(options.output),
      logger,
      onRecord: (_, n) => {
        spinner.text = `${options.site}: ${n} questions`;
      }
    });

    spinner.succeed(`${options.site}: ${count} questions`);
  } catch (error) {
    spinner.fail(`StackExchange fetch failed: ${errorMessage(error)}`);
    logger.error({ err: error }, 'stackexchange fetch failed');
    process.exit(1);
  }
});
