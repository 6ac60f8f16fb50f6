import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_KEYS, configPath, getConfig, isConfigKey, resetConfig, setConfig } from '../lib/config';

export const configCommand = new Command('config')
  .description('Manage CLI configuration');

configCommand
  .command('show')
  .description('Show current configuration')
  .action(() => {
    const config = getConfig();
    console.log(chalk.bold('\nHarvester Configuration\n'));

    console.log(chalk.bold('  Storage:'));
    console.log(`    Cache Dir:        ${config.cacheDir}`);
    console.log(`    Repositories Dir: ${config.repositoriesDir}`);

    console.log(chalk.bold('\n  Sources:'));
    console.log(`    StackExchange:    ${config.stackexchangeToken ? chalk.green('configured') : chalk.yellow('not set')}`);

    console.log(chalk.bold('\n  Logging:'));
    console.log(`    Level:            ${config.logLevel}`);

    console.log('');
  });

configCommand
  .command('set <key> <value>')
  .description('Set a configuration value')
  .action((key: string, value: string) => {
    if (!isConfigKey(key)) {
      console.error(chalk.red(`Invalid key: ${key}`));
      console.log(`\nValid keys: ${CONFIG_KEYS.join(', ')}`);
      process.exit(1);
    }
    setConfig(key, value);
    // Mask tokens in output
    const displayValue = key.toLowerCase().includes('token') ? value.slice(0, 4) + '...' : value;
    console.log(chalk.green(`Set ${key} = ${displayValue}`));
  });

configCommand
  .command('path')
  .description('Print the configuration file location')
  .action(() => {
    console.log(configPath());
  });

configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .action(() => {
    resetConfig();
    console.log(chalk.green('Configuration reset to defaults'));
  });
