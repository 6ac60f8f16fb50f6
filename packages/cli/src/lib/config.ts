import Conf from 'conf';
import { homedir } from 'os';
import { join } from 'path';

export interface HarvestConfig {
  cacheDir: string;
  repositoriesDir: string;
  logLevel: string;
  stackexchangeToken?: string;
}

export const CONFIG_KEYS = ['cacheDir', 'repositoriesDir', 'logLevel', 'stackexchangeToken'] as const;
export type ConfigKey = typeof CONFIG_KEYS[number];

const config = new Conf<HarvestConfig>({
  projectName: 'harvester',
  cwd: join(homedir(), '.harvester'),
  defaults: {
    cacheDir: join(homedir(), '.harvester', 'cache'),
    repositoriesDir: join(homedir(), '.harvester', 'repositories'),
    logLevel: 'info'
  }
});

export function getConfig(): HarvestConfig {
  return {
    cacheDir: config.get('cacheDir'),
    repositoriesDir: config.get('repositoriesDir'),
    logLevel: config.get('logLevel'),
    stackexchangeToken: config.get('stackexchangeToken')
  };
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

export function setConfig(key: ConfigKey, value: string): void {
  config.set(key, value);
}

export function configPath(): string {
  return config.path;
}

export function resetConfig(): void {
  config.clear();
}
