import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { logger } from '../utils/logger.js';
import { CONFIG_FILENAME, saveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../../types/config.js';

interface InitOptions {
  force?: boolean;
  project?: string;
}

export const initCommand = new Command('init')
  .description(`Write a default ${CONFIG_FILENAME} to the project directory`)
  .option('-f, --force', 'Overwrite existing configuration')
  .option('-p, --project <path>', 'Path to the project directory (defaults to current directory)')
  .action((options: InitOptions) => {
    try {
      runInit(options);
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

export function runInit(options: InitOptions): boolean {
  const dir = options.project ? resolve(options.project) : process.cwd();
  const configPath = join(dir, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    logger.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite it.`);
    return false;
  }

  saveConfig(dir, DEFAULT_CONFIG);
  logger.success(`Created ${configPath}`);
  return true;
}
