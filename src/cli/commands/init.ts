/**
 * init command - write a default .cskit/config.yaml.
 */
import { Command } from 'commander';
import { getConfigPath, getDefaultConfig, DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { fileExists } from '../../utils/file-system.js';
import { writeYaml } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';
import { handleCommandError } from '../context.js';

interface InitCommandOptions {
  force?: boolean;
}

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description(`Create ${DEFAULT_CONFIG_PATH} with default settings`)
    .option('--force', 'Overwrite an existing config file')
    .action(async (options: InitCommandOptions) => {
      try {
        const configPath = getConfigPath(process.cwd());
        if ((await fileExists(configPath)) && !options.force) {
          logger.warn(`${DEFAULT_CONFIG_PATH} already exists. Use --force to overwrite.`);
          return;
        }

        await writeYaml(configPath, getDefaultConfig());
        logger.success(`Created ${DEFAULT_CONFIG_PATH}`);
        logger.info('Set AZURE_CONTENTSAFETY_ENDPOINT and AZURE_CONTENTSAFETY_KEY in the environment or .env');
      } catch (error) {
        handleCommandError(error);
      }
    });
}
