/**
 * cskit command-line interface.
 */
import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';
import { createTextCommand } from './commands/text.js';
import { createImageCommand } from './commands/image.js';
import { createShieldCommand } from './commands/shield.js';
import { createGroundednessCommand } from './commands/groundedness.js';
import { createBlocklistCommand } from './commands/blocklist.js';
import { createFilterCommand } from './commands/filter.js';
import { createScanCommand } from './commands/scan.js';
import { createProvidersCommand } from './commands/providers.js';
import { createInitCommand } from './commands/init.js';

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Version from the nearest package.json above this module (src/ or dist/src/).
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 4; i++) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    dir = dirname(dir);
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('cskit')
    .description('Moderate text and images, manage blocklists and shield prompts with Azure AI Content Safety')
    .version(readVersion())
    .option('--verbose', 'Show debug logging')
    .option('--quiet', 'Suppress all logging')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      if (options.quiet) {
        logger.setLevel('silent');
      } else if (options.verbose) {
        logger.setLevel('debug');
      }
    });

  [createTextCommand, createImageCommand, createShieldCommand, createGroundednessCommand,
   createBlocklistCommand, createFilterCommand, createScanCommand, createProvidersCommand,
   createInitCommand].forEach((cmd) => program.addCommand(cmd()));

  return program;
}
