/**
 * Shared plumbing for cskit commands: config, credentials, output and errors.
 */
import { resolve } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import { ALL_CATEGORIES, type Config, type HarmCategory } from '../core/config/schema.js';
import { loadCredentials, type Credentials } from '../utils/credentials.js';
import { readFile, fileExists } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { ContentSafetyError, InputError, SystemError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { createFormatter, type IFormatter } from './formatters/index.js';

export interface CommonOptions {
  config?: string;
  json?: boolean;
}

export interface CommandContext {
  projectRoot: string;
  config: Config;
  credentials: Credentials;
  formatter: IFormatter;
  json: boolean;
}

/**
 * Load everything a command needs. `--json` wins over `output.format`.
 */
export async function loadCommandContext(options: CommonOptions): Promise<CommandContext> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const credentials = await loadCredentials(projectRoot);
  const json = options.json === true || config.output.format === 'json';

  return {
    projectRoot,
    config,
    credentials,
    formatter: createFormatter(json ? 'json' : 'human', {
      verbose: logger.getLevel() === 'debug',
    }),
    json,
  };
}

/**
 * Report a command failure and exit with code 1.
 */
export function handleCommandError(error: unknown, json?: boolean): never {
  if (json) {
    const payload = error instanceof ContentSafetyError
      ? error.toJSON()
      : { name: error instanceof Error ? error.name : 'Error', message: errorMessage(error) };
    console.log(JSON.stringify({ error: payload }, null, 2));
  } else {
    logger.error(errorMessage(error));
  }
  process.exit(1);
}

/**
 * Text from an argument or a file, exactly one of which must be given.
 */
export async function readTextInput(
  projectRoot: string,
  text: string | undefined,
  file: string | undefined
): Promise<string> {
  if (text !== undefined && file !== undefined) {
    throw new InputError(ErrorCodes.INVALID_INPUT, 'Pass text or --file, not both');
  }
  if (file !== undefined) {
    return readInputFile(projectRoot, file);
  }
  if (text === undefined) {
    throw new InputError(ErrorCodes.INVALID_INPUT, 'No text given. Pass it as an argument or with --file');
  }
  return text;
}

export async function readInputFile(projectRoot: string, file: string): Promise<string> {
  const fullPath = resolve(projectRoot, file);
  if (!(await fileExists(fullPath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${file}`, { path: fullPath });
  }
  return readFile(fullPath);
}

/**
 * Commander option parser for comma-separated lists.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

/**
 * Commander collector for repeatable options.
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Match a value against a fixed set of choices.
 */
export function parseChoice<T extends string>(choices: readonly T[], value: string, label: string): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new InputError(
      ErrorCodes.INVALID_INPUT,
      `Unknown ${label} "${value}". Use one of: ${choices.join(', ')}`
    );
  }
  return match;
}

export function parseCategories(values: string[]): HarmCategory[] {
  return values.map((value) => parseChoice(ALL_CATEGORIES, value, 'category'));
}
