/**
 * scan command - analyze many files and aggregate a severity report.
 */
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'node:path';
import { createServiceClients } from '../../core/safety/factory.js';
import { buildReport, collectScanItems, scanTexts } from '../../core/report/scanner.js';
import type { ScanReport } from '../../core/report/types.js';
import { FilterLevelSchema, ScanSettingsSchema } from '../../core/config/schema.js';
import { globFiles } from '../../utils/file-system.js';
import { InputError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  handleCommandError,
  loadCommandContext,
  parseChoice,
  parseInteger,
  parseList,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

/** Exit code when any item is flagged. */
export const EXIT_FLAGGED = 2;

/**
 * Same bounds as scan.concurrency in the config file.
 */
export function parseConcurrency(value: string): number {
  const result = ScanSettingsSchema.shape.concurrency.safeParse(parseInteger(value));
  if (!result.success) {
    throw new InvalidArgumentError('Must be between 1 and 32.');
  }
  return result.data;
}

interface ScanCommandOptions extends CommonOptions {
  lines?: boolean;
  level: string;
  concurrency?: number;
  blocklist?: string[];
}

/**
 * Create the scan command.
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Analyze files in bulk and report severity per category')
    .argument('<inputs...>', 'Files or glob patterns')
    .option('--lines', 'Analyze each non-empty line separately')
    .option('-l, --level <level>', 'Flag items at this level (low, medium, high)', 'medium')
    .option('--concurrency <n>', 'Requests in flight at once (1-32)', parseConcurrency)
    .option('-b, --blocklist <names>', 'Comma-separated blocklists to match against', parseList)
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (inputs: string[], options: ScanCommandOptions) => {
      let report: ScanReport | undefined;
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);
        const threshold = parseChoice(FilterLevelSchema.options, options.level, 'level');

        const files = await globFiles(inputs, {
          cwd: ctx.projectRoot,
          ignore: ctx.config.scan.exclude,
          absolute: true,
        });
        if (files.length === 0) {
          throw new InputError(ErrorCodes.INVALID_INPUT, `No files match: ${inputs.join(', ')}`);
        }

        const projectRoot = ctx.projectRoot;
        const items = await collectScanItems(files, {
          lines: options.lines === true,
          displayPath: (file) => path.relative(projectRoot, file),
        });
        logger.debug(`Scanning ${items.length} item(s) from ${files.length} file(s)`);

        const { client } = createServiceClients(ctx.config, ctx.credentials);
        const entries = await scanTexts(client, items, {
          threshold,
          concurrency: options.concurrency ?? ctx.config.scan.concurrency,
          blocklistNames: options.blocklist,
        });

        report = buildReport(entries, threshold);
        console.log(ctx.formatter.formatReport(report));
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }

      if (report && report.flagged > 0) {
        process.exit(EXIT_FLAGGED);
      }
    });
}
