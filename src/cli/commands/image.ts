/**
 * image command - analyze an image file or blob URL.
 */
import { Command } from 'commander';
import { resolve } from 'node:path';
import { createServiceClients } from '../../core/safety/factory.js';
import { readFileBuffer, fileExists } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import type { AnalyzeImageRequest } from '../../core/safety/types.js';
import {
  handleCommandError,
  loadCommandContext,
  parseCategories,
  parseList,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

interface ImageCommandOptions extends CommonOptions {
  categories?: string[];
}

/**
 * Create the image command.
 */
export function createImageCommand(): Command {
  return new Command('image')
    .description('Analyze an image for harmful content')
    .argument('<source>', 'Image file path, or an https:// blob URL')
    .option('--categories <list>', 'Comma-separated categories to analyze', parseList)
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (source: string, options: ImageCommandOptions) => {
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);
        const categories = options.categories ? parseCategories(options.categories) : undefined;

        let request: AnalyzeImageRequest;
        if (/^https?:\/\//i.test(source)) {
          request = { blobUrl: source, categories };
        } else {
          const fullPath = resolve(ctx.projectRoot, source);
          if (!(await fileExists(fullPath))) {
            throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${source}`, { path: fullPath });
          }
          request = { content: await readFileBuffer(fullPath), categories };
        }

        const { client } = createServiceClients(ctx.config, ctx.credentials);
        const result = await client.analyzeImage(request);
        console.log(ctx.formatter.formatImageAnalysis(result));
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }
    });
}
