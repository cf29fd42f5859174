/**
 * text command - analyze text for harmful content.
 */
import { Command } from 'commander';
import { createServiceClients } from '../../core/safety/factory.js';
import {
  handleCommandError,
  loadCommandContext,
  parseCategories,
  parseList,
  readTextInput,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

interface TextCommandOptions extends CommonOptions {
  file?: string;
  categories?: string[];
  blocklist?: string[];
  haltOnHit?: boolean;
  eightLevels?: boolean;
}

/**
 * Create the text command.
 */
export function createTextCommand(): Command {
  return new Command('text')
    .description('Analyze text for hate, self-harm, sexual and violent content')
    .argument('[text]', 'Text to analyze')
    .option('-f, --file <path>', 'Read the text from a file')
    .option('--categories <list>', 'Comma-separated categories to analyze', parseList)
    .option('-b, --blocklist <names>', 'Comma-separated blocklists to match against', parseList)
    .option('--halt-on-hit', 'Skip category analysis when a blocklist matches')
    .option('--eight-levels', 'Report severity on the 0-7 scale')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (text: string | undefined, options: TextCommandOptions) => {
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);
        const input = await readTextInput(ctx.projectRoot, text, options.file);
        const { client } = createServiceClients(ctx.config, ctx.credentials);

        const result = await client.analyzeText({
          text: input,
          categories: options.categories ? parseCategories(options.categories) : undefined,
          blocklistNames: options.blocklist,
          haltOnBlocklistHit: options.haltOnHit,
          outputType: options.eightLevels ? 'EightSeverityLevels' : undefined,
        });

        console.log(ctx.formatter.formatTextAnalysis(result));
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }
    });
}
