/**
 * filter command - run text through the tiered content filter.
 */
import { Command } from 'commander';
import { createServiceClients } from '../../core/safety/factory.js';
import { ContentFilterPipeline } from '../../core/filter/pipeline.js';
import type { FilterDecision } from '../../core/filter/types.js';
import { FilterLevelSchema, LLMProviderNameSchema } from '../../core/config/schema.js';
import { getAvailableProvider } from '../../llm/providers/index.js';
import {
  handleCommandError,
  loadCommandContext,
  parseChoice,
  readTextInput,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

/** Exit code when the content is blocked. */
export const EXIT_BLOCKED = 2;

interface FilterCommandOptions extends CommonOptions {
  file?: string;
  provider?: string;
  review: boolean;
  blocklist?: string;
  primary?: string;
  secondary?: string;
}

/**
 * Create the filter command.
 */
export function createFilterCommand(): Command {
  return new Command('filter')
    .description('Decide whether text is allowed, escalating borderline content to an LLM review')
    .argument('[text]', 'Text to filter')
    .option('-f, --file <path>', 'Read the text from a file')
    .option('-p, --provider <provider>', 'Review provider (openai, anthropic)')
    .option('--no-review', 'Skip the LLM review and apply the unresolved_review policy')
    .option('-b, --blocklist <name>', 'Filter blocklist name')
    .option('--primary <level>', 'Primary level (low, medium, high)')
    .option('--secondary <level>', 'Secondary level (low, medium, high)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (text: string | undefined, options: FilterCommandOptions) => {
      let decision: FilterDecision | undefined;
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);
        const input = await readTextInput(ctx.projectRoot, text, options.file);
        const settings = ctx.config.filter;
        const levels = FilterLevelSchema.options;

        const { client, blocklists } = createServiceClients(ctx.config, ctx.credentials);
        const preferred = options.provider
          ? parseChoice(LLMProviderNameSchema.options, options.provider, 'provider')
          : undefined;
        const review = options.review && settings.review;

        const pipeline = new ContentFilterPipeline({
          client,
          blocklists,
          reviewer: review ? getAvailableProvider(preferred, ctx.config.llm, ctx.credentials) : undefined,
          options: {
            primaryLevel: options.primary ? parseChoice(levels, options.primary, 'level') : settings.primary_level,
            secondaryLevel: options.secondary ? parseChoice(levels, options.secondary, 'level') : settings.secondary_level,
            blocklistName: options.blocklist ?? settings.blocklist,
            blocklistDescription: settings.blocklist_description,
            review,
            unresolvedReview: settings.unresolved_review,
            addToBlocklist: settings.add_to_blocklist,
          },
        });

        decision = await pipeline.evaluate(input);
        console.log(ctx.formatter.formatFilterDecision(decision));
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }

      if (decision?.action === 'block') {
        process.exit(EXIT_BLOCKED);
      }
    });
}
