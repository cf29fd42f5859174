/**
 * providers command - show which LLM review providers are configured.
 */
import { Command } from 'commander';
import { listProviders } from '../../llm/providers/index.js';
import { handleCommandError, loadCommandContext, type CommandContext, type CommonOptions } from '../context.js';

/**
 * Create the providers command.
 */
export function createProvidersCommand(): Command {
  return new Command('providers')
    .description('List LLM review providers')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (options: CommonOptions) => {
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);
        const providers = listProviders(ctx.config.llm, ctx.credentials);
        console.log(ctx.formatter.formatProviders(providers));

        if (!ctx.json && !providers.some((p) => p.available)) {
          console.log('\nSet OPENAI_API_KEY or ANTHROPIC_API_KEY, or configure llm.providers in .cskit/config.yaml');
        }
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }
    });
}
