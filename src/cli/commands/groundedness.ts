/**
 * groundedness command - check generated text against its sources.
 */
import { Command } from 'commander';
import { createServiceClients, resolveGroundednessResource } from '../../core/safety/factory.js';
import {
  collect,
  handleCommandError,
  loadCommandContext,
  parseChoice,
  readInputFile,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

const DOMAINS = ['Generic', 'Medical'] as const;
const TASKS = ['QnA', 'Summarization'] as const;

interface GroundednessCommandOptions extends CommonOptions {
  source?: string[];
  sourceFile?: string[];
  query?: string;
  task?: string;
  domain?: string;
  reasoning?: boolean;
}

/**
 * Create the groundedness command.
 */
export function createGroundednessCommand(): Command {
  return new Command('groundedness')
    .description('Detect text that is not supported by its grounding sources')
    .argument('<text>', 'Generated answer or summary to check')
    .option('-s, --source <text>', 'Grounding source (repeatable)', collect)
    .option('--source-file <path>', 'Read a grounding source from a file (repeatable)', collect)
    .option('-q, --query <query>', 'Question the text answers (QnA task)')
    .option('--task <task>', 'QnA or Summarization')
    .option('--domain <domain>', 'Generic or Medical')
    .option('--reasoning', 'Ask for explanations (needs an Azure OpenAI resource)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (text: string, options: GroundednessCommandOptions) => {
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);
        const settings = ctx.config.groundedness;

        const sources = [...(options.source ?? [])];
        for (const file of options.sourceFile ?? []) {
          sources.push(await readInputFile(ctx.projectRoot, file));
        }

        const reasoning = options.reasoning ?? settings.reasoning;
        const { client } = createServiceClients(ctx.config, ctx.credentials);
        const result = await client.detectGroundedness({
          text,
          groundingSources: sources,
          query: options.query,
          task: options.task ? parseChoice(TASKS, options.task, 'task') : settings.task,
          domain: options.domain ? parseChoice(DOMAINS, options.domain, 'domain') : settings.domain,
          reasoning,
          llmResource: reasoning ? resolveGroundednessResource(ctx.config, ctx.credentials) : undefined,
        });

        console.log(ctx.formatter.formatGroundedness(result));
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }
    });
}
