/**
 * shield command - detect prompt injection in a user prompt and documents.
 */
import { Command } from 'commander';
import { createServiceClients } from '../../core/safety/factory.js';
import {
  collect,
  handleCommandError,
  loadCommandContext,
  readInputFile,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

interface ShieldCommandOptions extends CommonOptions {
  document?: string[];
  documentFile?: string[];
}

/**
 * Create the shield command.
 */
export function createShieldCommand(): Command {
  return new Command('shield')
    .description('Detect jailbreak attempts and indirect attacks')
    .argument('[prompt]', 'User prompt to check')
    .option('-d, --document <text>', 'Document to check for embedded attacks (repeatable)', collect)
    .option('--document-file <path>', 'Read a document from a file (repeatable)', collect)
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (prompt: string | undefined, options: ShieldCommandOptions) => {
      let ctx: CommandContext | undefined;
      try {
        ctx = await loadCommandContext(options);

        const documents = [...(options.document ?? [])];
        for (const file of options.documentFile ?? []) {
          documents.push(await readInputFile(ctx.projectRoot, file));
        }

        const { client } = createServiceClients(ctx.config, ctx.credentials);
        const result = await client.shieldPrompt({ userPrompt: prompt, documents });
        console.log(ctx.formatter.formatShield(result));
      } catch (error) {
        handleCommandError(error, ctx?.json ?? options.json);
      }
    });
}
