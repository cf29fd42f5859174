/**
 * blocklist command - manage text blocklists.
 */
import { Command } from 'commander';
import { createServiceClients, type ServiceClients } from '../../core/safety/factory.js';
import { runBlocklistWorkflow } from '../../core/safety/blocklist-client.js';
import type { BlocklistItemInput } from '../../core/safety/types.js';
import { logger } from '../../utils/logger.js';
import {
  collect,
  handleCommandError,
  loadCommandContext,
  parseInteger,
  readInputFile,
  type CommandContext,
  type CommonOptions,
} from '../context.js';

interface CreateOptions extends CommonOptions {
  description?: string;
}

interface AddOptions extends CommonOptions {
  description?: string;
  file?: string;
}

interface ItemsOptions extends CommonOptions {
  top?: number;
  skip?: number;
}

interface RunOptions extends CommonOptions {
  item?: string[];
  description?: string;
}

type Handler = (ctx: CommandContext, services: ServiceClients) => Promise<void>;

/**
 * Load context and services, run the handler, and report failures.
 */
async function run(options: CommonOptions, handler: Handler): Promise<void> {
  let ctx: CommandContext | undefined;
  try {
    ctx = await loadCommandContext(options);
    await handler(ctx, createServiceClients(ctx.config, ctx.credentials));
  } catch (error) {
    handleCommandError(error, ctx?.json ?? options.json);
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON');
}

/**
 * Items from arguments plus, optionally, one per non-empty line of a file.
 */
async function collectItems(
  projectRoot: string,
  texts: string[],
  options: AddOptions
): Promise<BlocklistItemInput[]> {
  const all = [...texts];
  if (options.file) {
    const content = await readInputFile(projectRoot, options.file);
    all.push(...content.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.length > 0));
  }
  return all.map((text) => ({ text, description: options.description }));
}

/**
 * Create the blocklist command.
 */
export function createBlocklistCommand(): Command {
  const command = new Command('blocklist').description('Manage text blocklists');

  command.addCommand(
    withCommonOptions(
      new Command('create')
        .description('Create a blocklist, or update its description')
        .argument('<name>', 'Blocklist name')
        .option('-d, --description <text>', 'Blocklist description')
    ).action(async (name: string, options: CreateOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        const blocklist = await blocklists.createOrUpdate(name, options.description);
        console.log(ctx.formatter.formatBlocklist(blocklist));
      });
    })
  );

  command.addCommand(
    withCommonOptions(
      new Command('get').description('Show a blocklist').argument('<name>', 'Blocklist name')
    ).action(async (name: string, options: CommonOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        console.log(ctx.formatter.formatBlocklist(await blocklists.get(name)));
      });
    })
  );

  command.addCommand(
    withCommonOptions(new Command('list').description('List all blocklists')).action(
      async (options: CommonOptions) => {
        await run(options, async (ctx, { blocklists }) => {
          console.log(ctx.formatter.formatBlocklists(await blocklists.list()));
        });
      }
    )
  );

  command.addCommand(
    withCommonOptions(
      new Command('delete').description('Delete a blocklist and its items').argument('<name>', 'Blocklist name')
    ).action(async (name: string, options: CommonOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        await blocklists.delete(name);
        if (ctx.json) {
          console.log(JSON.stringify({ deleted: name }, null, 2));
        } else {
          logger.success(`Deleted blocklist "${name}"`);
        }
      });
    })
  );

  command.addCommand(
    withCommonOptions(
      new Command('add')
        .description('Add items to a blocklist')
        .argument('<name>', 'Blocklist name')
        .argument('[items...]', 'Item texts')
        .option('-d, --description <text>', 'Description for every added item')
        .option('-f, --file <path>', 'Read items from a file, one per line')
    ).action(async (name: string, texts: string[], options: AddOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        const items = await collectItems(ctx.projectRoot, texts, options);
        const added = await blocklists.addOrUpdateItems(name, items);
        console.log(ctx.formatter.formatBlocklistItems(added));
      });
    })
  );

  command.addCommand(
    withCommonOptions(
      new Command('remove')
        .description('Remove items from a blocklist')
        .argument('<name>', 'Blocklist name')
        .argument('<ids...>', 'Item ids')
    ).action(async (name: string, ids: string[], options: CommonOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        await blocklists.removeItems(name, ids);
        if (ctx.json) {
          console.log(JSON.stringify({ blocklist: name, removed: ids }, null, 2));
        } else {
          logger.success(`Removed ${ids.length} item(s) from "${name}"`);
        }
      });
    })
  );

  command.addCommand(
    withCommonOptions(
      new Command('items')
        .description('List the items of a blocklist')
        .argument('<name>', 'Blocklist name')
        .option('--top <n>', 'Return at most n items', parseInteger)
        .option('--skip <n>', 'Skip the first n items', parseInteger)
    ).action(async (name: string, options: ItemsOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        const items = await blocklists.listItems(name, { top: options.top, skip: options.skip });
        console.log(ctx.formatter.formatBlocklistItems(items));
      });
    })
  );

  command.addCommand(
    withCommonOptions(
      new Command('item')
        .description('Show one blocklist item')
        .argument('<name>', 'Blocklist name')
        .argument('<id>', 'Item id')
    ).action(async (name: string, id: string, options: CommonOptions) => {
      await run(options, async (ctx, { blocklists }) => {
        console.log(ctx.formatter.formatBlocklistItems([await blocklists.getItem(name, id)]));
      });
    })
  );

  command.addCommand(
    withCommonOptions(
      new Command('run')
        .description('Create a blocklist, add items, then analyze text against it')
        .argument('<name>', 'Blocklist name')
        .argument('<text>', 'Text to analyze')
        .requiredOption('-i, --item <text>', 'Item to add (repeatable)', collect)
        .option('-d, --description <text>', 'Blocklist description')
    ).action(async (name: string, text: string, options: RunOptions) => {
      await run(options, async (ctx, { client, blocklists }) => {
        const items = (options.item ?? []).map((item) => ({ text: item }));
        const result = await runBlocklistWorkflow(blocklists, client, name, items, text, options.description);
        console.log(ctx.formatter.formatWorkflow(result));
      });
    })
  );

  return command;
}
