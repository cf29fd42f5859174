/**
 * Text blocklist management.
 */
import { InputError, ErrorCodes } from '../../utils/errors.js';
import type { HttpTransport } from './transport.js';
import { validateAnalyzeText, type ContentSafetyClient } from './client.js';
import {
  AddOrUpdateItemsResultSchema,
  BlocklistItemPageSchema,
  BlocklistItemSchema,
  BlocklistPageSchema,
  BlocklistSchema,
  BLOCKLIST_ITEM_MAX_LENGTH,
  BLOCKLIST_ITEMS_PER_REQUEST,
  BLOCKLIST_NAME_PATTERN,
  type Blocklist,
  type BlocklistItem,
  type BlocklistItemInput,
  type BlocklistWorkflowResult,
  type ListItemsOptions,
} from './types.js';

/** Guard against a service that keeps handing out nextLinks. */
const MAX_PAGES = 100;

export class BlocklistClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly apiVersion: string
  ) {}

  /**
   * Create a blocklist, or update its description if it exists.
   */
  async createOrUpdate(name: string, description?: string): Promise<Blocklist> {
    return this.transport.call('PATCH', blocklistPath(name), BlocklistSchema, {
      apiVersion: this.apiVersion,
      body: { description: description ?? '' },
    });
  }

  async get(name: string): Promise<Blocklist> {
    return this.transport.call('GET', blocklistPath(name), BlocklistSchema, {
      apiVersion: this.apiVersion,
    });
  }

  /**
   * List all blocklists, following paging links.
   */
  async list(): Promise<Blocklist[]> {
    let page = await this.transport.call('GET', 'text/blocklists', BlocklistPageSchema, {
      apiVersion: this.apiVersion,
    });
    const blocklists = [...page.value];

    for (let pages = 1; page.nextLink && pages < MAX_PAGES; pages++) {
      page = await this.transport.requestUrl(page.nextLink, BlocklistPageSchema);
      blocklists.push(...page.value);
    }

    return blocklists;
  }

  async delete(name: string): Promise<void> {
    await this.transport.request('DELETE', blocklistPath(name), { apiVersion: this.apiVersion });
  }

  /**
   * Add items to a blocklist. Items with text already present are updated.
   */
  async addOrUpdateItems(name: string, items: BlocklistItemInput[]): Promise<BlocklistItem[]> {
    validateBlocklistItems(items);

    const result = await this.transport.call(
      'POST',
      `${blocklistPath(name)}:addOrUpdateBlocklistItems`,
      AddOrUpdateItemsResultSchema,
      {
        apiVersion: this.apiVersion,
        body: {
          blocklistItems: items.map((item) => ({
            text: item.text,
            description: item.description ?? '',
          })),
        },
      }
    );
    return result.blocklistItems;
  }

  async removeItems(name: string, itemIds: string[]): Promise<void> {
    if (itemIds.length === 0) {
      throw new InputError(ErrorCodes.INVALID_INPUT, 'No blocklist item ids given');
    }
    await this.transport.request('POST', `${blocklistPath(name)}:removeBlocklistItems`, {
      apiVersion: this.apiVersion,
      body: { blocklistItemIds: itemIds },
    });
  }

  /**
   * List items of a blocklist. Without `top`, all pages are fetched.
   */
  async listItems(name: string, options: ListItemsOptions = {}): Promise<BlocklistItem[]> {
    let page = await this.transport.call(
      'GET',
      `${blocklistPath(name)}/blocklistItems`,
      BlocklistItemPageSchema,
      {
        apiVersion: this.apiVersion,
        query: { top: options.top, skip: options.skip },
      }
    );
    const items = [...page.value];

    if (options.top === undefined) {
      for (let pages = 1; page.nextLink && pages < MAX_PAGES; pages++) {
        page = await this.transport.requestUrl(page.nextLink, BlocklistItemPageSchema);
        items.push(...page.value);
      }
    }

    return items;
  }

  async getItem(name: string, itemId: string): Promise<BlocklistItem> {
    return this.transport.call(
      'GET',
      `${blocklistPath(name)}/blocklistItems/${encodeURIComponent(itemId)}`,
      BlocklistItemSchema,
      { apiVersion: this.apiVersion }
    );
  }
}

/**
 * Create a blocklist, populate it, then analyze text against it.
 */
export async function runBlocklistWorkflow(
  blocklists: BlocklistClient,
  client: ContentSafetyClient,
  name: string,
  items: BlocklistItemInput[],
  text: string,
  description?: string
): Promise<BlocklistWorkflowResult> {
  validateBlocklistName(name);
  validateBlocklistItems(items);
  validateAnalyzeText(text);

  const blocklist = await blocklists.createOrUpdate(name, description);
  const added = await blocklists.addOrUpdateItems(name, items);
  const analysis = await client.analyzeText({
    text,
    blocklistNames: [name],
    haltOnBlocklistHit: false,
  });
  return { blocklist, items: added, analysis };
}

export function validateBlocklistName(name: string): void {
  if (!BLOCKLIST_NAME_PATTERN.test(name)) {
    throw new InputError(
      ErrorCodes.INVALID_INPUT,
      `Invalid blocklist name "${name}": use 1-64 letters, digits, '_', '-' or '.'`
    );
  }
}

/**
 * One request takes 1-100 items of 1-128 characters each.
 */
export function validateBlocklistItems(items: BlocklistItemInput[]): void {
  if (items.length === 0) {
    throw new InputError(ErrorCodes.INVALID_INPUT, 'No blocklist items given');
  }
  if (items.length > BLOCKLIST_ITEMS_PER_REQUEST) {
    throw new InputError(
      ErrorCodes.INVALID_INPUT,
      `At most ${BLOCKLIST_ITEMS_PER_REQUEST} items can be added per request (got ${items.length})`
    );
  }
  for (const item of items) {
    validateItemText(item.text);
  }
}

function validateItemText(text: string): void {
  if (text.trim().length === 0) {
    throw new InputError(ErrorCodes.INVALID_INPUT, 'Blocklist item text is empty');
  }
  if (text.length > BLOCKLIST_ITEM_MAX_LENGTH) {
    throw new InputError(
      ErrorCodes.BLOCKLIST_ITEM_TOO_LONG,
      `Blocklist item is ${text.length} characters; the limit is ${BLOCKLIST_ITEM_MAX_LENGTH}`,
      { length: text.length, limit: BLOCKLIST_ITEM_MAX_LENGTH }
    );
  }
}

function blocklistPath(name: string): string {
  validateBlocklistName(name);
  return `text/blocklists/${encodeURIComponent(name)}`;
}
