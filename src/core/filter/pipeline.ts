/**
 * Tiered content filter.
 *
 * Content is analyzed once against the filter blocklist. A blocklist match
 * blocks outright; otherwise the analysis has to trip both the primary and
 * the secondary level before an LLM review decides. Content the review
 * confirms as harmful is added to the blocklist, so repeats stop at the
 * first step.
 */
import type { ContentSafetyClient } from '../safety/client.js';
import type { BlocklistClient } from '../safety/blocklist-client.js';
import { BLOCKLIST_ITEM_MAX_LENGTH, type AnalyzeTextResult } from '../safety/types.js';
import type { ILLMProvider, HarmReview } from '../../llm/types.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { findViolation, type Violation } from './levels.js';
import type { FilterDecision, FilterOptions } from './types.js';

export interface ContentFilterPipelineDeps {
  client: ContentSafetyClient;
  blocklists: BlocklistClient;
  reviewer?: ILLMProvider;
  options: FilterOptions;
}

export class ContentFilterPipeline {
  private readonly client: ContentSafetyClient;
  private readonly blocklists: BlocklistClient;
  private readonly reviewer?: ILLMProvider;
  private readonly options: FilterOptions;
  private prepared: Promise<void> | null = null;

  constructor(deps: ContentFilterPipelineDeps) {
    this.client = deps.client;
    this.blocklists = deps.blocklists;
    this.reviewer = deps.reviewer;
    this.options = deps.options;
  }

  /**
   * Make sure the filter blocklist exists. Runs once; a failure is retried on the next call.
   */
  prepare(): Promise<void> {
    if (!this.prepared) {
      this.prepared = this.blocklists
        .createOrUpdate(this.options.blocklistName, this.options.blocklistDescription)
        .then(() => undefined)
        .catch((error: unknown) => {
          this.prepared = null;
          throw error;
        });
    }
    return this.prepared;
  }

  async evaluate(content: string): Promise<FilterDecision> {
    await this.prepare();

    const analysis = await this.client.analyzeText({
      text: content,
      blocklistNames: [this.options.blocklistName],
    });

    if (analysis.blocklistsMatch.length > 0) {
      return { action: 'block', stage: 'blocklist', blocklisted: false, analysis };
    }

    const primary = findViolation(analysis, this.options.primaryLevel);
    if (!primary) {
      return { action: 'allow', stage: 'primary', blocklisted: false, analysis };
    }

    const secondary = findViolation(analysis, this.options.secondaryLevel);
    if (!secondary) {
      return { action: 'allow', stage: 'secondary', flagged: primary, blocklisted: false, analysis };
    }

    return this.resolveWithReview(content, secondary, analysis);
  }

  private async resolveWithReview(
    content: string,
    violation: Violation,
    analysis: AnalyzeTextResult
  ): Promise<FilterDecision> {
    const base = {
      stage: 'review' as const,
      category: violation.category,
      severity: violation.severity,
      analysis,
    };

    const review = await this.review(content);
    if (!review || review.verdict === 'inconclusive') {
      if (review?.error) {
        logger.warn(`Review by ${review.provider} failed: ${review.error}`);
      }
      return { ...base, action: this.options.unresolvedReview, review, blocklisted: false };
    }

    if (review.verdict === 'not_harmful') {
      return { ...base, action: 'allow', review, blocklisted: false };
    }

    const blocklisted = this.options.addToBlocklist
      ? await this.addToBlocklist(content, violation.category)
      : false;
    return { ...base, action: 'block', review, blocklisted };
  }

  private async review(content: string): Promise<HarmReview | undefined> {
    if (!this.options.review || !this.reviewer) {
      return undefined;
    }
    if (!this.reviewer.isAvailable()) {
      logger.debug(`Reviewer ${this.reviewer.name} is not configured; applying unresolved_review policy`);
      return undefined;
    }
    return this.reviewer.reviewContent(content);
  }

  /**
   * Returns whether the item was added.
   */
  private async addToBlocklist(content: string, category: string): Promise<boolean> {
    const text = content.trim();
    if (text.length > BLOCKLIST_ITEM_MAX_LENGTH) {
      logger.warn(
        `Not adding content to blocklist "${this.options.blocklistName}": ` +
        `${text.length} characters exceeds the ${BLOCKLIST_ITEM_MAX_LENGTH} character item limit`
      );
      return false;
    }

    try {
      await this.blocklists.addOrUpdateItems(this.options.blocklistName, [{ text, description: category }]);
      logger.info(`Added content to blocklist "${this.options.blocklistName}" (${category})`);
      return true;
    } catch (error) {
      logger.warn(`Failed to add content to blocklist "${this.options.blocklistName}": ${errorMessage(error)}`);
      return false;
    }
  }
}
