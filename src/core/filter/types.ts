import type { FilterLevel, UnresolvedReview } from '../config/schema.js';
import type { AnalyzeTextResult } from '../safety/types.js';
import type { HarmReview } from '../../llm/types.js';
import type { Violation } from './levels.js';

export type FilterAction = 'allow' | 'block';

/**
 * Step of the pipeline that produced the decision.
 * - blocklist: the text matched the filter blocklist
 * - primary: nothing reached the primary threshold
 * - secondary: the primary threshold tripped but the secondary did not
 * - review: both thresholds tripped; the outcome came from review (or its fallback policy)
 */
export type FilterStage = 'blocklist' | 'primary' | 'secondary' | 'review';

export interface FilterOptions {
  primaryLevel: FilterLevel;
  secondaryLevel: FilterLevel;
  blocklistName: string;
  blocklistDescription?: string;
  /** Ask the reviewer when both thresholds trip */
  review: boolean;
  /** Decision when review is off, unavailable or inconclusive */
  unresolvedReview: UnresolvedReview;
  /** Add content confirmed harmful by review to the blocklist */
  addToBlocklist: boolean;
}

export interface FilterDecision {
  action: FilterAction;
  stage: FilterStage;
  /** Category that drove the decision */
  category?: string;
  severity?: number;
  /** Primary-level violation that was let through at the secondary stage */
  flagged?: Violation;
  review?: HarmReview;
  /** True when the content was added to the blocklist */
  blocklisted: boolean;
  analysis: AnalyzeTextResult;
}
