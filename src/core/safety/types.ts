/**
 * Request and response contracts for the content safety REST API.
 * Responses are validated with zod before they reach callers.
 */
import { z } from 'zod';
import type { HarmCategory, OutputType } from '../config/schema.js';

/** Maximum characters accepted by text:analyze. */
export const TEXT_MAX_LENGTH = 10000;

/** Maximum decoded image size accepted by image:analyze (4 MB). */
export const IMAGE_MAX_BYTES = 4 * 1024 * 1024;

/** Maximum characters of a single blocklist item. */
export const BLOCKLIST_ITEM_MAX_LENGTH = 128;

/** Maximum items per addOrUpdateBlocklistItems call. */
export const BLOCKLIST_ITEMS_PER_REQUEST = 100;

export const BLOCKLIST_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

export const CategoryAnalysisSchema = z.object({
  category: z.string(),
  severity: z.number().int().optional(),
});

export const BlocklistMatchSchema = z.object({
  blocklistName: z.string(),
  blocklistItemId: z.string(),
  blocklistItemText: z.string(),
});

export const AnalyzeTextResultSchema = z.object({
  blocklistsMatch: z.array(BlocklistMatchSchema).default([]),
  categoriesAnalysis: z.array(CategoryAnalysisSchema).default([]),
});

export const AnalyzeImageResultSchema = z.object({
  categoriesAnalysis: z.array(CategoryAnalysisSchema).default([]),
});

export const AttackAnalysisSchema = z.object({
  attackDetected: z.boolean(),
});

export const ShieldPromptResultSchema = z.object({
  userPromptAnalysis: AttackAnalysisSchema.optional(),
  documentsAnalysis: z.array(AttackAnalysisSchema).default([]),
});

export const UngroundedDetailSchema = z.object({
  text: z.string(),
  offset: z.record(z.string(), z.number()).optional(),
  length: z.record(z.string(), z.number()).optional(),
  reason: z.string().optional(),
});

export const GroundednessResultSchema = z.object({
  ungroundedDetected: z.boolean(),
  ungroundedPercentage: z.number(),
  ungroundedDetails: z.array(UngroundedDetailSchema).default([]),
});

export const BlocklistSchema = z.object({
  blocklistName: z.string(),
  description: z.string().optional(),
});

export const BlocklistItemSchema = z.object({
  blocklistItemId: z.string(),
  description: z.string().optional(),
  text: z.string(),
});

export const AddOrUpdateItemsResultSchema = z.object({
  blocklistItems: z.array(BlocklistItemSchema).default([]),
});

export const BlocklistPageSchema = z.object({
  value: z.array(BlocklistSchema).default([]),
  nextLink: z.string().optional(),
});

export const BlocklistItemPageSchema = z.object({
  value: z.array(BlocklistItemSchema).default([]),
  nextLink: z.string().optional(),
});

export const ServiceErrorBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

export type CategoryAnalysis = z.infer<typeof CategoryAnalysisSchema>;
export type BlocklistMatch = z.infer<typeof BlocklistMatchSchema>;
export type AnalyzeTextResult = z.infer<typeof AnalyzeTextResultSchema>;
export type AnalyzeImageResult = z.infer<typeof AnalyzeImageResultSchema>;
export type ShieldPromptResult = z.infer<typeof ShieldPromptResultSchema>;
export type GroundednessResult = z.infer<typeof GroundednessResultSchema>;
export type Blocklist = z.infer<typeof BlocklistSchema>;
export type BlocklistItem = z.infer<typeof BlocklistItemSchema>;

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface AnalyzeTextRequest {
  text: string;
  categories?: HarmCategory[];
  blocklistNames?: string[];
  haltOnBlocklistHit?: boolean;
  outputType?: OutputType;
}

/** Exactly one of `content` or `blobUrl`. */
export interface AnalyzeImageRequest {
  content?: Buffer;
  blobUrl?: string;
  categories?: HarmCategory[];
}

export interface ShieldPromptRequest {
  userPrompt?: string;
  documents?: string[];
}

export type GroundednessDomain = 'Generic' | 'Medical';
export type GroundednessTask = 'QnA' | 'Summarization';

export interface GroundednessLLMResource {
  endpoint: string;
  deployment: string;
}

export interface GroundednessRequest {
  /** The generated answer or summary to check */
  text: string;
  groundingSources: string[];
  domain?: GroundednessDomain;
  task?: GroundednessTask;
  /** Required for the QnA task */
  query?: string;
  reasoning?: boolean;
  llmResource?: GroundednessLLMResource;
}

export interface BlocklistItemInput {
  text: string;
  description?: string;
}

export interface ListItemsOptions {
  top?: number;
  skip?: number;
}

/**
 * Combined output of a create, populate and analyze run.
 */
export interface BlocklistWorkflowResult {
  blocklist: Blocklist;
  items: BlocklistItem[];
  analysis: AnalyzeTextResult;
}
