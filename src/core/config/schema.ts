import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Harm categories the service classifies. */
export const HarmCategorySchema = z.enum(['Hate', 'SelfHarm', 'Sexual', 'Violence']);

export const ALL_CATEGORIES = HarmCategorySchema.options;

/** Severity scale returned by text analysis. */
export const OutputTypeSchema = z.enum(['FourSeverityLevels', 'EightSeverityLevels']);

/** Filter strictness; see core/filter/levels.ts for the severity mapping. */
export const FilterLevelSchema = z.enum(['low', 'medium', 'high']);

/** What to do when the LLM review cannot decide. */
export const UnresolvedReviewSchema = z.enum(['block', 'allow']);

export const LLMProviderNameSchema = z.enum(['openai', 'anthropic']);

/** Service connection settings. */
export const ServiceSettingsSchema = z.object({
  /** Endpoints tried in order; falls back to AZURE_CONTENTSAFETY_ENDPOINT */
  endpoints: z.array(z.string().min(1)).default([]),
  api_version: z.string().default('2024-09-01'),
  groundedness_api_version: z.string().default('2024-09-15-preview'),
  timeout_ms: z.number().int().min(1000).default(30000),
});

/** Defaults for text analysis requests. */
export const AnalysisSettingsSchema = z.object({
  categories: z.array(HarmCategorySchema).min(1).default([...ALL_CATEGORIES]),
  output_type: OutputTypeSchema.default('FourSeverityLevels'),
  halt_on_blocklist_hit: z.boolean().default(false),
});

/** Tiered content filter settings. */
export const FilterSettingsSchema = z.object({
  primary_level: FilterLevelSchema.default('medium'),
  secondary_level: FilterLevelSchema.default('low'),
  blocklist: z.string().regex(/^[A-Za-z0-9_.-]{1,64}$/).default('cskit-filter'),
  blocklist_description: z.string().default('Content confirmed harmful by cskit review'),
  review: z.boolean().default(true),
  unresolved_review: UnresolvedReviewSchema.default('block'),
  add_to_blocklist: z.boolean().default(true),
});

/** Azure OpenAI resource used for groundedness reasoning. */
export const GroundednessLLMResourceSchema = z.object({
  endpoint: z.string().min(1),
  deployment: z.string().min(1),
});

export const GroundednessSettingsSchema = z.object({
  domain: z.enum(['Generic', 'Medical']).default('Generic'),
  task: z.enum(['QnA', 'Summarization']).default('QnA'),
  reasoning: z.boolean().default(false),
  llm_resource: GroundednessLLMResourceSchema.optional(),
});

/** Per-provider LLM settings. */
export const LLMProviderConfigSchema = z.object({
  model: z.string().optional(),
  api_key: z.string().optional(),
  base_url: z.string().optional(),
  max_tokens: z.number().int().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export const LLMSettingsSchema = z.object({
  default_provider: LLMProviderNameSchema.optional(),
  providers: z
    .object({
      openai: LLMProviderConfigSchema.optional(),
      anthropic: LLMProviderConfigSchema.optional(),
    })
    .optional(),
});

export const ScanSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(32).default(4),
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/dist/**']),
});

export const OutputFormatSchema = z.enum(['human', 'json']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
});

/** Root configuration schema for .cskit/config.yaml. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  service: withDefaults(ServiceSettingsSchema),
  analysis: withDefaults(AnalysisSettingsSchema),
  filter: withDefaults(FilterSettingsSchema),
  groundedness: withDefaults(GroundednessSettingsSchema),
  llm: withDefaults(LLMSettingsSchema),
  scan: withDefaults(ScanSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

export type HarmCategory = z.infer<typeof HarmCategorySchema>;
export type OutputType = z.infer<typeof OutputTypeSchema>;
export type FilterLevel = z.infer<typeof FilterLevelSchema>;
export type UnresolvedReview = z.infer<typeof UnresolvedReviewSchema>;
export type LLMProviderName = z.infer<typeof LLMProviderNameSchema>;
export type ServiceSettings = z.infer<typeof ServiceSettingsSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type FilterSettings = z.infer<typeof FilterSettingsSchema>;
export type GroundednessSettings = z.infer<typeof GroundednessSettingsSchema>;
export type LLMProviderConfig = z.infer<typeof LLMProviderConfigSchema>;
export type LLMSettings = z.infer<typeof LLMSettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;
