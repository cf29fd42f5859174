/**
 * LLM provider types for the second-opinion content review.
 * Provider-agnostic: any OpenAI-compatible or Anthropic endpoint.
 */

/**
 * Supported LLM providers.
 * - openai: OpenAI-compatible chat completions (OpenAI, Azure AI model inference, local gateways)
 * - anthropic: Anthropic Messages API
 */
export type LLMProvider = 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
}

/** A verdict needs only a couple of words. */
export const REVIEW_MAX_TOKENS = 15;
export const REVIEW_TEMPERATURE = 0.1;

export const DEFAULT_CONFIGS: Record<LLMProvider, Required<Pick<LLMConfig, 'model' | 'baseUrl'>>> = {
  openai: {
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
  },
  anthropic: {
    model: 'claude-3-haiku-20240307',
    baseUrl: 'https://api.anthropic.com',
  },
};

export type HarmVerdict = 'harmful' | 'not_harmful' | 'inconclusive';

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

/**
 * Outcome of asking a model whether content is harmful.
 */
export interface HarmReview {
  provider: LLMProvider;
  verdict: HarmVerdict;
  /** Raw model answer */
  answer?: string;
  error?: string;
  tokenUsage?: TokenUsage;
}

export interface ILLMProvider {
  readonly name: LLMProvider;

  /**
   * Ask the model whether the content is harmful.
   * Never throws: transport and parse failures come back as an inconclusive review.
   */
  reviewContent(content: string): Promise<HarmReview>;

  /**
   * Check if the provider is available (API key set).
   */
  isAvailable(): boolean;
}
