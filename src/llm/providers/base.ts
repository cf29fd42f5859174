/**
 * Base class for LLM providers with the shared review implementation.
 * Providers only need to implement callAPI() and provider-specific config.
 */
import type { HarmReview, HarmVerdict, ILLMProvider, LLMConfig, LLMProvider, TokenUsage } from '../types.js';
import { REVIEW_MAX_TOKENS, REVIEW_TEMPERATURE } from '../types.js';

export interface APIRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface APIResponse {
  content: string;
  usage?: TokenUsage;
}

export const API_TIMEOUT_MS = 60000;

export const REVIEW_SYSTEM_PROMPT = `You are an evaluation assistant.
Check the content below and decide whether it is harmful or not.
**Answer only 'Harmful' or 'Not Harmful'**.`;

export abstract class BaseLLMProvider implements ILLMProvider {
  abstract readonly name: LLMProvider;

  protected config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  /**
   * Make API call to the LLM provider.
   */
  protected abstract callAPI(request: APIRequest): Promise<APIResponse>;

  /**
   * Get the error message when provider is not available.
   */
  protected abstract getUnavailableError(): string;

  async reviewContent(content: string): Promise<HarmReview> {
    if (!this.isAvailable()) {
      return { provider: this.name, verdict: 'inconclusive', error: this.getUnavailableError() };
    }

    try {
      const response = await this.callAPI({
        system: REVIEW_SYSTEM_PROMPT,
        prompt: content,
        maxTokens: this.config.maxTokens ?? REVIEW_MAX_TOKENS,
        temperature: this.config.temperature ?? REVIEW_TEMPERATURE,
      });

      return {
        provider: this.name,
        verdict: parseVerdict(response.content),
        answer: response.content,
        tokenUsage: response.usage,
      };
    } catch (error) {
      return {
        provider: this.name,
        verdict: 'inconclusive',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Trim an error body before it goes into a message.
   */
  protected sanitizeError(errorText: string): string {
    return errorText.length > 200 ? errorText.substring(0, 200) + '...' : errorText;
  }
}

/**
 * Map a model answer to a verdict.
 * Tolerates case, quotes, trailing punctuation, code fences and the "Harmfull" misspelling.
 */
export function parseVerdict(answer: string): HarmVerdict {
  const codeBlock = answer.match(/```(?:\w+)?\s*([\s\S]*?)```/);
  const text = (codeBlock ? codeBlock[1] : answer)
    .toLowerCase()
    .replace(/[*"'`.!]/g, '')
    .trim();

  if (/^not[\s_-]+harmf/.test(text)) return 'not_harmful';
  if (/^harmf/.test(text)) return 'harmful';
  return 'inconclusive';
}
