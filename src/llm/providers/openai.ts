/**
 * OpenAI-compatible chat completions provider.
 * Works with api.openai.com and any endpoint exposing /chat/completions
 * (Azure AI model inference, self-hosted gateways) via base_url.
 */
import { z } from 'zod';
import type { LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import { BaseLLMProvider, API_TIMEOUT_MS, type APIRequest, type APIResponse } from './base.js';

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }).optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai' as const;

  constructor(config: Partial<LLMConfig> = {}) {
    super({
      provider: 'openai',
      model: config.model || DEFAULT_CONFIGS.openai.model,
      apiKey: config.apiKey || process.env.OPENAI_API_KEY,
      baseUrl: (config.baseUrl || DEFAULT_CONFIGS.openai.baseUrl).replace(/\/+$/, ''),
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });
  }

  protected getUnavailableError(): string {
    return 'OpenAI API key not configured. Set OPENAI_API_KEY environment variable.';
  }

  protected async callAPI(request: APIRequest): Promise<APIResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), API_TIMEOUT_MS);

    try {
      const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          presence_penalty: 0,
          frequency_penalty: 0,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`OpenAI API error: ${response.status} - ${this.sanitizeError(errorText)}`);
      }

      const parsed = ChatCompletionSchema.safeParse(await response.json());
      const content = parsed.success ? parsed.data.choices[0]?.message?.content : undefined;
      if (!parsed.success || typeof content !== 'string') {
        throw new Error('Invalid response structure from OpenAI API');
      }

      const usage = parsed.data.usage;
      return {
        content,
        usage: usage ? {
          input: usage.prompt_tokens ?? 0,
          output: usage.completion_tokens ?? 0,
          total: usage.total_tokens ?? 0,
        } : undefined,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
