/**
 * Anthropic Messages API provider.
 */
import { z } from 'zod';
import type { LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import { BaseLLMProvider, API_TIMEOUT_MS, type APIRequest, type APIResponse } from './base.js';

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic' as const;

  constructor(config: Partial<LLMConfig> = {}) {
    super({
      provider: 'anthropic',
      model: config.model || DEFAULT_CONFIGS.anthropic.model,
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      baseUrl: (config.baseUrl || DEFAULT_CONFIGS.anthropic.baseUrl).replace(/\/+$/, ''),
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });
  }

  protected getUnavailableError(): string {
    return 'Anthropic API key not configured. Set ANTHROPIC_API_KEY environment variable.';
  }

  protected async callAPI(request: APIRequest): Promise<APIResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), API_TIMEOUT_MS);

    try {
      const response = await fetch(`${this.config.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.config.apiKey ?? '',
          'anthropic-version': '2023-06-01',
        },
        body: JSON.stringify({
          model: this.config.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Anthropic API error: ${response.status} - ${this.sanitizeError(errorText)}`);
      }

      const parsed = MessagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Invalid response structure from Anthropic API');
      }

      const textContent = parsed.data.content.find((c) => c.type === 'text');
      const usage = parsed.data.usage;

      return {
        content: textContent?.text ?? '',
        usage: usage ? {
          input: usage.input_tokens ?? 0,
          output: usage.output_tokens ?? 0,
          total: (usage.input_tokens ?? 0) + (usage.output_tokens ?? 0),
        } : undefined,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
