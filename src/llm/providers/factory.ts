/**
 * LLM provider factory - creates and resolves provider instances.
 */
import type { ILLMProvider, LLMProvider, LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import type { LLMSettings, LLMProviderConfig } from '../../core/config/schema.js';
import type { Credentials } from '../../utils/credentials.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';

const API_KEY_VARIABLES: Record<LLMProvider, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Convert config file settings to LLMConfig format.
 * Resolves API key from: config > credentials (.env / environment) > provider default
 */
function toProviderConfig(
  providerConfig: LLMProviderConfig | undefined,
  provider: LLMProvider,
  credentials?: Credentials
): Partial<LLMConfig> {
  const apiKey = providerConfig?.api_key || credentials?.[API_KEY_VARIABLES[provider]] || undefined;

  return {
    provider,
    model: providerConfig?.model,
    apiKey,
    baseUrl: providerConfig?.base_url,
    maxTokens: providerConfig?.max_tokens,
    temperature: providerConfig?.temperature,
  };
}

/**
 * Create an LLM provider instance.
 */
export function createProvider(
  provider: LLMProvider,
  config: Partial<LLMConfig> = {}
): ILLMProvider {
  switch (provider) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    default:
      throw new Error(`Unknown LLM provider: ${String(provider)}`);
  }
}

/**
 * Create an LLM provider from config file settings.
 */
export function createProviderFromSettings(
  provider: LLMProvider,
  settings?: LLMSettings,
  credentials?: Credentials
): ILLMProvider {
  const providerConfig = settings?.providers?.[provider];
  return createProvider(provider, toProviderConfig(providerConfig, provider, credentials));
}

/**
 * Get the first available provider (has API key configured).
 * Order: explicit preference, config default, openai, anthropic.
 * Returns undefined when none is configured.
 */
export function getAvailableProvider(
  preferred?: LLMProvider,
  settings?: LLMSettings,
  credentials?: Credentials
): ILLMProvider | undefined {
  const order: LLMProvider[] = [];
  for (const name of [preferred, settings?.default_provider, 'openai', 'anthropic'] as const) {
    if (name && !order.includes(name)) {
      order.push(name);
    }
  }

  for (const name of order) {
    const provider = createProviderFromSettings(name, settings, credentials);
    if (provider.isAvailable()) {
      return provider;
    }
  }
  return undefined;
}

/**
 * List all providers with their configuration.
 */
export function listProviders(
  settings?: LLMSettings,
  credentials?: Credentials
): Array<{
  name: LLMProvider;
  available: boolean;
  model: string;
  baseUrl: string;
}> {
  return (['openai', 'anthropic'] as const).map((name) => {
    const providerConfig = settings?.providers?.[name];
    return {
      name,
      available: createProviderFromSettings(name, settings, credentials).isAvailable(),
      model: providerConfig?.model || DEFAULT_CONFIGS[name].model,
      baseUrl: providerConfig?.base_url || DEFAULT_CONFIGS[name].baseUrl,
    };
  });
}
