import { AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import type { LLMProvider } from './llm-provider.js';
import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_COPYWRITER_MODEL } from './config.js';
import type { CopywriterModels } from './config.js';
import { ConfigError } from './errors.js';

const DEFAULT_MODELS: CopywriterModels = {
  anthropic: DEFAULT_ANTHROPIC_MODEL,
  openaiCompatible: DEFAULT_COPYWRITER_MODEL,
};

export type ProviderName = 'anthropic' | 'openai_compatible';

// ─── Provider factory ────────────────────────────────────────────────

function resolveProviderName(env: NodeJS.ProcessEnv): ProviderName {
  const configured = env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'anthropic' || configured === 'openai_compatible') return configured;
  if (configured) {
    throw new ConfigError(`Unknown LLM_PROVIDER "${configured}" (expected anthropic or openai_compatible)`);
  }
  // Default to the OpenAI-compatible endpoint when its key is present.
  return env.LLM_API_KEY ? 'openai_compatible' : 'anthropic';
}

export function createLLMProvider(env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const providerName = resolveProviderName(env);

  if (providerName === 'openai_compatible') {
    const apiKey = env.LLM_API_KEY;
    if (!apiKey) {
      throw new ConfigError('LLM_API_KEY environment variable is required when LLM_PROVIDER=openai_compatible');
    }
    const baseUrl = env.LLM_BASE_URL ?? 'https://openrouter.ai/api/v1';
    return new OpenAICompatibleProvider({ apiKey, baseUrl });
  }

  // Anthropic lazily initializes its client on first use.
  return new AnthropicProvider();
}

/**
 * Get the copywriting model for the given provider.
 */
export function getCopywriterModel(provider: LLMProvider, models: CopywriterModels = DEFAULT_MODELS): string {
  return provider.name === 'anthropic' ? models.anthropic : models.openaiCompatible;
}
