/**
 * LLM Provider Factory
 *
 * Creates AI SDK language model instances.
 * Default: OpenRouter. Anthropic and OpenAI when configured.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import type { LanguageModelV1 } from 'ai';
import type { LLMProviderName } from '../config.js';

export interface LLMConfig {
  provider?: LLMProviderName | undefined;
  model?: string | undefined;
  apiKey?: string | undefined;
}

const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  openrouter: 'google/gemini-2.5-flash-lite',
  anthropic: 'claude-3-5-haiku-latest',
  openai: 'gpt-4o-mini',
};

/**
 * Create Anthropic provider (lazy import keeps startup light when unused)
 */
async function createAnthropicProviderAsync(apiKey: string, model: string): Promise<LanguageModelV1> {
  const { createAnthropic } = await import('@ai-sdk/anthropic');
  const anthropic = createAnthropic({ apiKey });
  return anthropic(model);
}

async function createOpenAIProviderAsync(apiKey: string, model: string): Promise<LanguageModelV1> {
  const { createOpenAI } = await import('@ai-sdk/openai');
  const openai = createOpenAI({ apiKey });
  return openai(model);
}

/**
 * Create a language model from configuration and available API keys
 */
export async function createLLMProviderAsync(config: LLMConfig = {}): Promise<LanguageModelV1> {
  const provider = config.provider ?? 'openrouter';
  const model = config.model || getDefaultModelId(provider);

  switch (provider) {
    case 'anthropic': {
      const apiKey = config.apiKey || process.env['ANTHROPIC_API_KEY'];
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY required for Anthropic provider');
      }
      return createAnthropicProviderAsync(apiKey, model);
    }

    case 'openai': {
      const apiKey = config.apiKey || process.env['OPENAI_API_KEY'];
      if (!apiKey) {
        throw new Error('OPENAI_API_KEY required for OpenAI provider');
      }
      return createOpenAIProviderAsync(apiKey, model);
    }

    case 'openrouter': {
      const openrouter = createOpenRouter({
        apiKey: config.apiKey || process.env['OPENROUTER_API_KEY'] || '',
      });
      return openrouter(model);
    }
  }
}

/**
 * Get the default model ID for display
 */
export function getDefaultModelId(provider: LLMProviderName = 'openrouter'): string {
  return DEFAULT_MODELS[provider];
}

/**
 * Check which providers have credentials in the environment
 */
export function getAvailableProviders(): Record<LLMProviderName, boolean> {
  return {
    openrouter: true, // Free tier models need no key
    anthropic: !!process.env['ANTHROPIC_API_KEY'],
    openai: !!process.env['OPENAI_API_KEY'],
  };
}
