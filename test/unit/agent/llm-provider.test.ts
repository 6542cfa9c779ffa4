/**
 * LLM provider factory tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('@ai-sdk/anthropic', () => ({
  createAnthropic: vi.fn((settings: { apiKey: string }) => (modelId: string) => ({
    provider: 'anthropic.messages',
    modelId,
    apiKey: settings.apiKey,
  })),
}));

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn((settings: { apiKey: string }) => (modelId: string) => ({
    provider: 'openai.chat',
    modelId,
    apiKey: settings.apiKey,
  })),
}));

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import {
  createLLMProviderAsync,
  getAvailableProviders,
  getDefaultModelId,
} from '../../../src/agent/llm-provider.js';

describe('createLLMProviderAsync', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should default to OpenRouter with the default model', async () => {
    const model = await createLLMProviderAsync();

    expect(model.modelId).toBe('google/gemini-2.5-flash-lite');
    expect(model.provider).toContain('openrouter');
  });

  it('should use an explicit OpenRouter model', async () => {
    const model = await createLLMProviderAsync({ provider: 'openrouter', model: 'meta-llama/llama-3.3-8b-instruct' });

    expect(model.modelId).toBe('meta-llama/llama-3.3-8b-instruct');
  });

  it('should create an Anthropic model with the configured key', async () => {
    const model = await createLLMProviderAsync({ provider: 'anthropic', apiKey: 'test-key' });

    expect(createAnthropic).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(model.modelId).toBe('claude-3-5-haiku-latest');
  });

  it('should fall back to ANTHROPIC_API_KEY', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-env-key');

    await createLLMProviderAsync({ provider: 'anthropic', model: 'claude-3-5-sonnet-latest' });

    expect(createAnthropic).toHaveBeenCalledWith({ apiKey: 'test-env-key' });
  });

  it('should reject Anthropic without a key', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    await expect(createLLMProviderAsync({ provider: 'anthropic' })).rejects.toThrow(
      'ANTHROPIC_API_KEY required for Anthropic provider'
    );
  });

  it('should create an OpenAI model with the configured key', async () => {
    const model = await createLLMProviderAsync({ provider: 'openai', apiKey: 'test-key', model: 'gpt-4o' });

    expect(createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(model.modelId).toBe('gpt-4o');
  });

  it('should reject OpenAI without a key', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    await expect(createLLMProviderAsync({ provider: 'openai' })).rejects.toThrow(
      'OPENAI_API_KEY required for OpenAI provider'
    );
  });
});

describe('getDefaultModelId', () => {
  it('should return each provider default', () => {
    expect(getDefaultModelId()).toBe('google/gemini-2.5-flash-lite');
    expect(getDefaultModelId('anthropic')).toBe('claude-3-5-haiku-latest');
    expect(getDefaultModelId('openai')).toBe('gpt-4o-mini');
  });
});

describe('getAvailableProviders', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should report providers with keys in the environment', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-key');
    vi.stubEnv('OPENAI_API_KEY', '');

    expect(getAvailableProviders()).toEqual({ openrouter: true, anthropic: true, openai: false });
  });
});
