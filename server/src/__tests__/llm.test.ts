import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLLMProvider, getCopywriterModel } from '../lib/llm.js';
import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_COPYWRITER_MODEL } from '../lib/config.js';
import {
  OpenAICompatibleProvider,
  startUsageTracking,
  stopUsageTracking,
} from '../lib/llm-provider.js';
import { ConfigError } from '../lib/errors.js';

describe('createLLMProvider', () => {
  it('defaults to Anthropic', () => {
    const provider = createLLMProvider({});
    expect(provider.name).toBe('anthropic');
    expect(getCopywriterModel(provider)).toBe(DEFAULT_ANTHROPIC_MODEL);
  });

  it('picks the OpenAI-compatible endpoint when its key is set', () => {
    const provider = createLLMProvider({ LLM_API_KEY: 'test-key' });
    expect(provider.name).toBe('openai_compatible');
    expect(getCopywriterModel(provider)).toBe(DEFAULT_COPYWRITER_MODEL);
  });

  it('takes the copywriting model from the configured models', () => {
    const models = { anthropic: 'claude-test', openaiCompatible: 'compat-test' };
    expect(getCopywriterModel(createLLMProvider({}), models)).toBe('claude-test');
    expect(getCopywriterModel(createLLMProvider({ LLM_API_KEY: 'test-key' }), models)).toBe('compat-test');
  });

  it('requires a key for the OpenAI-compatible endpoint', () => {
    expect(() => createLLMProvider({ LLM_PROVIDER: 'openai_compatible' })).toThrow(ConfigError);
  });

  it('rejects unknown providers', () => {
    expect(() => createLLMProvider({ LLM_PROVIDER: 'Bogus' }))
      .toThrow('Unknown LLM_PROVIDER "bogus" (expected anthropic or openai_compatible)');
  });
});

describe('OpenAICompatibleProvider', () => {
  afterEach(() => {
    stopUsageTracking('session_usage');
  });

  it('posts a chat completion and records usage for the session', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({
      choices: [{ message: { content: 'Sunset drinks.' } }],
      usage: { prompt_tokens: 30, completion_tokens: 12 },
    }), { status: 200, headers: { 'content-type': 'application/json' } }));
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1/', fetchImpl });
    const usage = startUsageTracking('session_usage');

    const response = await provider.chat({
      model: 'test-model',
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Caption this.' }],
      max_tokens: 100,
      temperature: 0.7,
      session_id: 'session_usage',
    });

    expect(response).toEqual({ text: 'Sunset drinks.', usage: { input_tokens: 30, output_tokens: 12 } });
    expect(usage).toEqual({ input_tokens: 30, output_tokens: 12 });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      max_tokens: 100,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Caption this.' },
      ],
      stream: false,
      temperature: 0.7,
    });
  });

  it('attaches the HTTP status to errors', async () => {
    const provider = new OpenAICompatibleProvider({
      apiKey: 'test-key',
      baseUrl: 'https://llm.test/v1',
      fetchImpl: vi.fn<typeof fetch>(async () => new Response('overloaded', { status: 503 })),
    });

    await expect(provider.chat({ model: 'm', system: 's', messages: [], max_tokens: 10 }))
      .rejects.toMatchObject({ message: 'LLM API error 503: overloaded', status: 503 });
  });
});
