import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
  session_id?: string;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

// ─── Per-session usage tracking ─────────────────────────────────────

export interface UsageAccumulator {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Per-session usage accumulators. The orchestrator registers one before a run
 * and reads it at the end; every chat() call that names the session adds to it.
 */
const sessionUsageAccumulators = new Map<string, UsageAccumulator>();

/** Register a session for usage tracking. Returns the accumulator to read later. */
export function startUsageTracking(sessionId: string): UsageAccumulator {
  const acc: UsageAccumulator = { input_tokens: 0, output_tokens: 0 };
  sessionUsageAccumulators.set(sessionId, acc);
  return acc;
}

/** Stop tracking and remove the accumulator. */
export function stopUsageTracking(sessionId: string): void {
  sessionUsageAccumulators.delete(sessionId);
}

export function recordUsage(usage: UsageAccumulator, sessionId?: string): void {
  if (!sessionId) return;
  const acc = sessionUsageAccumulators.get(sessionId);
  if (!acc) return;
  acc.input_tokens += usage.input_tokens;
  acc.output_tokens += usage.output_tokens;
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly clientFactory: () => Anthropic = getAnthropicClient) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = this.clientFactory();
    const response = await anthropic.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
        ...(params.temperature !== undefined && { temperature: params.temperature }),
      },
      { signal: params.signal },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    const usage = {
      input_tokens: response.usage?.input_tokens ?? 0,
      output_tokens: response.usage?.output_tokens ?? 0,
    };
    recordUsage(usage, params.session_id);

    return { text, usage };
  }
}

// ─── OpenAI-compatible provider (OpenRouter, Z.AI, OpenAI) ───────────

interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai_compatible';
  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages.map((m) => ({ role: m.role, content: m.content })),
      ],
      stream: false,
    };
    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }

    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw Object.assign(
        new Error(`LLM API error ${response.status}: ${errText.slice(0, 500)}`),
        { status: response.status },
      );
    }

    const data = openAIChatResponseSchema.parse(await response.json());
    const usage = {
      input_tokens: data.usage?.prompt_tokens ?? 0,
      output_tokens: data.usage?.completion_tokens ?? 0,
    };
    recordUsage(usage, params.session_id);

    return { text: data.choices?.[0]?.message?.content ?? '', usage };
  }
}

// ─── OpenAI-compatible response shape (internal) ────────────────────

const openAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullable().optional(),
});
