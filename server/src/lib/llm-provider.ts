import { AsyncLocalStorage } from 'node:async_hooks';
import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system?: string;
  prompt: string;
  max_tokens: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
  usage: TokenUsage;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Per-run usage tracking ──────────────────────────────────────────

/**
 * Every chat() call made inside `trackUsage(acc, fn)` adds its token usage to
 * `acc`. The AsyncLocalStorage scope follows the run through every await, so
 * concurrent runs never share a counter, and the caller can read `acc` at any
 * point, including after a failure.
 */
const usageContext = new AsyncLocalStorage<TokenUsage>();

export function trackUsage<T>(acc: TokenUsage, fn: () => Promise<T>): Promise<T> {
  return usageContext.run(acc, fn);
}

function recordUsage(usage: TokenUsage): void {
  const acc = usageContext.getStore();
  if (!acc) return;
  acc.input_tokens += usage.input_tokens;
  acc.output_tokens += usage.output_tokens;
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    combinedController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!combinedController.signal.aborted) {
      combinedController.abort(callerSignal?.reason);
    }
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient();
    const response = await anthropic.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        ...(params.system ? { system: params.system } : {}),
        messages: [{ role: 'user', content: params.prompt }],
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
    recordUsage(usage);

    return { text, usage };
  }
}

// ─── OpenAI-compatible provider (OpenRouter) ─────────────────────────

export interface OpenAICompatibleProviderOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openrouter';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAICompatibleProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 180_000;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const messages: OpenAIMessage[] = [];
    if (params.system) messages.push({ role: 'system', content: params.system });
    messages.push({ role: 'user', content: params.prompt });

    const { signal, cleanup } = createCombinedAbortSignal(params.signal, this.timeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: params.model,
          max_tokens: params.max_tokens,
          messages,
        }),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new Error(`Reasoning API error ${response.status}: ${errText.slice(0, 500)}`);
      }

      const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Reasoning API returned an unexpected response body');
      }
      const data = parsed.data;
      const usage = {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      };
      recordUsage(usage);

      return { text: data.choices?.[0]?.message?.content ?? '', usage };
    } finally {
      cleanup();
    }
  }
}

// ─── OpenAI-compatible type definitions (internal) ───────────────────

interface OpenAIMessage {
  role: 'system' | 'user';
  content: string;
}

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
    }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullish(),
});
