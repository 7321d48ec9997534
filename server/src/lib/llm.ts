import { type LLMProvider, AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import { ANTHROPIC_MODEL } from './anthropic.js';
import type { ReasoningProviderName } from './config.js';
import type { ReasoningPort } from '../agents/ports.js';
import { withRetry } from './retry.js';
import logger from './logger.js';

export const OPENROUTER_MODEL = process.env.LLM_MODEL ?? 'anthropic/claude-sonnet-4.5';

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

/** Reasoning models sometimes leak a `<think>` preamble; it never carries the answer. */
export function stripThinking(text: string): string {
  return text.replace(THINK_BLOCK, '').trim();
}

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(providerName: ReasoningProviderName): LLMProvider {
  if (providerName === 'openrouter') {
    const apiKey = process.env.OPENROUTER_API_KEY;
    if (!apiKey) {
      throw new Error('OPENROUTER_API_KEY environment variable is required when LLM_PROVIDER=openrouter');
    }
    const baseUrl = process.env.OPENROUTER_BASE_URL ?? 'https://openrouter.ai/api/v1';
    return new OpenAICompatibleProvider({ apiKey, baseUrl });
  }

  // Anthropic lazy-initializes its client on first use.
  return new AnthropicProvider();
}

export function getDefaultModel(provider: LLMProvider): string {
  return provider.name === 'openrouter' ? OPENROUTER_MODEL : ANTHROPIC_MODEL;
}

/**
 * Adapt a chat provider to the single-call `submit` contract the flows use.
 * Transient transport failures are retried; anything else propagates.
 */
export function createReasoningPort(provider: LLMProvider, model = getDefaultModel(provider)): ReasoningPort {
  return {
    async submit(prompt, maxOutputTokens) {
      const response = await withRetry(
        () => provider.chat({ model, prompt, max_tokens: maxOutputTokens }),
        {
          onRetry: (attempt, error) => {
            logger.warn({ attempt, provider: provider.name, error: error.message }, 'Reasoning call failed, retrying');
          },
        },
      );
      return stripThinking(response.text);
    },
  };
}
