import { DEFAULT_FLOW_SETTINGS } from '../lib/config.js';
import logger from '../lib/logger.js';
import type { ReasoningPort } from '../agents/ports.js';
import type { StageContext } from '../agents/runtime/stage-graph.js';
import type { CapabilityRecord, Deal } from '../agents/types.js';
import { InMemoryDealStore } from '../lib/in-memory-deal-store.js';
import type { FlowDependencies } from '../agents/runtime/flow-definition.js';

export const PROMPT_KEYS = {
  extract: 'Analyze this RFP',
  analyze: 'Assess these client requirements',
  decide: 'Make a go / no-go decision',
  generate: 'senior proposal writer',
  comply: 'You are a compliance checker',
  sentiment: 'Analyze the sentiment',
  recovery: 'shows warning signs',
  followUp: 'is trending well',
} as const;

export type PromptKey = keyof typeof PROMPT_KEYS;

const PROMPT_ORDER: readonly PromptKey[] = [
  'extract', 'analyze', 'decide', 'generate', 'comply', 'sentiment', 'recovery', 'followUp',
];

type Reply = string | Error;

/**
 * ReasoningPort fake that answers by matching a phrase in the prompt.
 * A prompt that matches no rule fails the call.
 */
export class ScriptedReasoning implements ReasoningPort {
  readonly calls: Array<{ prompt: string; maxOutputTokens: number }> = [];

  constructor(private readonly replies: Partial<Record<PromptKey, Reply>> = {}) {}

  async submit(prompt: string, maxOutputTokens: number): Promise<string> {
    this.calls.push({ prompt, maxOutputTokens });
    for (const key of PROMPT_ORDER) {
      if (!prompt.includes(PROMPT_KEYS[key])) continue;
      const reply = this.replies[key];
      if (reply === undefined) break;
      if (reply instanceof Error) throw reply;
      return reply;
    }
    throw new Error(`No scripted reply for prompt: ${prompt.slice(0, 60)}`);
  }

  callsFor(key: PromptKey): Array<{ prompt: string; maxOutputTokens: number }> {
    return this.calls.filter((call) => call.prompt.includes(PROMPT_KEYS[key]));
  }
}

export function makeDeal(overrides: Partial<Deal> = {}): Deal {
  return {
    id: 'deal-1',
    title: 'Claims Portal Rebuild',
    client_name: 'Harbor Mutual',
    description: 'Replace the legacy claims intake portal.',
    deal_value: 250_000,
    budget_range: '$200k-$300k',
    timeline: '6 months',
    health_score: 70,
    previous_health_score: null,
    stage: 'lead',
    status: 'active',
    ...overrides,
  };
}

export function makeCapability(overrides: Partial<CapabilityRecord> & Pick<CapabilityRecord, 'id' | 'name'>): CapabilityRecord {
  return {
    role: 'Engineer',
    department: 'Delivery',
    skills: [],
    availability_percent: 100,
    hourly_rate: 100,
    ...overrides,
  };
}

export function stageContext(reasoning: ReasoningPort = new ScriptedReasoning(), store = new InMemoryDealStore()): StageContext {
  return {
    runId: 'run-test',
    log: logger,
    reasoning,
    retrieval: store,
    settings: { ...DEFAULT_FLOW_SETTINGS },
  };
}

export function flowDependencies(store: InMemoryDealStore, reasoning: ReasoningPort): FlowDependencies {
  return {
    deals: store,
    roster: store,
    assignments: store,
    retrieval: store,
    communications: store,
    reasoning,
    settings: { ...DEFAULT_FLOW_SETTINGS },
    notifier: store,
    results: store,
  };
}
