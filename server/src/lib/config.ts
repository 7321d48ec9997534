import { z } from 'zod';

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parsePositiveNumber(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(raw ?? '');
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const providerSchema = z.enum(['openrouter', 'anthropic']);

export type ReasoningProviderName = z.infer<typeof providerSchema>;

/** Tunables for the monitoring and qualification stages. */
export interface FlowSettings {
  autoAssignLimit: number;
  healthSentimentCoefficient: number;
  healthTrendThreshold: number;
  sentimentRecencyDecay: number;
}

export interface ServerConfig {
  port: number;
  maxRetainedRuns: number;
  orgProfilePath: string | undefined;
  provider: ReasoningProviderName;
  flow: FlowSettings;
}

export const DEFAULT_FLOW_SETTINGS: FlowSettings = {
  autoAssignLimit: 5,
  healthSentimentCoefficient: 15,
  healthTrendThreshold: 5,
  sentimentRecencyDecay: 0.5,
};

function resolveProvider(env: NodeJS.ProcessEnv): ReasoningProviderName {
  const configured = providerSchema.safeParse(env.LLM_PROVIDER?.toLowerCase());
  if (configured.success) return configured.data;
  return env.OPENROUTER_API_KEY ? 'openrouter' : 'anthropic';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const decay = Number.parseFloat(env.SENTIMENT_RECENCY_DECAY ?? '');
  return {
    port: parsePositiveInt(env.PORT, 3001),
    maxRetainedRuns: parsePositiveInt(env.MAX_RETAINED_RUNS, 1000),
    orgProfilePath: env.ORG_PROFILE_PATH || undefined,
    provider: resolveProvider(env),
    flow: {
      autoAssignLimit: parsePositiveInt(env.AUTO_ASSIGN_LIMIT, DEFAULT_FLOW_SETTINGS.autoAssignLimit),
      healthSentimentCoefficient: parsePositiveNumber(
        env.HEALTH_SENTIMENT_COEFFICIENT,
        DEFAULT_FLOW_SETTINGS.healthSentimentCoefficient,
      ),
      healthTrendThreshold: parsePositiveNumber(
        env.HEALTH_TREND_THRESHOLD,
        DEFAULT_FLOW_SETTINGS.healthTrendThreshold,
      ),
      // Decay must stay in (0, 1] so the newest item keeps the largest weight.
      sentimentRecencyDecay: Number.isFinite(decay) && decay > 0 && decay <= 1
        ? decay
        : DEFAULT_FLOW_SETTINGS.sentimentRecencyDecay,
    },
  };
}
