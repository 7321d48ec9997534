/**
 * Monitoring flow stages: sentiment → health → alert → recovery.
 *
 * Only sentiment and recovery talk to the reasoning service; health and alert
 * are deterministic over the sentiment figure. Without communications no
 * alert is raised, so recovery is skipped too.
 */

import type { FlowSettings } from '../../lib/config.js';
import { extract, type ExtractionShape } from '../runtime/resilient-extractor.js';
import type { Stage } from '../runtime/stage-graph.js';
import {
  RecoverySchema,
  SentimentSchema,
  type RecoveryOutput,
  type SentimentOutput,
  type SentimentScore,
} from '../schemas/monitoring-schemas.js';
import { clamp } from '../schemas/shared.js';
import type { Alert, HealthTrend, MonitoringState } from '../types.js';
import { MAX_PROMPT_COMMUNICATIONS, buildFollowUpPrompt, buildRecoveryPrompt, buildSentimentPrompt } from './prompts.js';

export const SENTIMENT_MAX_TOKENS = 2048;
export const RECOVERY_MAX_TOKENS = 2048;
export const DEFAULT_HEALTH_SCORE = 70;

export const SENTIMENT_SHAPE: ExtractionShape<SentimentOutput> = {
  name: 'sentiment analysis',
  marker: 'overall_sentiment',
  schema: SentimentSchema,
  fallback: () => ({ scores: [], overall_sentiment: 0, key_concerns: [], positive_signals: [] }),
};

export const RECOVERY_SHAPE: ExtractionShape<RecoveryOutput> = {
  name: 'recovery plan',
  marker: 'recovery_email',
  schema: RecoverySchema,
  fallback: () => ({ recovery_email: '', recovery_actions: [] }),
};

/**
 * Weighted mean of per-item scores where item `i` (0 = newest) weighs
 * `decay^i`. Returns null when there is nothing to average.
 */
export function recencyWeightedSentiment(scores: readonly SentimentScore[], decay: number): number | null {
  if (scores.length === 0) return null;

  let weighted = 0;
  let totalWeight = 0;
  scores.forEach((score, position) => {
    const weight = decay ** (score.index ?? position);
    weighted += score.sentiment * weight;
    totalWeight += weight;
  });

  return totalWeight > 0 ? clamp(weighted / totalWeight, -1, 1) : null;
}

export function computeHealth(
  base: number,
  previous: number,
  sentiment: number,
  settings: Pick<FlowSettings, 'healthSentimentCoefficient' | 'healthTrendThreshold'>,
): { health_score: number; trend: HealthTrend } {
  const adjustment = Math.trunc(sentiment * settings.healthSentimentCoefficient);
  const health = clamp(base + adjustment, 0, 100);

  let trend: HealthTrend = 'stable';
  if (health - previous > settings.healthTrendThreshold) trend = 'up';
  else if (previous - health > settings.healthTrendThreshold) trend = 'down';

  return { health_score: health, trend };
}

export function deriveAlerts(sentiment: number, health: number, scores: readonly SentimentScore[]): Alert[] {
  const alerts: Alert[] = [];

  if (sentiment < -0.3) {
    alerts.push({
      alert_type: 'sentiment_drop',
      severity: sentiment < -0.6 ? 'critical' : 'high',
      title: 'Client sentiment dropped',
      description: `Overall client sentiment is ${sentiment.toFixed(2)}.`,
    });
  }

  if (health < 50) {
    alerts.push({
      alert_type: 'deadline_risk',
      severity: 'high',
      title: 'Deal health at risk',
      description: `Health score fell to ${health}.`,
    });
  }

  for (const score of scores) {
    const signal = score.signals.find((s) => s.toLowerCase().includes('competitor'));
    if (signal) {
      alerts.push({
        alert_type: 'competitor_mention',
        severity: 'medium',
        title: 'Competitor mentioned',
        description: `Signal in client communication: "${signal}".`,
      });
    }
  }

  if (alerts.length === 0 && sentiment > 0.2) {
    alerts.push({
      alert_type: 'positive_update',
      severity: 'info',
      title: 'Positive client momentum',
      description: `Overall client sentiment is ${sentiment.toFixed(2)}.`,
    });
  }

  return alerts;
}

export const AT_RISK_STATUS = 'at_risk';

/** Any alert other than a positive update puts the deal at risk. */
export function raisesRisk(alerts: readonly Alert[]): boolean {
  return alerts.some((alert) => alert.alert_type !== 'positive_update');
}

/** A leading `Subject:` line becomes the subject; otherwise reply to the deal title. */
export function splitRecoveryEmail(email: string, dealTitle: string): { subject: string; body: string } {
  const trimmed = email.trim();
  if (!trimmed) return { subject: '', body: '' };

  const [first = '', ...rest] = trimmed.split('\n');
  const subject = /^subject:\s*(.*)$/i.exec(first.trim());
  if (subject) {
    return { subject: (subject[1] ?? '').trim(), body: rest.join('\n').trim() };
  }
  return { subject: `Re: ${dealTitle}`, body: trimmed };
}

const sentiment: Stage<MonitoringState> = {
  name: 'sentiment',
  label: 'Analyzing communication sentiment...',
  writes: ['sentiment_scores', 'overall_sentiment', 'key_concerns', 'positive_signals'],
  async run(state, ctx) {
    if (state.recent_communications.length === 0) {
      return { sentiment_scores: [], overall_sentiment: 0, key_concerns: [], positive_signals: [] };
    }

    const batch = state.recent_communications.slice(0, MAX_PROMPT_COMMUNICATIONS);
    const raw = await ctx.reasoning.submit(buildSentimentPrompt(state.deal, batch), SENTIMENT_MAX_TOKENS);
    const { value, strategy, issue } = extract(raw, SENTIMENT_SHAPE);

    const overall = clamp(
      recencyWeightedSentiment(value.scores, ctx.settings.sentimentRecencyDecay) ?? value.overall_sentiment ?? 0,
      -1,
      1,
    );
    ctx.log.info({ scored: value.scores.length, overall, strategy }, 'sentiment: communications scored');

    return {
      sentiment_scores: value.scores,
      overall_sentiment: overall,
      key_concerns: value.key_concerns,
      positive_signals: value.positive_signals,
      ...(issue ? { errors: [issue] } : {}),
    };
  },
};

const health: Stage<MonitoringState> = {
  name: 'health',
  label: 'Calculating deal health...',
  writes: ['health_score', 'trend'],
  async run(state, ctx) {
    const base = state.deal.health_score ?? DEFAULT_HEALTH_SCORE;
    const previous = state.deal.previous_health_score ?? base;
    const result = computeHealth(base, previous, state.overall_sentiment, ctx.settings);
    ctx.log.info({ base, previous, ...result }, 'health: score computed');
    return result;
  },
};

const alert: Stage<MonitoringState> = {
  name: 'alert',
  label: 'Checking alert thresholds...',
  writes: ['detected_alerts'],
  async run(state, ctx) {
    if (state.recent_communications.length === 0) {
      ctx.log.info({ reason: state.no_data_reason }, 'alert: no communications, thresholds not evaluated');
      return { detected_alerts: [] };
    }
    const alerts = deriveAlerts(state.overall_sentiment, state.health_score, state.sentiment_scores);
    ctx.log.info({ alerts: alerts.map((a) => a.alert_type) }, 'alert: thresholds evaluated');
    return { detected_alerts: alerts };
  },
};

const recovery: Stage<MonitoringState> = {
  name: 'recovery',
  label: 'Drafting recovery plan...',
  writes: ['recovery_email', 'recovery_subject', 'recovery_body', 'recovery_actions'],
  async run(state, ctx) {
    if (state.detected_alerts.length === 0) {
      return { recovery_email: '', recovery_subject: '', recovery_body: '', recovery_actions: [] };
    }

    const positiveOnly = state.detected_alerts.every((a) => a.alert_type === 'positive_update');
    const prompt = positiveOnly
      ? buildFollowUpPrompt(state.deal, state.detected_alerts, state.positive_signals, state.recent_communications)
      : buildRecoveryPrompt(state.deal, state.detected_alerts, state.key_concerns, state.recent_communications);

    const raw = await ctx.reasoning.submit(prompt, RECOVERY_MAX_TOKENS);
    const { value, strategy, issue } = extract(raw, RECOVERY_SHAPE);
    const { subject, body } = splitRecoveryEmail(value.recovery_email, state.deal.title);
    ctx.log.info({ positiveOnly, actions: value.recovery_actions.length, strategy }, 'recovery: plan drafted');

    return {
      recovery_email: value.recovery_email,
      recovery_subject: subject,
      recovery_body: body,
      recovery_actions: value.recovery_actions,
      ...(issue ? { errors: [issue] } : {}),
    };
  },
};

export const monitoringStages: ReadonlyArray<Stage<MonitoringState>> = [sentiment, health, alert, recovery];
