/**
 * Monitoring flow: input resolution and finalization.
 *
 * The communications window starts an hour before the deal's latest alert, or
 * seven days back when the deal has none. A failing communications source
 * degrades to an empty batch; the run still completes with a "no data" result.
 */

import { InputResolutionError, errorMessage } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { defineFlow, type FlowDependencies, type FlowOutcome, type FlowRequest } from '../runtime/flow-definition.js';
import type { Communication, Deal, MonitoringState } from '../types.js';
import { MAX_PROMPT_COMMUNICATIONS } from './prompts.js';
import { DEFAULT_HEALTH_SCORE, monitoringStages } from './stages.js';

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_WINDOW_MS = 7 * 24 * HOUR_MS;

export async function monitoringWindowStart(
  deps: FlowDependencies,
  dealId: string,
  log: Logger,
  errors: string[],
  now: Date = new Date(),
): Promise<Date> {
  try {
    const latest = await deps.deals.latestAlertAt(dealId);
    if (latest) return new Date(latest.getTime() - HOUR_MS);
  } catch (err) {
    log.warn({ err }, 'Latest alert lookup failed, using the default window');
    errors.push(`Latest alert lookup failed: ${errorMessage(err)}`);
  }
  return new Date(now.getTime() - DEFAULT_WINDOW_MS);
}

function timestamp(comm: Communication): number {
  const parsed = Date.parse(comm.date);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function newestFirst(communications: readonly Communication[]): Communication[] {
  return [...communications].sort((a, b) => timestamp(b) - timestamp(a));
}

async function fetchCommunications(
  deps: FlowDependencies,
  deal: Deal,
  since: Date,
  log: Logger,
  errors: string[],
): Promise<{ communications: Communication[]; noDataReason: string | null }> {
  try {
    const fetched = newestFirst(await deps.communications.fetchRecent(deal, since));
    return {
      communications: fetched,
      noDataReason: fetched.length === 0 ? `No communications found since ${since.toISOString()}` : null,
    };
  } catch (err) {
    const reason = `Communications fetch failed: ${errorMessage(err)}`;
    log.warn({ err }, 'Communications source unavailable');
    errors.push(reason);
    return { communications: [], noDataReason: reason };
  }
}

async function resolveInput(request: FlowRequest, deps: FlowDependencies, log: Logger): Promise<MonitoringState> {
  const deal = await deps.deals.getDeal(request.deal_id);
  if (!deal) {
    throw new InputResolutionError('Deal not found');
  }

  const errors: string[] = [];
  const since = await monitoringWindowStart(deps, deal.id, log, errors);
  const { communications, noDataReason } = await fetchCommunications(deps, deal, since, log, errors);
  log.info({ communications: communications.length, since: since.toISOString() }, 'Monitoring inputs resolved');

  return {
    deal_id: deal.id,
    run_id: request.run_id,
    current_stage: '',
    errors,
    deal,
    recent_communications: communications,
    no_data_reason: noDataReason,
    sentiment_scores: [],
    overall_sentiment: 0,
    key_concerns: [],
    positive_signals: [],
    health_score: deal.health_score ?? DEFAULT_HEALTH_SCORE,
    trend: 'stable',
    detected_alerts: [],
    recovery_email: '',
    recovery_subject: '',
    recovery_body: '',
    recovery_actions: [],
  };
}

async function notifyUrgent(state: MonitoringState, deps: FlowDependencies, log: Logger): Promise<number> {
  const notifier = deps.notifier;
  if (!notifier) return 0;

  let sent = 0;
  for (const alert of state.detected_alerts) {
    if (alert.severity !== 'critical' && alert.severity !== 'high') continue;
    try {
      await notifier.notify(state.deal_id, alert);
      sent++;
    } catch (err) {
      log.warn({ err, alertType: alert.alert_type }, 'Alert notification failed');
    }
  }
  return sent;
}

async function finalize(state: MonitoringState, deps: FlowDependencies, log: Logger): Promise<FlowOutcome> {
  const notified = await notifyUrgent(state, deps, log);
  await deps.results?.save({ flow_type: 'monitoring', run_id: state.run_id, deal_id: state.deal_id, state });

  log.info(
    { health: state.health_score, trend: state.trend, alerts: state.detected_alerts.length, notified },
    'Monitoring finalized',
  );

  return {
    message: state.no_data_reason ? 'Monitoring complete, no relevant communications found' : 'Monitoring complete',
    summary: {
      health_score: state.health_score,
      trend: state.trend,
      sentiment: state.overall_sentiment,
      alerts_generated: state.detected_alerts.length,
      communications_analyzed: Math.min(state.recent_communications.length, MAX_PROMPT_COMMUNICATIONS),
      no_data_reason: state.no_data_reason,
      issues: state.errors,
    },
  };
}

export const monitoringFlow = defineFlow<MonitoringState>({
  type: 'monitoring',
  stages: monitoringStages,
  resolveInput,
  finalize,
});
