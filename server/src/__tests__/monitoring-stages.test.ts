import { describe, it, expect } from 'vitest';
import { DEFAULT_FLOW_SETTINGS } from '../lib/config.js';
import logger from '../lib/logger.js';
import {
  computeHealth,
  deriveAlerts,
  monitoringStages,
  recencyWeightedSentiment,
  splitRecoveryEmail,
} from '../agents/monitoring/stages.js';
import { monitoringWindowStart, newestFirst } from '../agents/monitoring/flow.js';
import { formatCommunications, formatSourceEmails, replyRecipient } from '../agents/monitoring/prompts.js';
import type { Communication, HealthTrend, MonitoringState } from '../agents/types.js';
import { InMemoryDealStore } from '../lib/in-memory-deal-store.js';
import { ScriptedReasoning, flowDependencies, makeDeal, stageContext } from './fixtures.js';

function monitoringState(overrides: Partial<MonitoringState> = {}): MonitoringState {
  return {
    deal_id: 'deal-1',
    run_id: 'run-test',
    current_stage: '',
    errors: [],
    deal: makeDeal(),
    recent_communications: [],
    no_data_reason: null,
    sentiment_scores: [],
    overall_sentiment: 0,
    key_concerns: [],
    positive_signals: [],
    health_score: 70,
    trend: 'stable',
    detected_alerts: [],
    recovery_email: '',
    recovery_subject: '',
    recovery_body: '',
    recovery_actions: [],
    ...overrides,
  };
}

function stageNamed(name: string) {
  const stage = monitoringStages.find((s) => s.name === name);
  if (!stage) throw new Error(`missing stage ${name}`);
  return stage;
}

class OfflineAlertStore extends InMemoryDealStore {
  override async latestAlertAt(): Promise<Date | null> {
    throw new Error('alerts table offline');
  }
}

const COMM: Communication = { from: 'pm@client.test', subject: 'Status', content: 'All good.', date: '2026-03-01T10:00:00.000Z' };

describe('recencyWeightedSentiment', () => {
  it('weights newer items more heavily', () => {
    const result = recencyWeightedSentiment(
      [{ index: 0, sentiment: 1, signals: [], summary: '' }, { index: 1, sentiment: -1, signals: [], summary: '' }],
      0.5,
    );
    expect(result).toBeCloseTo(1 / 3, 10);
  });

  it('falls back to list position when an index is missing', () => {
    const result = recencyWeightedSentiment(
      [{ sentiment: -0.4, signals: [], summary: '' }, { sentiment: 0.8, signals: [], summary: '' }],
      1,
    );
    expect(result).toBeCloseTo(0.2, 10);
  });

  it('returns null with nothing to average', () => {
    expect(recencyWeightedSentiment([], 0.5)).toBeNull();
  });
});

describe('computeHealth', () => {
  const cases: Array<[number, number, number, number, HealthTrend]> = [
    [70, 70, 0.4, 76, 'up'],
    [70, 70, -0.2, 67, 'stable'],
    [70, 80, -0.7, 60, 'down'],
    [98, 98, 1, 100, 'stable'],
    [5, 5, -1, 0, 'stable'],
  ];

  it.each(cases)('base %i, previous %i, sentiment %d gives %i (%s)', (base, previous, sentiment, health, trend) => {
    expect(computeHealth(base, previous, sentiment, DEFAULT_FLOW_SETTINGS)).toEqual({ health_score: health, trend });
  });

  it('honours a custom coefficient and threshold', () => {
    expect(computeHealth(50, 50, 0.5, { healthSentimentCoefficient: 30, healthTrendThreshold: 20 })).toEqual({
      health_score: 65,
      trend: 'stable',
    });
  });
});

describe('deriveAlerts', () => {
  it('raises a critical sentiment drop below -0.6', () => {
    expect(deriveAlerts(-0.7, 60, [])).toEqual([
      {
        alert_type: 'sentiment_drop',
        severity: 'critical',
        title: 'Client sentiment dropped',
        description: 'Overall client sentiment is -0.70.',
      },
    ]);
  });

  it('raises a high sentiment drop between -0.6 and -0.3', () => {
    const alerts = deriveAlerts(-0.4, 64, []);
    expect(alerts.map((a) => [a.alert_type, a.severity])).toEqual([['sentiment_drop', 'high']]);
  });

  it('flags low health even with positive sentiment and suppresses the positive update', () => {
    expect(deriveAlerts(0.5, 45, [])).toEqual([
      { alert_type: 'deadline_risk', severity: 'high', title: 'Deal health at risk', description: 'Health score fell to 45.' },
    ]);
  });

  it('emits one competitor alert per score that mentions a competitor', () => {
    const alerts = deriveAlerts(0, 70, [
      { index: 0, sentiment: 0, signals: ['Evaluating a COMPETITOR', 'competitor pricing'], summary: '' },
      { index: 1, sentiment: 0, signals: ['budget concern'], summary: '' },
    ]);
    expect(alerts).toEqual([
      {
        alert_type: 'competitor_mention',
        severity: 'medium',
        title: 'Competitor mentioned',
        description: 'Signal in client communication: "Evaluating a COMPETITOR".',
      },
    ]);
  });

  it('reports positive momentum only when nothing else fired', () => {
    expect(deriveAlerts(0.5, 77, []).map((a) => [a.alert_type, a.severity])).toEqual([['positive_update', 'info']]);
    expect(deriveAlerts(0.2, 73, [])).toEqual([]);
  });
});

describe('splitRecoveryEmail', () => {
  it('takes a leading subject line', () => {
    expect(splitRecoveryEmail('subject: Next steps\n\nHello,\nThanks.', 'Portal')).toEqual({
      subject: 'Next steps',
      body: 'Hello,\nThanks.',
    });
  });

  it('replies to the deal title when there is no subject line', () => {
    expect(splitRecoveryEmail('  Hello there.  ', 'Portal')).toEqual({ subject: 'Re: Portal', body: 'Hello there.' });
  });

  it('returns empty parts for an empty email', () => {
    expect(splitRecoveryEmail('   ', 'Portal')).toEqual({ subject: '', body: '' });
  });
});

describe('monitoring stages', () => {
  it('sentiment skips the reasoning call when there are no communications', async () => {
    const reasoning = new ScriptedReasoning();

    const update = await stageNamed('sentiment').run(monitoringState(), stageContext(reasoning));

    expect(update).toEqual({ sentiment_scores: [], overall_sentiment: 0, key_concerns: [], positive_signals: [] });
    expect(reasoning.calls).toHaveLength(0);
  });

  it('sentiment uses the overall figure when no item scores come back', async () => {
    const reasoning = new ScriptedReasoning({ sentiment: '{"overall_sentiment": 0.35, "positive_signals": ["renewal talk"]}' });

    const update = await stageNamed('sentiment').run(monitoringState({ recent_communications: [COMM] }), stageContext(reasoning));

    expect(update.overall_sentiment).toBe(0.35);
    expect(update.positive_signals).toEqual(['renewal talk']);
    expect(update.errors).toBeUndefined();
  });

  it('sentiment degrades to neutral on unparseable output', async () => {
    const reasoning = new ScriptedReasoning({ sentiment: 'The client seems fine.' });

    const update = await stageNamed('sentiment').run(monitoringState({ recent_communications: [COMM] }), stageContext(reasoning));

    expect(update.overall_sentiment).toBe(0);
    expect(update.errors).toEqual(['Could not parse sentiment analysis output; manual review required']);
  });

  it('health starts from the default score when the deal has none', async () => {
    const state = monitoringState({ deal: makeDeal({ health_score: null }), overall_sentiment: 0.5 });

    const update = await stageNamed('health').run(state, stageContext());

    expect(update).toEqual({ health_score: 77, trend: 'up' });
  });

  it('alert raises nothing without communications, even for an unhealthy deal', async () => {
    const state = monitoringState({ deal: makeDeal({ health_score: 40 }), health_score: 40, overall_sentiment: -0.8 });

    const update = await stageNamed('alert').run(state, stageContext());

    expect(update).toEqual({ detected_alerts: [] });
  });

  it('alert evaluates thresholds once communications exist', async () => {
    const state = monitoringState({ recent_communications: [COMM], health_score: 40 });

    const update = await stageNamed('alert').run(state, stageContext());

    expect(update.detected_alerts?.map((a) => a.alert_type)).toEqual(['deadline_risk']);
  });

  it('recovery answers the client email it is replying to', async () => {
    const reasoning = new ScriptedReasoning({
      recovery: '{"recovery_email": "Subject: Timeline\\nHi Dana", "recovery_actions": []}',
    });
    const state = monitoringState({
      recent_communications: [
        { from: '"Dana Lee" <dana@harbor.test>', subject: 'Missed milestone', content: 'The March demo slipped again.', date: '2026-03-02T09:00:00.000Z' },
        COMM,
      ],
      detected_alerts: deriveAlerts(-0.5, 62, []),
      key_concerns: ['Schedule slips'],
    });

    const update = await stageNamed('recovery').run(state, stageContext(reasoning));

    const prompt = reasoning.callsFor('recovery')[0]?.prompt ?? '';
    expect(prompt).toContain('From: "Dana Lee" <dana@harbor.test>\nSubject: Missed milestone\nDate: 2026-03-02T09:00:00.000Z\nThe March demo slipped again.');
    expect(prompt).toContain('RECIPIENT: Dana Lee at dana@harbor.test');
    expect(prompt).toContain('Draft a short, professional reply to Dana Lee');
    expect(update.recovery_subject).toBe('Timeline');
    expect(update.recovery_body).toBe('Hi Dana');
  });

  it('recovery is skipped without alerts', async () => {
    const reasoning = new ScriptedReasoning();

    const update = await stageNamed('recovery').run(monitoringState(), stageContext(reasoning));

    expect(update).toEqual({ recovery_email: '', recovery_subject: '', recovery_body: '', recovery_actions: [] });
    expect(reasoning.calls).toHaveLength(0);
  });

  it('recovery drafts a follow-up when only positive updates fired', async () => {
    const reasoning = new ScriptedReasoning({
      followUp: '{"recovery_email": "Great progress on the pilot.", "recovery_actions": ["Book the review"]}',
    });
    const state = monitoringState({ detected_alerts: deriveAlerts(0.5, 77, []), positive_signals: ['pilot success'] });

    const update = await stageNamed('recovery').run(state, stageContext(reasoning));

    expect(reasoning.callsFor('followUp')).toHaveLength(1);
    expect(reasoning.callsFor('followUp')[0]?.prompt).toContain('- pilot success');
    expect(update.recovery_subject).toBe('Re: Claims Portal Rebuild');
    expect(update.recovery_body).toBe('Great progress on the pilot.');
    expect(update.recovery_actions).toEqual(['Book the review']);
  });
});

describe('monitoring window and ordering', () => {
  const now = new Date('2026-03-10T12:00:00.000Z');

  it('starts an hour before the latest alert', async () => {
    const store = new InMemoryDealStore({ latestAlerts: { 'deal-1': new Date('2026-03-09T08:00:00.000Z') } });
    const errors: string[] = [];

    const since = await monitoringWindowStart(flowDependencies(store, new ScriptedReasoning()), 'deal-1', logger, errors, now);

    expect(since.toISOString()).toBe('2026-03-09T07:00:00.000Z');
    expect(errors).toEqual([]);
  });

  it('defaults to seven days back', async () => {
    const store = new InMemoryDealStore();

    const since = await monitoringWindowStart(flowDependencies(store, new ScriptedReasoning()), 'deal-1', logger, [], now);

    expect(since.toISOString()).toBe('2026-03-03T12:00:00.000Z');
  });

  it('records a failed alert lookup and uses the default window', async () => {
    const deps = flowDependencies(new OfflineAlertStore(), new ScriptedReasoning());
    const errors: string[] = [];

    const since = await monitoringWindowStart(deps, 'deal-1', logger, errors, now);

    expect(since.toISOString()).toBe('2026-03-03T12:00:00.000Z');
    expect(errors).toEqual(['Latest alert lookup failed: alerts table offline']);
  });

  it('orders communications newest first with undated items last', () => {
    const ordered = newestFirst([
      { ...COMM, subject: 'old', date: '2026-03-01T00:00:00.000Z' },
      { ...COMM, subject: 'undated', date: 'not a date' },
      { ...COMM, subject: 'new', date: '2026-03-05T00:00:00.000Z' },
    ]);

    expect(ordered.map((c) => c.subject)).toEqual(['new', 'old', 'undated']);
  });

  it('formats communications with zero-based headers and truncated content', () => {
    const text = formatCommunications([{ ...COMM, content: 'x'.repeat(1500) }]);

    expect(text.split('\n').slice(0, 3)).toEqual([
      '--- Communication 0 (2026-03-01T10:00:00.000Z) ---',
      'From: pm@client.test',
      'Subject: Status',
    ]);
    expect(text.split('\n')[3]).toHaveLength(1000);
  });
});

describe('reply context', () => {
  const deal = makeDeal();

  it('uses the display name of the first sender', () => {
    expect(replyRecipient(deal, [{ ...COMM, from: '  ' }, { ...COMM, from: '"Dana Lee" <dana@harbor.test>' }]))
      .toEqual({ name: 'Dana Lee', email: 'dana@harbor.test' });
  });

  it('falls back to the local part of a bare address', () => {
    expect(replyRecipient(deal, [COMM])).toEqual({ name: 'pm', email: 'pm@client.test' });
  });

  it('addresses the client when no sender is known', () => {
    expect(replyRecipient(deal, [])).toEqual({ name: 'Harbor Mutual', email: '' });
  });

  it('caps each source email at 500 characters', () => {
    const text = formatSourceEmails([{ ...COMM, content: 'x'.repeat(600) }, COMM]);

    expect(text.split('\n---\n')).toEqual([
      `From: pm@client.test\nSubject: Status\nDate: 2026-03-01T10:00:00.000Z\n${'x'.repeat(500)}`,
      'From: pm@client.test\nSubject: Status\nDate: 2026-03-01T10:00:00.000Z\nAll good.',
    ]);
    expect(formatSourceEmails([])).toBe('(No source emails available)');
  });
});
