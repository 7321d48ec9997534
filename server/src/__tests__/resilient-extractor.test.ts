import { describe, it, expect } from 'vitest';
import {
  EXTRACTION_STRATEGIES,
  extract,
  findMarkedObject,
  type ExtractionStrategy,
} from '../agents/runtime/resilient-extractor.js';
import { DECISION_SHAPE, EXTRACTION_SHAPE, GAP_ANALYSIS_SHAPE } from '../agents/qualification/stages.js';
import { SENTIMENT_SHAPE } from '../agents/monitoring/stages.js';
import { COMPLIANCE_SHAPE } from '../agents/proposal/stages.js';

describe('extract strategy chain', () => {
  it('reads a fenced block labelled json and clamps numeric fields', () => {
    const raw = 'Here you go:\n```json\n{"recommendation": "GO", "confidence_score": 1.4, "reasoning": "Strong fit"}\n```\nThanks';

    const outcome = extract(raw, DECISION_SHAPE);

    expect(outcome.strategy).toBe('labelledFence');
    expect(outcome.issue).toBeUndefined();
    expect(outcome.value).toEqual({
      recommendation: 'go',
      confidence_score: 1,
      positive_factors: [],
      risk_factors: [],
      conditions: [],
      reasoning: 'Strong fit',
    });
  });

  it('falls back to an unlabelled fence', () => {
    const raw = '```\n{"recommendation": "conditional go", "confidence_score": "0.6"}\n```';

    const outcome = extract(raw, DECISION_SHAPE);

    expect(outcome.strategy).toBe('anyFence');
    expect(outcome.value.recommendation).toBe('conditional_go');
    expect(outcome.value.confidence_score).toBe(0.6);
  });

  it('finds the object carrying the marker inside prose', () => {
    const raw = 'Context {"note": 1} and the answer {"recommendation": "no-go", "confidence_score": 0.2} done.';

    const outcome = extract(raw, DECISION_SHAPE);

    expect(outcome.strategy).toBe('markedObject');
    expect(outcome.value.recommendation).toBe('no_go');
    expect(outcome.value.confidence_score).toBe(0.2);
  });

  it('finds bare JSON by its marker', () => {
    const outcome = extract('  {"compliance_score": 0.75, "issues": []}  ', COMPLIANCE_SHAPE);

    expect(outcome.strategy).toBe('markedObject');
    expect(outcome.value).toEqual({ compliance_score: 0.75, issues: [] });
  });

  it('parses the whole text when the marker key is absent but the shape still validates', () => {
    const outcome = extract('{"scores": [{"sentiment": 0.5}]}', SENTIMENT_SHAPE);

    expect(outcome.strategy).toBe('wholeText');
    expect(outcome.value.scores).toEqual([{ sentiment: 0.5, signals: [], summary: '' }]);
    expect(outcome.value.overall_sentiment).toBeUndefined();
  });

  it('repairs a fenced block truncated mid-string', () => {
    const raw = '```json\n{"requirements": [{"category": "Security", "text": "SSO via SAML", "confidence": 0.9}, {"category": "technical", "text": "Handle 10k us';

    const outcome = extract(raw, EXTRACTION_SHAPE);

    expect(outcome.strategy).toBe('labelledFence');
    expect(outcome.value.requirements).toEqual([
      { category: 'security', text: 'SSO via SAML', priority: 'should_have', confidence: 0.9 },
      { category: 'technical', text: 'Handle 10k us', priority: 'should_have', confidence: 0.5 },
    ]);
    expect(outcome.value.entities.client_name).toBe('');
  });

  it('drops invalid list entries without rejecting the object', () => {
    const raw = '{"requirements": [{"text": ""}, "junk", {"category": "mystery", "text": "Audit log", "priority": "urgent", "confidence": -3}]}';

    const outcome = extract(raw, EXTRACTION_SHAPE);

    expect(outcome.value.requirements).toEqual([
      { category: 'general', text: 'Audit log', priority: 'should_have', confidence: 0 },
    ]);
  });

  it('clamps percentages and cleans string lists', () => {
    const raw = 'Analysis: {"capability_match_percent": 140, "strong_areas": ["cloud", 3, ""]}';

    const outcome = extract(raw, GAP_ANALYSIS_SHAPE);

    expect(outcome.value).toEqual({
      capability_match_percent: 100,
      strong_areas: ['cloud'],
      gap_areas: [],
      risk_factors: [],
      opportunity_factors: [],
      resource_estimate: { team_size: '', duration: '', key_roles: [] },
    });
  });

  it('clamps per-item sentiment into [-1, 1]', () => {
    const outcome = extract('{"scores": [{"index": 0, "sentiment": -2}], "overall_sentiment": 0.1}', SENTIMENT_SHAPE);

    expect(outcome.value.scores).toEqual([{ index: 0, sentiment: -1, signals: [], summary: '' }]);
    expect(outcome.value.overall_sentiment).toBe(0.1);
  });

  it('skips a strategy that throws', () => {
    const exploding: ExtractionStrategy = {
      name: 'wholeText',
      locate: () => {
        throw new Error('boom');
      },
    };

    const outcome = extract('{"recommendation": "go"}', DECISION_SHAPE, [exploding, ...EXTRACTION_STRATEGIES]);

    expect(outcome.strategy).toBe('markedObject');
    expect(outcome.value.recommendation).toBe('go');
  });
});

describe('extract fallback', () => {
  it.each([
    ['empty text', ''],
    ['plain prose', 'I could not decide, sorry.'],
    ['marker without an object', 'The "recommendation" is unclear'],
    ['marker missing', '{"confidence_score": 0.9}'],
    ['unknown enum value', '{"recommendation": "maybe"}'],
  ])('returns the safe default for %s', (_label, raw) => {
    const outcome = extract(raw, DECISION_SHAPE);

    expect(outcome.strategy).toBe('fallback');
    expect(outcome.value.recommendation).toBe('no_go');
    expect(outcome.value.confidence_score).toBe(0);
    expect(outcome.value.reasoning).toBe('Failed to generate a decision; manual review required.');
    expect(outcome.issue).toBe('Could not parse qualification decision output; manual review required');
  });

  it('rejects sentiment output with neither scores nor an overall figure', () => {
    const outcome = extract('{"overall_sentiment": "bad"}', SENTIMENT_SHAPE);

    expect(outcome.strategy).toBe('fallback');
    expect(outcome.value).toEqual({ scores: [], overall_sentiment: 0, key_concerns: [], positive_signals: [] });
  });

  it('gives compliance a neutral score with a manual-review issue', () => {
    const outcome = extract('not json', COMPLIANCE_SHAPE);

    expect(outcome.value.compliance_score).toBe(0.5);
    expect(outcome.value.issues).toHaveLength(1);
    expect(outcome.value.issues[0]?.status).toBe('partially_addressed');
  });

  it('returns a fresh fallback object on every call', () => {
    const first = extract('', EXTRACTION_SHAPE);
    first.value.requirements.push({ category: 'general', text: 'mutated', priority: 'should_have', confidence: 1 });

    const second = extract('', EXTRACTION_SHAPE);

    expect(second.value.requirements).toEqual([]);
  });
});

describe('findMarkedObject', () => {
  it('ignores braces inside strings', () => {
    const text = 'x {"a": "}", "recommendation": "go"} y';

    expect(findMarkedObject(text, 'recommendation')).toBe('{"a": "}", "recommendation": "go"}');
  });

  it('returns the tail of an unclosed object', () => {
    expect(findMarkedObject('prefix {"recommendation": "go"', 'recommendation')).toBe('{"recommendation": "go"');
  });

  it('returns null when the marker is absent', () => {
    expect(findMarkedObject('{"other": 1}', 'recommendation')).toBeNull();
  });

  it('returns the outermost object around the marker', () => {
    const text = 'a {"x": {"y": 1}} b {"outer": {"recommendation": "go"}} c';

    expect(findMarkedObject(text, 'recommendation')).toBe('{"outer": {"recommendation": "go"}}');
  });

  it('ignores stray quotes in the surrounding prose', () => {
    const text = 'He said "ship it. {"recommendation": "go"}';

    expect(findMarkedObject(text, 'recommendation')).toBe('{"recommendation": "go"}');
  });

  it('returns null when the marker sits outside every object', () => {
    expect(findMarkedObject('{"a": 1} "recommendation" {"b": 2}', 'recommendation')).toBeNull();
  });

  it('scans brace-heavy prose in a single pass', () => {
    const text = `${'{'.repeat(50_000)}"recommendation": "go"`;

    expect(findMarkedObject(text, 'recommendation')).toBe(text);
  });
});
