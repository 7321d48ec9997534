import { describe, it, expect } from 'vitest';
import logger from '../lib/logger.js';
import { EMPTY_ENTITIES, normalizeCategory } from '../agents/schemas/qualification-schemas.js';
import { hintRoles, qualificationStages } from '../agents/qualification/stages.js';
import { combineDocuments, normalizeCapability, qualificationFlow } from '../agents/qualification/flow.js';
import { MAX_DOCUMENT_CHARS, TRUNCATION_NOTICE, truncateDocument } from '../agents/qualification/prompts.js';
import { summarizeRoster } from '../agents/prompt-context.js';
import type { CapabilityRecord, DealDocument, QualificationState } from '../agents/types.js';
import { InMemoryDealStore } from '../lib/in-memory-deal-store.js';
import { ScriptedReasoning, flowDependencies, makeCapability, makeDeal, stageContext } from './fixtures.js';

function qualificationState(overrides: Partial<QualificationState> = {}): QualificationState {
  return {
    deal_id: 'deal-1',
    run_id: 'run-test',
    current_stage: '',
    errors: [],
    deal: makeDeal(),
    document_text: '',
    document_metadata: { document_count: 1, documents: [], word_count: 0, char_count: 0 },
    employee_capabilities: [],
    organization_profile: null,
    extracted_requirements: [],
    extracted_entities: { ...EMPTY_ENTITIES },
    gap_analysis: null,
    capability_matches: [],
    skill_matches: [],
    recommendation: 'no_go',
    confidence_score: 0,
    positive_factors: [],
    risk_factors: [],
    conditions: [],
    reasoning: '',
    ...overrides,
  };
}

function stageNamed(name: string) {
  const stage = qualificationStages.find((s) => s.name === name);
  if (!stage) throw new Error(`missing stage ${name}`);
  return stage;
}

function doc(overrides: Partial<DealDocument>): DealDocument {
  return {
    id: 'doc',
    deal_id: 'deal-1',
    title: 'Document',
    category: null,
    extracted_text: 'text',
    size: null,
    is_processed: true,
    created_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

class OfflineRosterStore extends InMemoryDealStore {
  override async listCapabilities(): Promise<CapabilityRecord[]> {
    throw new Error('roster service down');
  }
}

describe('qualification inputs', () => {
  it('combines documents with category headers and skips empty ones', () => {
    expect(combineDocuments([
      doc({ title: 'RFP', category: 'tender', extracted_text: 'Scope A' }),
      doc({ title: 'Blank', extracted_text: '   ' }),
      doc({ title: 'Notes', extracted_text: 'Scope B' }),
    ])).toBe('=== [TENDER] RFP ===\nScope A\n\n=== [GENERAL] Notes ===\nScope B');
  });

  it('normalizes roster records', () => {
    const record = normalizeCapability(makeCapability({
      id: 'e1',
      name: 'Ada',
      skills: [' React ', '', 'GraphQL'],
      availability_percent: 140,
      hourly_rate: Number.NaN,
    }));

    expect(record.skills).toEqual(['react', 'graphql']);
    expect(record.availability_percent).toBe(100);
    expect(record.hourly_rate).toBe(0);
  });

  it('truncates very long documents with a notice', () => {
    const text = truncateDocument('a'.repeat(MAX_DOCUMENT_CHARS + 10));

    expect(text).toHaveLength(MAX_DOCUMENT_CHARS + TRUNCATION_NOTICE.length);
    expect(text.endsWith(TRUNCATION_NOTICE)).toBe(true);
    expect(truncateDocument('short')).toBe('short');
  });

  it('maps unknown categories onto general', () => {
    expect(normalizeCategory(' Security ')).toBe('security');
    expect(normalizeCategory('legal')).toBe('general');
  });

  it('continues with an empty roster when the roster source fails', async () => {
    const store = new OfflineRosterStore({
      deals: [makeDeal()],
      documents: [doc({ extracted_text: 'We need a mobile app.' })],
    });
    const reasoning = new ScriptedReasoning({
      extract: '{"requirements": [{"category": "functional", "text": "Mobile app"}]}',
      analyze: '{"capability_match_percent": 10}',
      decide: '{"recommendation": "no-go", "confidence_score": 0.7}',
    });

    const outcome = await qualificationFlow.run({ run_id: 'run-q', deal_id: 'deal-1' }, flowDependencies(store, reasoning), logger);

    expect(outcome.summary.recommendation).toBe('no_go');
    expect(outcome.summary.matched_employees).toBe(0);
    expect(outcome.summary.auto_assigned).toBe(0);
    expect(outcome.summary.issues).toEqual(['Roster unavailable: roster service down']);
    expect(reasoning.callsFor('analyze')[0]?.prompt).toContain('CURRENT TEAM (0 active people):');
  });
});

describe('qualification stages', () => {
  it('ingest counts words and characters', async () => {
    const update = await stageNamed('ingest').run(qualificationState({ document_text: 'Build a  claims\nportal' }), stageContext());

    expect(update.document_metadata).toEqual({ document_count: 1, documents: [], word_count: 4, char_count: 22 });
    expect(update.errors).toBeUndefined();
  });

  it('extract skips the reasoning call without document text', async () => {
    const reasoning = new ScriptedReasoning();

    const update = await stageNamed('extract').run(qualificationState({ document_text: '  ' }), stageContext(reasoning));

    expect(update.extracted_requirements).toEqual([]);
    expect(update.errors).toEqual(['Extraction skipped: no document text']);
    expect(reasoning.calls).toHaveLength(0);
  });

  it('extract records an issue when the output cannot be parsed', async () => {
    const reasoning = new ScriptedReasoning({ extract: 'I found several requirements but cannot list them.' });

    const update = await stageNamed('extract').run(qualificationState({ document_text: 'RFP body' }), stageContext(reasoning));

    expect(update.extracted_requirements).toEqual([]);
    expect(update.extracted_entities).toEqual(EMPTY_ENTITIES);
    expect(update.errors).toEqual(['Could not parse requirement extraction output; manual review required']);
  });

  it('analyze keeps a null gap analysis on unparseable output', async () => {
    const reasoning = new ScriptedReasoning({ analyze: 'Strong match overall.' });
    const state = qualificationState({
      extracted_requirements: [{ category: 'technical', text: 'ETL pipeline', priority: 'must_have', confidence: 0.9 }],
    });

    const update = await stageNamed('analyze').run(state, stageContext(reasoning));

    expect(update.gap_analysis).toBeNull();
    expect(update.errors).toEqual(['Could not parse gap analysis output; manual review required']);
  });

  it('decide falls back to no-go on unparseable output', async () => {
    const reasoning = new ScriptedReasoning({ decide: 'Probably yes.' });

    const update = await stageNamed('decide').run(qualificationState(), stageContext(reasoning));

    expect(update.recommendation).toBe('no_go');
    expect(update.confidence_score).toBe(0);
    expect(update.reasoning).toBe('Failed to generate a decision; manual review required.');
    expect(reasoning.callsFor('decide')[0]?.prompt).toContain('CAPABILITY MATCH: Unknown (analysis unavailable)');
  });

  it('hints which roster members could fill each key role', () => {
    const state = qualificationState({
      employee_capabilities: [
        makeCapability({ id: 'e1', name: 'Ada', role: 'Data Engineer' }),
        makeCapability({ id: 'e2', name: 'Ben', role: 'QA Analyst' }),
      ],
    });

    expect(hintRoles(['Senior Data Engineer', 'Project Manager'], state)).toEqual([
      { role: 'Senior Data Engineer', status: 'covered', candidates: ['Ada'] },
      { role: 'Project Manager', status: 'unfilled', candidates: [] },
    ]);
  });
});

describe('summarizeRoster', () => {
  it('summarizes departments, roles and skills and caps the listing', () => {
    const roster = [
      makeCapability({ id: 'e1', name: 'Ada', role: 'Designer', department: 'Studio', skills: ['figma'] }),
      makeCapability({ id: 'e2', name: 'Ben', role: 'Engineer', skills: ['go', 'aws'], availability_percent: 50 }),
    ];

    expect(summarizeRoster(roster, 1).split('\n')).toEqual([
      'CURRENT TEAM (2 active people):',
      'DEPARTMENTS: Delivery, Studio',
      'ROLES ON STAFF: Designer, Engineer',
      'ALL SKILLS AVAILABLE: aws, figma, go',
      '',
      'ROSTER:',
      '- Ada | Designer | Skills: figma | Availability: 100%',
      '... and 1 more',
    ]);
  });
});
