/**
 * Qualification flow stages: ingest → extract → analyze → match → decide.
 *
 * Stages never throw for recoverable problems. Empty upstream data or an
 * unparseable reasoning response yields a degraded update plus an `errors`
 * entry. Only a failing reasoning transport escapes (and fails the run).
 */

import { extract, type ExtractionShape } from '../runtime/resilient-extractor.js';
import type { Stage } from '../runtime/stage-graph.js';
import { rankCapabilities, tokenize } from '../capability-matcher.js';
import {
  DecisionSchema,
  EMPTY_ENTITIES,
  ExtractionSchema,
  GapAnalysisSchema,
  type Decision,
  type ExtractionOutput,
  type GapAnalysis,
} from '../schemas/qualification-schemas.js';
import type { QualificationState, SkillMatch } from '../types.js';
import { buildAnalysisPrompt, buildDecisionPrompt, buildExtractionPrompt } from './prompts.js';

export const EXTRACT_MAX_TOKENS = 4096;
export const ANALYZE_MAX_TOKENS = 2048;
export const DECIDE_MAX_TOKENS = 1024;

export const EXTRACTION_SHAPE: ExtractionShape<ExtractionOutput> = {
  name: 'requirement extraction',
  marker: 'requirements',
  schema: ExtractionSchema,
  fallback: () => ({ requirements: [], entities: { ...EMPTY_ENTITIES } }),
};

export const GAP_ANALYSIS_SHAPE: ExtractionShape<GapAnalysis | null> = {
  name: 'gap analysis',
  marker: 'capability_match_percent',
  schema: GapAnalysisSchema,
  fallback: () => null,
};

export const DECISION_SHAPE: ExtractionShape<Decision> = {
  name: 'qualification decision',
  marker: 'recommendation',
  schema: DecisionSchema,
  fallback: () => ({
    recommendation: 'no_go',
    confidence_score: 0,
    positive_factors: [],
    risk_factors: [],
    conditions: [],
    reasoning: 'Failed to generate a decision; manual review required.',
  }),
};

const ingest: Stage<QualificationState> = {
  name: 'ingest',
  label: 'Parsing document structure...',
  writes: ['document_metadata'],
  async run(state) {
    const text = state.document_text;
    if (!text.trim()) {
      return {
        document_metadata: { ...state.document_metadata, word_count: 0, char_count: 0 },
        errors: ['No document text provided'],
      };
    }
    return {
      document_metadata: {
        ...state.document_metadata,
        word_count: text.split(/\s+/).filter(Boolean).length,
        char_count: text.length,
      },
    };
  },
};

const extractStage: Stage<QualificationState> = {
  name: 'extract',
  label: 'Extracting requirements and entities...',
  writes: ['extracted_requirements', 'extracted_entities'],
  async run(state, ctx) {
    if (!state.document_text.trim()) {
      return {
        extracted_requirements: [],
        extracted_entities: { ...EMPTY_ENTITIES },
        errors: ['Extraction skipped: no document text'],
      };
    }

    const raw = await ctx.reasoning.submit(buildExtractionPrompt(state.document_text), EXTRACT_MAX_TOKENS);
    const outcome = extract(raw, EXTRACTION_SHAPE);
    ctx.log.info({ requirements: outcome.value.requirements.length, strategy: outcome.strategy }, 'extract: requirements parsed');

    return {
      extracted_requirements: outcome.value.requirements,
      extracted_entities: outcome.value.entities,
      ...(outcome.issue ? { errors: [outcome.issue] } : {}),
    };
  },
};

const analyze: Stage<QualificationState> = {
  name: 'analyze',
  label: 'Analyzing deal viability...',
  writes: ['gap_analysis'],
  async run(state, ctx) {
    if (state.extracted_requirements.length === 0) {
      return { gap_analysis: null, errors: ['Gap analysis skipped: no requirements extracted'] };
    }

    const prompt = buildAnalysisPrompt(
      state.extracted_requirements,
      state.extracted_entities,
      state.employee_capabilities,
      state.organization_profile,
    );
    const raw = await ctx.reasoning.submit(prompt, ANALYZE_MAX_TOKENS);
    const outcome = extract(raw, GAP_ANALYSIS_SHAPE);
    ctx.log.info(
      { match: outcome.value?.capability_match_percent, strategy: outcome.strategy },
      'analyze: gap analysis parsed',
    );

    return {
      gap_analysis: outcome.value,
      ...(outcome.issue ? { errors: [outcome.issue] } : {}),
    };
  },
};

/** Which roster members could fill each key role, by shared role words. */
export function hintRoles(keyRoles: readonly string[], state: Readonly<QualificationState>): SkillMatch[] {
  return keyRoles.map((role): SkillMatch => {
    const wanted = new Set(tokenize(role));
    const candidates = state.employee_capabilities
      .filter((record) => tokenize(record.role).some((token) => wanted.has(token)))
      .map((record) => record.name);
    return { role, status: candidates.length > 0 ? 'covered' : 'unfilled', candidates };
  });
}

const match: Stage<QualificationState> = {
  name: 'match',
  label: 'Matching team skills...',
  writes: ['capability_matches', 'skill_matches'],
  async run(state, ctx) {
    const gap = state.gap_analysis;
    const keyRoles = gap?.resource_estimate.key_roles ?? [];
    const extraTerms = gap ? [...gap.strong_areas, ...gap.gap_areas, ...keyRoles] : [];

    const capabilityMatches = rankCapabilities(state.extracted_requirements, state.employee_capabilities, extraTerms);
    const skillMatches = hintRoles(keyRoles, state);
    ctx.log.info({ matched: capabilityMatches.length, roles: skillMatches.length }, 'match: roster ranked');

    return { capability_matches: capabilityMatches, skill_matches: skillMatches };
  },
};

const decide: Stage<QualificationState> = {
  name: 'decide',
  label: 'Generating go / no-go recommendation...',
  writes: ['recommendation', 'confidence_score', 'positive_factors', 'risk_factors', 'conditions', 'reasoning'],
  async run(state, ctx) {
    const prompt = buildDecisionPrompt(
      state.extracted_requirements,
      state.extracted_entities,
      state.gap_analysis,
      state.employee_capabilities,
      state.organization_profile,
    );
    const raw = await ctx.reasoning.submit(prompt, DECIDE_MAX_TOKENS);
    const { value, strategy, issue } = extract(raw, DECISION_SHAPE);
    ctx.log.info({ recommendation: value.recommendation, confidence: value.confidence_score, strategy }, 'decide: decision parsed');

    return {
      recommendation: value.recommendation,
      confidence_score: value.confidence_score,
      positive_factors: value.positive_factors,
      risk_factors: value.risk_factors,
      conditions: value.conditions,
      reasoning: value.reasoning,
      ...(issue ? { errors: [issue] } : {}),
    };
  },
};

export const qualificationStages: ReadonlyArray<Stage<QualificationState>> = [ingest, extractStage, analyze, match, decide];
