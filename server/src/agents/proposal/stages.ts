/**
 * Proposal flow stages: retrieve → generate → comply.
 */

import { errorMessage } from '../../lib/errors.js';
import { extract, type ExtractionShape } from '../runtime/resilient-extractor.js';
import type { Stage } from '../runtime/stage-graph.js';
import { ComplianceSchema, type ComplianceOutput } from '../schemas/proposal-schemas.js';
import type { ProposalSection, ProposalState } from '../types.js';
import { evaluateGuidance } from './guidance-rules.js';
import { buildCompliancePrompt, buildGenerationPrompt } from './prompts.js';

export const RETRIEVAL_RESULTS = 10;
export const GENERATE_MAX_TOKENS = 8192;
export const COMPLY_MAX_TOKENS = 2048;

export const COMPLIANCE_SHAPE: ExtractionShape<ComplianceOutput> = {
  name: 'compliance check',
  marker: 'compliance_score',
  schema: ComplianceSchema,
  fallback: () => ({
    compliance_score: 0.5,
    issues: [
      {
        requirement_index: 0,
        requirement_text: 'Automated compliance check',
        status: 'partially_addressed',
        notes: 'Compliance output could not be parsed; manual review required.',
      },
    ],
  }),
};

/**
 * Split markdown on lines starting with `# ` or `## `. Text before the first
 * heading becomes an "Introduction" section; sections with no content are
 * dropped.
 */
export function splitSections(draft: string): ProposalSection[] {
  const sections: ProposalSection[] = [];
  let current: ProposalSection = { title: 'Introduction', content: '' };

  for (const line of draft.split('\n')) {
    if (line.startsWith('# ') || line.startsWith('## ')) {
      if (current.content.trim()) sections.push(current);
      current = { title: line.replace(/^#+/, '').trim(), content: '' };
    } else {
      current.content += `${line}\n`;
    }
  }
  if (current.content.trim()) sections.push(current);

  return sections;
}

const retrieve: Stage<ProposalState> = {
  name: 'retrieve',
  label: 'Searching the knowledge base for relevant proposal sections...',
  writes: ['retrieved_sections'],
  async run(state, ctx) {
    const context = JSON.stringify({
      title: state.deal.title,
      client_name: state.deal.client_name,
      deal_value: state.deal.deal_value,
      description: state.deal.description,
    });
    const requirementTexts = state.requirements.map((req) => req.text);

    try {
      const passages = await ctx.retrieval.retrieve(context, requirementTexts, RETRIEVAL_RESULTS);
      ctx.log.info({ passages: passages.length }, 'retrieve: passages found');
      return { retrieved_sections: passages };
    } catch (err) {
      ctx.log.warn({ err }, 'retrieve: retrieval failed, continuing without context');
      return { retrieved_sections: [], errors: [`Retrieval failed: ${errorMessage(err)}`] };
    }
  },
};

const generate: Stage<ProposalState> = {
  name: 'generate',
  label: 'Generating proposal draft...',
  writes: ['proposal_draft', 'proposal_sections', 'applied_guidance'],
  async run(state, ctx) {
    const guidance = evaluateGuidance(state.requirements);
    const prompt = buildGenerationPrompt({
      deal: state.deal,
      requirements: state.requirements,
      team: state.team,
      passages: state.retrieved_sections,
      profile: state.organization_profile,
      guidance,
    });

    const draft = await ctx.reasoning.submit(prompt, GENERATE_MAX_TOKENS);
    const sections = splitSections(draft);
    ctx.log.info({ chars: draft.length, sections: sections.length, guidance: guidance.applied }, 'generate: draft produced');

    return {
      proposal_draft: draft,
      proposal_sections: sections,
      applied_guidance: guidance.applied,
      ...(draft.trim() ? {} : { errors: ['Proposal generation returned no text'] }),
    };
  },
};

const comply: Stage<ProposalState> = {
  name: 'comply',
  label: 'Checking compliance against requirements...',
  writes: ['compliance_score', 'compliance_issues', 'final_proposal'],
  async run(state, ctx) {
    if (state.requirements.length === 0) {
      return { compliance_score: 1, compliance_issues: [], final_proposal: state.proposal_draft };
    }

    const raw = await ctx.reasoning.submit(buildCompliancePrompt(state.proposal_draft, state.requirements), COMPLY_MAX_TOKENS);
    const { value, strategy, issue } = extract(raw, COMPLIANCE_SHAPE);
    ctx.log.info({ score: value.compliance_score, issues: value.issues.length, strategy }, 'comply: compliance parsed');

    return {
      compliance_score: value.compliance_score,
      compliance_issues: value.issues,
      final_proposal: state.proposal_draft,
      ...(issue ? { errors: [issue] } : {}),
    };
  },
};

export const proposalStages: ReadonlyArray<Stage<ProposalState>> = [retrieve, generate, comply];
