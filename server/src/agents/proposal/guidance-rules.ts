/**
 * Proposal guidance rule table.
 *
 * Each rule is a predicate over requirement-category weights that, when it
 * holds, contributes a named guidance fragment to the generation prompt and
 * optionally an extra proposal section. Evaluated before prompt assembly.
 */

import type { StoredRequirement } from '../types.js';

export interface CategoryWeights {
  total: number;
  technical: number;
  security: number;
  functional: number;
  process: number;
}

export interface ExtraSection {
  title: string;
  guidance: string;
}

export interface GuidanceRule {
  name: string;
  applies: (weights: CategoryWeights) => boolean;
  fragment: string;
  extraSection?: ExtraSection;
}

export interface GuidancePlan {
  /** Names of the rules that fired, or `balanced` when none did. */
  applied: string[];
  fragments: string[];
  extraSections: ExtraSection[];
}

const CATEGORY_GROUPS: Record<Exclude<keyof CategoryWeights, 'total'>, ReadonlySet<string>> = {
  technical: new Set(['technical', 'architecture', 'infrastructure', 'performance', 'scalability', 'integration']),
  security: new Set(['security', 'compliance', 'regulatory', 'privacy', 'data_protection']),
  functional: new Set(['functional', 'feature', 'ui', 'ux', 'user_experience']),
  process: new Set(['process', 'methodology', 'agile', 'management', 'reporting']),
};

export function categoryWeights(requirements: readonly Pick<StoredRequirement, 'category'>[]): CategoryWeights {
  const weights: CategoryWeights = { total: requirements.length, technical: 0, security: 0, functional: 0, process: 0 };
  for (const requirement of requirements) {
    const category = (requirement.category || 'general').toLowerCase();
    if (CATEGORY_GROUPS.technical.has(category)) weights.technical++;
    if (CATEGORY_GROUPS.security.has(category)) weights.security++;
    if (CATEGORY_GROUPS.functional.has(category)) weights.functional++;
    if (CATEGORY_GROUPS.process.has(category)) weights.process++;
  }
  return weights;
}

export const GUIDANCE_RULES: readonly GuidanceRule[] = [
  {
    name: 'technical_depth',
    applies: (w) => w.technical > w.total * 0.3,
    fragment: 'This is a technically heavy project. Go deep on architecture (described in text), technology choices with justification, scalability approach and performance targets.',
    extraSection: {
      title: 'Technical Architecture Deep-Dive',
      guidance: 'Break down the system architecture: components, data flow, API design and stack rationale. Explain why each choice fits these specific requirements.',
    },
  },
  {
    name: 'security_compliance',
    applies: (w) => w.security > 0,
    fragment: 'The project has security or compliance requirements. Dedicate real attention to how compliance will be ensured and reference the relevant standards and certifications.',
    extraSection: {
      title: 'Security & Compliance Framework',
      guidance: 'Detail how every security and compliance requirement is met. Reference applicable standards, audit trail, access control and data protection.',
    },
  },
  {
    name: 'feature_rich',
    applies: (w) => w.functional > w.total * 0.3,
    fragment: 'The project is feature-rich. Focus on user experience, feature prioritisation and how each functional requirement maps to a concrete deliverable.',
  },
  {
    name: 'process_focus',
    applies: (w) => w.process > 0,
    fragment: 'The client cares about process and methodology. Emphasise delivery cadence, communication rhythm, reporting and risk management.',
  },
  {
    name: 'traceability',
    applies: (w) => w.total > 10,
    fragment: 'There are many requirements. Group them logically and make every requirement visibly addressed somewhere in the proposal.',
  },
];

export const BALANCED_GUIDANCE = 'Provide a well-balanced proposal covering solution design, implementation approach and business value.';

export function evaluateGuidance(
  requirements: readonly Pick<StoredRequirement, 'category'>[],
  rules: readonly GuidanceRule[] = GUIDANCE_RULES,
): GuidancePlan {
  const weights = categoryWeights(requirements);
  const fired = rules.filter((rule) => rule.applies(weights));

  if (fired.length === 0) {
    return { applied: ['balanced'], fragments: [BALANCED_GUIDANCE], extraSections: [] };
  }

  return {
    applied: fired.map((rule) => rule.name),
    fragments: fired.map((rule) => rule.fragment),
    extraSections: fired.flatMap((rule) => (rule.extraSection ? [rule.extraSection] : [])),
  };
}
