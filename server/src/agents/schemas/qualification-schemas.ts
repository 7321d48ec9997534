/**
 * Zod schemas for qualification-flow reasoning output.
 *
 * Each top-level schema has one required "marker" field; the extractor uses it
 * to locate the object in surrounding prose, and a candidate missing it is not
 * accepted. Everything else is permissive.
 */

import { z } from 'zod';
import { bounded, boundedOr, lenientArray, stringList, text } from './shared.js';

export const REQUIREMENT_CATEGORIES = [
  'technical',
  'functional',
  'integration',
  'infrastructure',
  'security',
  'compliance',
  'process',
  'general',
] as const;

export type RequirementCategory = (typeof REQUIREMENT_CATEGORIES)[number];

const categorySchema = z.enum(REQUIREMENT_CATEGORIES);

export function normalizeCategory(raw: string): RequirementCategory {
  const parsed = categorySchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : 'general';
}

// ─── extract ──────────────────────────────────────────────────────────

export const ExtractedRequirementSchema = z.object({
  category: z.string().catch('general').transform(normalizeCategory),
  text: z.string().trim().min(1),
  priority: z.enum(['must_have', 'should_have', 'nice_to_have']).catch('should_have'),
  confidence: boundedOr(0, 1, 0.5),
});

export type ExtractedRequirement = z.infer<typeof ExtractedRequirementSchema>;

export const EntitiesSchema = z.object({
  client_name: text,
  project_name: text,
  budget_range: text,
  timeline: text,
  deadline: text,
  key_stakeholders: stringList,
  industry: text,
  technologies_mentioned: stringList,
});

export type ExtractedEntities = z.infer<typeof EntitiesSchema>;

export const EMPTY_ENTITIES: ExtractedEntities = {
  client_name: '',
  project_name: '',
  budget_range: '',
  timeline: '',
  deadline: '',
  key_stakeholders: [],
  industry: '',
  technologies_mentioned: [],
};

export const ExtractionSchema = z.object({
  requirements: lenientArray(ExtractedRequirementSchema),
  entities: EntitiesSchema.catch(EMPTY_ENTITIES),
});

export type ExtractionOutput = z.infer<typeof ExtractionSchema>;

// ─── analyze ──────────────────────────────────────────────────────────

export const ResourceEstimateSchema = z.object({
  team_size: z.union([z.string(), z.number()]).transform(String).catch(''),
  duration: text,
  key_roles: stringList,
});

export const GapAnalysisSchema = z.object({
  capability_match_percent: bounded(0, 100),
  strong_areas: stringList,
  gap_areas: stringList,
  risk_factors: stringList,
  opportunity_factors: stringList,
  resource_estimate: ResourceEstimateSchema.catch({ team_size: '', duration: '', key_roles: [] }),
});

export type GapAnalysis = z.infer<typeof GapAnalysisSchema>;

// ─── decide ───────────────────────────────────────────────────────────

export const RECOMMENDATIONS = ['go', 'no_go', 'conditional_go'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const DecisionSchema = z.object({
  // "GO", "No-Go" and "conditional go" all normalise onto the enum.
  recommendation: z
    .string()
    .transform((value) => value.trim().toLowerCase().replace(/[\s-]+/g, '_'))
    .pipe(z.enum(RECOMMENDATIONS)),
  confidence_score: boundedOr(0, 1, 0.5),
  positive_factors: stringList,
  risk_factors: stringList,
  conditions: stringList,
  reasoning: text,
});

export type Decision = z.infer<typeof DecisionSchema>;
