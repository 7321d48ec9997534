/**
 * Qualification flow prompt builders.
 *
 * Each prompt asks for one JSON object whose marker key matches the schema in
 * ../schemas/qualification-schemas.ts.
 */

import type { CapabilityRecord, ExtractedEntities, ExtractedRequirement, GapAnalysis, OrganizationProfile } from '../types.js';
import { formatOrganizationProfile, joinOr, summarizeRoster } from '../prompt-context.js';

export const MAX_DOCUMENT_CHARS = 50_000;
export const TRUNCATION_NOTICE = '\n\n[Document truncated for processing]';

export function truncateDocument(text: string): string {
  return text.length > MAX_DOCUMENT_CHARS ? text.slice(0, MAX_DOCUMENT_CHARS) + TRUNCATION_NOTICE : text;
}

export function buildExtractionPrompt(documentText: string): string {
  return `Analyze this RFP / tender document and extract structured information.

DOCUMENT:
${truncateDocument(documentText)}

Return a JSON object:
{
  "requirements": [
    {
      "category": "technical|functional|integration|infrastructure|security|compliance|process",
      "text": "The specific requirement",
      "priority": "must_have|should_have|nice_to_have",
      "confidence": 0.0 to 1.0
    }
  ],
  "entities": {
    "client_name": "...",
    "project_name": "...",
    "budget_range": "...",
    "timeline": "...",
    "deadline": "...",
    "key_stakeholders": ["..."],
    "industry": "...",
    "technologies_mentioned": ["..."]
  }
}

Extract ALL requirements you can identify. Return ONLY valid JSON.`;
}

export function buildAnalysisPrompt(
  requirements: readonly ExtractedRequirement[],
  entities: ExtractedEntities,
  roster: readonly CapabilityRecord[],
  profile: OrganizationProfile | null,
): string {
  return `You are a deal qualification analyst. Assess these client requirements against our ACTUAL organization profile and team.

CLIENT: ${entities.client_name || 'Unknown'}
INDUSTRY: ${entities.industry || 'Unknown'}
BUDGET: ${entities.budget_range || 'Unknown'}
TIMELINE: ${entities.timeline || 'Unknown'}

=== ORGANIZATION PROFILE ===
${formatOrganizationProfile(profile)}

=== TEAM CAPABILITIES ===
${summarizeRoster(roster)}

=== CLIENT REQUIREMENTS (${requirements.length} total) ===
${JSON.stringify(requirements, null, 2)}

A capability is CONFIRMED if it appears in our services, technologies, or team skills. Flag gaps only for requirements nothing above covers.

Return a JSON object:
{
  "capability_match_percent": 0-100,
  "strong_areas": ["areas where our profile or team demonstrably match"],
  "gap_areas": ["requirement areas with no coverage"],
  "risk_factors": ["concrete risks: gaps, timeline, budget, capacity"],
  "opportunity_factors": ["positive signals"],
  "resource_estimate": {
    "team_size": "estimated team size",
    "duration": "estimated duration",
    "key_roles": ["roles needed"]
  }
}

Return ONLY valid JSON.`;
}

export function buildDecisionPrompt(
  requirements: readonly ExtractedRequirement[],
  entities: ExtractedEntities,
  gap: GapAnalysis | null,
  roster: readonly CapabilityRecord[],
  profile: OrganizationProfile | null,
): string {
  const uniqueSkills = new Set(roster.flatMap((record) => record.skills));
  const team = roster.length > 0
    ? `${roster.length} people on staff with ${uniqueSkills.size} unique skills`
    : 'No roster available';

  const strengths = profile
    ? `
ORGANIZATION STRENGTHS:
- Services: ${joinOr(profile.services.map((service) => service.name), 'N/A')}
- Technologies: ${joinOr(profile.technologies, 'N/A')}
- Industries: ${joinOr(profile.industries, 'N/A')}
- Certifications: ${joinOr(profile.certifications, 'None')}`
    : '';

  return `You are a deal qualification analyst. Make a go / no-go decision grounded in the analysis below.

CLIENT: ${entities.client_name || 'Unknown'}
BUDGET: ${entities.budget_range || 'Unknown'}
TIMELINE: ${entities.timeline || 'Unknown'}
OUR TEAM: ${team}
${strengths}

CAPABILITY MATCH: ${gap ? `${gap.capability_match_percent}%` : 'Unknown (analysis unavailable)'}
STRONG AREAS: ${JSON.stringify(gap?.strong_areas ?? [])}
GAP AREAS: ${JSON.stringify(gap?.gap_areas ?? [])}
RISK FACTORS: ${JSON.stringify(gap?.risk_factors ?? [])}
OPPORTUNITY FACTORS: ${JSON.stringify(gap?.opportunity_factors ?? [])}
RESOURCE ESTIMATE: ${JSON.stringify(gap?.resource_estimate ?? {})}
TOTAL REQUIREMENTS: ${requirements.length}

Return a JSON object:
{
  "recommendation": "go|no_go|conditional_go",
  "confidence_score": 0.0 to 1.0,
  "positive_factors": ["reasons supporting GO"],
  "risk_factors": ["specific risks"],
  "conditions": ["conditions that must hold for GO, if conditional"],
  "reasoning": "2-3 sentences grounded in the capability match"
}

Return ONLY valid JSON.`;
}
