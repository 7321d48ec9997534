/**
 * CapabilityMatcher: deterministic keyword-overlap scoring of a roster against
 * free-text requirements. Pure; no I/O.
 *
 * score(record) = |(skills ∪ role words) ∩ (requirement words ∪ categories ∪ extra terms)|
 *
 * Only tokens longer than three characters count. Zero-overlap records are
 * excluded, and ties keep roster order.
 */

import type { AssignmentDraft, CapabilityMatch, CapabilityRecord } from './types.js';

export interface RequirementLike {
  text: string;
  category?: string;
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(EDGE_PUNCTUATION, ''))
    .filter((word) => word.length > 3);
}

export function requirementTerms(requirements: readonly RequirementLike[], extraTerms: readonly string[] = []): Set<string> {
  const terms = new Set<string>();
  for (const requirement of requirements) {
    for (const token of tokenize(requirement.text)) terms.add(token);
    for (const token of tokenize(requirement.category ?? '')) terms.add(token);
  }
  for (const extra of extraTerms) {
    for (const token of tokenize(extra)) terms.add(token);
  }
  return terms;
}

export function capabilityTerms(record: CapabilityRecord): Set<string> {
  const terms = new Set<string>();
  for (const skill of record.skills) {
    for (const token of tokenize(skill)) terms.add(token);
  }
  for (const token of tokenize(record.role)) terms.add(token);
  return terms;
}

export function rankCapabilities(
  requirements: readonly RequirementLike[],
  roster: readonly CapabilityRecord[],
  extraTerms: readonly string[] = [],
): CapabilityMatch[] {
  const wanted = requirementTerms(requirements, extraTerms);
  const matches: CapabilityMatch[] = [];

  for (const record of roster) {
    const overlap = [...capabilityTerms(record)].filter((term) => wanted.has(term)).sort();
    if (overlap.length === 0) continue;
    matches.push({
      employee_id: record.id,
      name: record.name,
      role: record.role,
      matching_terms: overlap,
      match_score: overlap.length,
      availability_percent: record.availability_percent,
      hourly_rate: record.hourly_rate,
    });
  }

  // Array.prototype.sort is stable, so equal scores keep roster order.
  return matches.sort((a, b) => b.match_score - a.match_score);
}

export function planAutoAssignments(dealId: string, ranked: readonly CapabilityMatch[], limit = 5): AssignmentDraft[] {
  return ranked.slice(0, Math.max(0, limit)).map((match) => ({
    deal_id: dealId,
    employee_id: match.employee_id,
    role_on_deal: match.role,
    allocation_percent: Math.min(match.availability_percent, 100),
    match_score: match.match_score,
    assigned_by: 'auto',
  }));
}
