/**
 * Qualification flow: input resolution and finalization.
 *
 * Inputs: the deal, every processed document (plus an explicitly requested
 * one), a roster snapshot and the organization profile. Finalization
 * supersedes the deal's automatic staffing with the top-ranked matches and
 * hands the state to the result sink.
 */

import { InputResolutionError, errorMessage } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { clamp } from '../schemas/shared.js';
import { EMPTY_ENTITIES } from '../schemas/qualification-schemas.js';
import { planAutoAssignments } from '../capability-matcher.js';
import { defineFlow, type FlowDependencies, type FlowOutcome, type FlowRequest } from '../runtime/flow-definition.js';
import type { CapabilityRecord, DealDocument, OrganizationProfile, QualificationState } from '../types.js';
import { qualificationStages } from './stages.js';

export function normalizeCapability(record: CapabilityRecord): CapabilityRecord {
  return {
    ...record,
    skills: record.skills.map((skill) => skill.trim().toLowerCase()).filter(Boolean),
    availability_percent: clamp(Number.isFinite(record.availability_percent) ? record.availability_percent : 100, 0, 100),
    hourly_rate: Math.max(0, Number.isFinite(record.hourly_rate) ? record.hourly_rate : 0),
  };
}

export function combineDocuments(documents: readonly DealDocument[]): string {
  return documents
    .filter((doc) => doc.extracted_text?.trim())
    .map((doc) => `=== [${(doc.category ?? 'general').toUpperCase()}] ${doc.title} ===\n${doc.extracted_text}`)
    .join('\n\n');
}

async function loadRoster(deps: FlowDependencies, log: Logger, errors: string[]): Promise<CapabilityRecord[]> {
  try {
    const roster = await deps.roster.listCapabilities();
    return roster.map(normalizeCapability);
  } catch (err) {
    log.warn({ err }, 'Roster unavailable, continuing with an empty roster');
    errors.push(`Roster unavailable: ${errorMessage(err)}`);
    return [];
  }
}

export async function loadProfile(deps: FlowDependencies, log: Logger, errors: string[]): Promise<OrganizationProfile | null> {
  try {
    return await deps.roster.getOrganizationProfile();
  } catch (err) {
    log.warn({ err }, 'Organization profile unavailable');
    errors.push(`Organization profile unavailable: ${errorMessage(err)}`);
    return null;
  }
}

async function resolveInput(request: FlowRequest, deps: FlowDependencies, log: Logger): Promise<QualificationState> {
  const deal = await deps.deals.getDeal(request.deal_id);
  if (!deal) {
    throw new InputResolutionError('Deal not found');
  }

  const documents = [...(await deps.deals.listProcessedDocuments(deal.id))];
  if (request.document_id && !documents.some((doc) => doc.id === request.document_id)) {
    const requested = await deps.deals.getDocument(request.document_id);
    if (requested?.extracted_text) {
      documents.unshift(requested);
    }
  }
  if (documents.length === 0) {
    throw new InputResolutionError('No processed documents found for this deal');
  }

  const documentText = combineDocuments(documents);
  if (!documentText.trim()) {
    throw new InputResolutionError('Documents found but no text could be extracted');
  }

  const errors: string[] = [];
  const roster = await loadRoster(deps, log, errors);
  const profile = await loadProfile(deps, log, errors);
  log.info({ documents: documents.length, roster: roster.length, profile: Boolean(profile) }, 'Qualification inputs resolved');

  return {
    deal_id: deal.id,
    run_id: request.run_id,
    current_stage: '',
    errors,
    deal,
    document_text: documentText,
    document_metadata: {
      document_count: documents.length,
      documents: documents.map((doc) => ({ id: doc.id, title: doc.title, category: doc.category, size: doc.size })),
      word_count: 0,
      char_count: 0,
    },
    employee_capabilities: roster,
    organization_profile: profile,
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
  };
}

async function finalize(state: QualificationState, deps: FlowDependencies, log: Logger): Promise<FlowOutcome> {
  const assignments = planAutoAssignments(state.deal_id, state.capability_matches, deps.settings.autoAssignLimit);
  // With no matches the existing automatic staffing is left in place.
  if (assignments.length > 0) {
    await deps.assignments.replaceAutoAssignments(state.deal_id, assignments);
  }

  await deps.results?.save({
    flow_type: 'qualification',
    run_id: state.run_id,
    deal_id: state.deal_id,
    state,
    assignments,
  });

  log.info(
    { recommendation: state.recommendation, matched: state.capability_matches.length, autoAssigned: assignments.length },
    'Qualification finalized',
  );

  return {
    message: 'Qualification complete',
    summary: {
      recommendation: state.recommendation,
      confidence_score: state.confidence_score,
      requirements_found: state.extracted_requirements.length,
      matched_employees: state.capability_matches.length,
      auto_assigned: assignments.length,
      key_roles: state.gap_analysis?.resource_estimate.key_roles ?? [],
      issues: state.errors,
    },
  };
}

export const qualificationFlow = defineFlow<QualificationState>({
  type: 'qualification',
  stages: qualificationStages,
  resolveInput,
  finalize,
});
