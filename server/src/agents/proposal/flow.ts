/**
 * Proposal flow: input resolution and finalization.
 */

import { InputResolutionError, errorMessage } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { defineFlow, type FlowDependencies, type FlowOutcome, type FlowRequest } from '../runtime/flow-definition.js';
import { loadProfile } from '../qualification/flow.js';
import type { ProposalState, TeamMember } from '../types.js';
import { proposalStages } from './stages.js';

async function loadTeam(deps: FlowDependencies, dealId: string, log: Logger, errors: string[]): Promise<TeamMember[]> {
  try {
    return await deps.assignments.listTeam(dealId);
  } catch (err) {
    log.warn({ err }, 'Team unavailable, generating without assignments');
    errors.push(`Team unavailable: ${errorMessage(err)}`);
    return [];
  }
}

async function resolveInput(request: FlowRequest, deps: FlowDependencies, log: Logger): Promise<ProposalState> {
  const deal = await deps.deals.getDeal(request.deal_id);
  if (!deal) {
    throw new InputResolutionError('Deal not found');
  }

  const errors: string[] = [];
  const requirements = await deps.deals.listRequirements(deal.id);
  const team = await loadTeam(deps, deal.id, log, errors);
  const profile = await loadProfile(deps, log, errors);
  log.info({ requirements: requirements.length, team: team.length, profile: Boolean(profile) }, 'Proposal inputs resolved');

  return {
    deal_id: deal.id,
    run_id: request.run_id,
    current_stage: '',
    errors,
    deal,
    requirements,
    team,
    organization_profile: profile,
    retrieved_sections: [],
    applied_guidance: [],
    proposal_draft: '',
    proposal_sections: [],
    compliance_score: 0,
    compliance_issues: [],
    final_proposal: '',
  };
}

async function finalize(state: ProposalState, deps: FlowDependencies, log: Logger): Promise<FlowOutcome> {
  await deps.results?.save({ flow_type: 'proposal', run_id: state.run_id, deal_id: state.deal_id, state });

  log.info(
    { compliance: state.compliance_score, sections: state.proposal_sections.length, guidance: state.applied_guidance },
    'Proposal finalized',
  );

  return {
    message: 'Proposal generated',
    summary: {
      compliance_score: state.compliance_score,
      sections: state.proposal_sections.map((section) => section.title),
      requirements: state.requirements.length,
      retrieved_passages: state.retrieved_sections.length,
      guidance: state.applied_guidance,
      issues: state.errors,
    },
  };
}

export const proposalFlow = defineFlow<ProposalState>({
  type: 'proposal',
  stages: proposalStages,
  resolveInput,
  finalize,
});
