import type { Deal, OrganizationProfile, RetrievedPassage, StoredRequirement, TeamMember } from '../types.js';
import { formatOrganizationProfile } from '../prompt-context.js';
import type { GuidancePlan } from './guidance-rules.js';

export const MAX_PROMPT_PASSAGES = 7;
export const HOURS_PER_MONTH = 160;
export const COMPLIANCE_DRAFT_CHARS = 10_000;

export function monthlyCost(member: Pick<TeamMember, 'hourly_rate' | 'allocation_percent'>): number {
  return member.hourly_rate * HOURS_PER_MONTH * (member.allocation_percent / 100);
}

const currency = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatPassages(passages: readonly RetrievedPassage[]): string {
  if (passages.length === 0) return '';
  const blocks = passages.slice(0, MAX_PROMPT_PASSAGES).map((passage, i) => {
    const label = passage.collection ? `${passage.source} [${passage.collection}]` : passage.source;
    return `--- Passage ${i + 1} (Source: ${label}, Relevance: ${passage.relevance.toFixed(2)}) ---\n${passage.text}`;
  });
  return `RELEVANT PASSAGES FROM PREVIOUS PROPOSALS AND UPLOADED DOCUMENTS:\n${blocks.join('\n')}`;
}

export function formatTeam(team: readonly TeamMember[]): string {
  if (team.length === 0) {
    return 'NOTE: No team members have been assigned yet. Describe the team structure generically from the required roles.';
  }

  let total = 0;
  const lines = team.map((member, i) => {
    const monthly = monthlyCost(member);
    total += monthly;
    const skills = member.skills.length > 0 ? member.skills.slice(0, 6).join(', ') : 'General';
    return [
      `  ${i + 1}. ${member.name} (${member.role})`,
      `     Skills: ${skills}`,
      `     Department: ${member.department || 'N/A'} | Allocation: ${member.allocation_percent}% | Rate: $${member.hourly_rate}/hr | Monthly: $${currency.format(monthly)}`,
    ].join('\n');
  });

  return [
    'ASSIGNED TEAM MEMBERS (use exactly these people in the Team section):',
    ...lines,
    '',
    `  TOTAL ESTIMATED MONTHLY COST: $${currency.format(total)}`,
    '',
    'Use ONLY these team members. Do not invent additional people.',
  ].join('\n');
}

export function formatRequirements(requirements: readonly StoredRequirement[]): string {
  return requirements.map((req) => `- [${req.category || 'general'}] ${req.text}`).join('\n');
}

export function buildGenerationPrompt(input: {
  deal: Deal;
  requirements: readonly StoredRequirement[];
  team: readonly TeamMember[];
  passages: readonly RetrievedPassage[];
  profile: OrganizationProfile | null;
  guidance: GuidancePlan;
}): string {
  const { deal, requirements, team, passages, profile, guidance } = input;
  const vendor = profile?.name ?? 'our organization';
  const project = deal.title || 'Unknown Project';

  const extraSections = guidance.extraSections
    .map((section, i) => `## ${8 + i}. ${section.title}\n${section.guidance}`)
    .join('\n\n');
  const nextStepsNumber = 8 + guidance.extraSections.length;

  return `You are a senior proposal writer at ${vendor}. Write a winning proposal from ${vendor} to "${deal.client_name || 'the client'}" for the "${project}" project.

CLIENT: ${deal.client_name || 'Unknown Client'}
PROJECT: ${project}
${deal.description ? `DESCRIPTION: ${deal.description}\n` : ''}BUDGET: ${deal.budget_range || 'To be discussed'}
TIMELINE: ${deal.timeline || 'To be discussed'}

REQUIREMENTS (${requirements.length} total):
${formatRequirements(requirements)}

${formatTeam(team)}

${formatPassages(passages)}

${formatOrganizationProfile(profile)}

PROPOSAL STRATEGY:
${guidance.fragments.map((fragment) => `- ${fragment}`).join('\n')}

For every section, tie the solution back to specific requirements, name concrete deliverables and show business value. Do not fabricate capabilities that are not listed above.

Generate the proposal with these sections:

# Proposal: ${project}

## 1. Executive Summary
## 2. Understanding of Requirements
## 3. Proposed Solution & Technical Approach
## 4. Implementation Plan & Timeline
## 5. Proposed Team & Resources
## 6. Investment & Commercial Terms
## 7. Why Choose ${vendor}
${extraSections ? `\n${extraSections}\n` : ''}
## ${nextStepsNumber}. Next Steps
This MUST be the final section.

Output clean markdown with # and ## headers.`;
}

export function buildCompliancePrompt(draft: string, requirements: readonly StoredRequirement[]): string {
  const numbered = requirements
    .map((req, i) => `${i + 1}. [${req.category || 'general'}] ${req.text}`)
    .join('\n');

  return `You are a compliance checker. Review this proposal against the requirements.

PROPOSAL:
${draft.slice(0, COMPLIANCE_DRAFT_CHARS)}

REQUIREMENTS TO CHECK:
${numbered}

For each requirement, assess whether the proposal addresses it. Return a JSON object:
{
  "compliance_score": 0.0 to 1.0,
  "issues": [
    {
      "requirement_index": 1,
      "requirement_text": "...",
      "status": "addressed|partially_addressed|not_addressed",
      "notes": "explanation"
    }
  ]
}

Return ONLY valid JSON.`;
}
