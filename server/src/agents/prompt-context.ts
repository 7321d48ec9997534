/**
 * Prompt fragments shared by the flows: organization facts and roster
 * summaries. These only enrich prompts; nothing here affects scoring.
 */

import type { CapabilityRecord, OrganizationProfile } from './types.js';

export const ROSTER_PROMPT_LIMIT = 20;

export function joinOr(items: readonly string[], fallback: string): string {
  return items.length > 0 ? items.join(', ') : fallback;
}

export function bullets(items: readonly string[], fallback = '- None'): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : fallback;
}

export function formatOrganizationProfile(profile: OrganizationProfile | null): string {
  if (!profile) {
    return 'ORGANIZATION PROFILE: not available. Ground the assessment in the team roster only.';
  }

  const services = profile.services.map((service) =>
    service.description ? `- ${service.name}: ${service.description}` : `- ${service.name}`,
  );
  const engagements = profile.past_engagements.map((engagement) =>
    engagement.summary ? `- ${engagement.client}: ${engagement.summary}` : `- ${engagement.client}`,
  );

  return [
    `ORGANIZATION: ${profile.name}${profile.legal_name ? ` (${profile.legal_name})` : ''}`,
    `FOUNDED: ${profile.founded || 'N/A'} | HQ: ${profile.headquarters || 'N/A'}`,
    `CERTIFICATIONS: ${joinOr(profile.certifications, 'None listed')}`,
    `EMPLOYEE COUNT: ${profile.employee_count ?? 'N/A'}`,
    '',
    'SERVICES OFFERED:',
    bullets(services, 'Not specified'),
    '',
    `KNOWN TECHNOLOGIES: ${joinOr(profile.technologies, 'Not specified')}`,
    `INDUSTRIES SERVED: ${joinOr(profile.industries, 'Not specified')}`,
    `CLIENT REGIONS: ${joinOr(profile.client_regions, 'Not specified')}`,
    `AWARDS: ${joinOr(profile.awards, 'None')}`,
    '',
    'PRIOR ENGAGEMENTS:',
    bullets(engagements, 'None listed'),
  ].join('\n');
}

export function summarizeRoster(roster: readonly CapabilityRecord[], limit = ROSTER_PROMPT_LIMIT): string {
  const skills = new Set<string>();
  const roles = new Set<string>();
  const departments = new Set<string>();
  for (const record of roster) {
    for (const skill of record.skills) skills.add(skill);
    if (record.role) roles.add(record.role);
    if (record.department) departments.add(record.department);
  }

  const lines = [
    `CURRENT TEAM (${roster.length} active people):`,
    `DEPARTMENTS: ${joinOr([...departments].sort(), 'Not specified')}`,
    `ROLES ON STAFF: ${joinOr([...roles].sort(), 'Not specified')}`,
    `ALL SKILLS AVAILABLE: ${joinOr([...skills].sort(), 'Not specified')}`,
    '',
    'ROSTER:',
  ];
  for (const record of roster.slice(0, limit)) {
    lines.push(
      `- ${record.name} | ${record.role} | Skills: ${record.skills.slice(0, 8).join(', ')} | Availability: ${record.availability_percent}%`,
    );
  }
  if (roster.length > limit) {
    lines.push(`... and ${roster.length - limit} more`);
  }
  return lines.join('\n');
}
