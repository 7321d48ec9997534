import { z } from 'zod';
import { bounded, lenientArray, text } from './shared.js';

export const COMPLIANCE_STATUSES = ['addressed', 'partially_addressed', 'not_addressed'] as const;

export type ComplianceStatus = (typeof COMPLIANCE_STATUSES)[number];

export const ComplianceIssueSchema = z.object({
  requirement_index: z.number().int().nonnegative().catch(0),
  requirement_text: text,
  status: z.enum(COMPLIANCE_STATUSES).catch('partially_addressed'),
  notes: text,
});

export type ComplianceIssue = z.infer<typeof ComplianceIssueSchema>;

export const ComplianceSchema = z.object({
  compliance_score: bounded(0, 1),
  issues: lenientArray(ComplianceIssueSchema).catch([]),
});

export type ComplianceOutput = z.infer<typeof ComplianceSchema>;
