/**
 * Supabase-backed collaborators for the flows.
 *
 * Rows are validated with zod on the way in, so a schema drift in the
 * database surfaces as a logged skip (or a thrown error for single-row
 * lookups) instead of leaking malformed records into a run.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  AlertNotifier,
  AssignmentStore,
  CommunicationsSource,
  DealRepository,
  RetrievalPort,
  RosterSource,
  RunResultSink,
} from '../agents/ports.js';
import { tokenize } from '../agents/capability-matcher.js';
import { AT_RISK_STATUS, raisesRisk } from '../agents/monitoring/stages.js';
import type {
  Alert,
  AssignmentDraft,
  CapabilityRecord,
  Communication,
  Deal,
  DealDocument,
  FlowResult,
  MonitoringState,
  OrganizationProfile,
  ProposalState,
  QualificationState,
  RetrievedPassage,
  StoredRequirement,
  TeamMember,
} from '../agents/types.js';
import logger from './logger.js';

// ─── Row schemas ─────────────────────────────────────────────────────

const nullableString = z.string().nullish().transform((value) => value ?? '');
const nullableNumber = z.coerce.number().nullish().transform((value) => value ?? null);

const DealRow = z.object({
  id: z.string(),
  title: nullableString,
  client_name: nullableString,
  description: nullableString,
  deal_value: nullableNumber,
  budget_range: nullableString,
  timeline: nullableString,
  health_score: nullableNumber,
  previous_health_score: nullableNumber,
  stage: z.string().nullish().transform((value) => value ?? null),
  status: z.string().nullish().transform((value) => value ?? null),
});

const DocumentRow = z.object({
  id: z.string(),
  deal_id: z.string(),
  filename: nullableString,
  category: z.string().nullish().transform((value) => value ?? null),
  extracted_text: z.string().nullish().transform((value) => value ?? null),
  file_size: nullableNumber,
  is_processed: z.boolean().nullish().transform((value) => value ?? false),
  created_at: nullableString,
});

const RequirementRow = z.object({
  category: nullableString,
  requirement_text: z.string(),
  confidence_score: nullableNumber,
});

const EmployeeRow = z.object({
  id: z.string(),
  name: z.string(),
  role: nullableString,
  department: nullableString,
  skills: z.array(z.string()).nullish().transform((value) => value ?? []),
  availability_percent: nullableNumber,
  hourly_rate: nullableNumber,
});

const AssignmentRow = z.object({
  employee_id: z.string(),
  role_on_deal: nullableString,
  allocation_percent: nullableNumber,
  assigned_by: z.enum(['auto', 'manual']).catch('manual'),
  employees: EmployeeRow.nullish(),
});

const CommunicationRow = z.object({
  sender: nullableString,
  subject: nullableString,
  body: nullableString,
  received_at: nullableString,
});

const PassageRow = z.object({
  title: nullableString,
  content: z.string(),
  source: nullableString,
});

const AlertTimeRow = z.object({ created_at: z.string() });

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: readonly unknown[] | null, table: string): T[] {
  const parsed: T[] = [];
  for (const row of rows ?? []) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      logger.warn({ table, issues: result.error.issues }, 'Skipping malformed row');
    }
  }
  return parsed;
}

function toDeal(row: z.infer<typeof DealRow>): Deal {
  return { ...row };
}

function toDocument(row: z.infer<typeof DocumentRow>): DealDocument {
  return {
    id: row.id,
    deal_id: row.deal_id,
    title: row.filename || 'Untitled document',
    category: row.category,
    extracted_text: row.extracted_text,
    size: row.file_size,
    is_processed: row.is_processed,
    created_at: row.created_at,
  };
}

function toCapability(row: z.infer<typeof EmployeeRow>): CapabilityRecord {
  return {
    id: row.id,
    name: row.name,
    role: row.role,
    department: row.department,
    skills: row.skills,
    availability_percent: row.availability_percent ?? 100,
    hourly_rate: row.hourly_rate ?? 0,
  };
}

// ─── Adapter ─────────────────────────────────────────────────────────

export interface SupabaseDealStoreOptions {
  /** Profile fact sheet, loaded once from ORG_PROFILE_PATH. */
  profile: OrganizationProfile | null;
}

export class SupabaseDealStore
implements DealRepository, RosterSource, AssignmentStore, RetrievalPort, CommunicationsSource, AlertNotifier, RunResultSink {
  constructor(
    private readonly db: SupabaseClient,
    private readonly options: SupabaseDealStoreOptions,
  ) {}

  async getDeal(dealId: string): Promise<Deal | null> {
    const { data, error } = await this.db.from('deals').select('*').eq('id', dealId).maybeSingle();
    if (error) throw new Error(`Failed to load deal: ${error.message}`);
    if (!data) return null;
    return toDeal(DealRow.parse(data));
  }

  async listProcessedDocuments(dealId: string): Promise<DealDocument[]> {
    const { data, error } = await this.db
      .from('documents')
      .select('*')
      .eq('deal_id', dealId)
      .eq('is_processed', true)
      .order('created_at', { ascending: true });
    if (error) throw new Error(`Failed to load documents: ${error.message}`);
    return parseRows(DocumentRow, data, 'documents').map(toDocument);
  }

  async getDocument(documentId: string): Promise<DealDocument | null> {
    const { data, error } = await this.db.from('documents').select('*').eq('id', documentId).maybeSingle();
    if (error) throw new Error(`Failed to load document: ${error.message}`);
    if (!data) return null;
    return toDocument(DocumentRow.parse(data));
  }

  async listRequirements(dealId: string): Promise<StoredRequirement[]> {
    const { data, error } = await this.db
      .from('deal_requirements')
      .select('category, requirement_text, confidence_score')
      .eq('deal_id', dealId);
    if (error) throw new Error(`Failed to load requirements: ${error.message}`);
    return parseRows(RequirementRow, data, 'deal_requirements').map((row) => ({
      category: row.category || 'general',
      text: row.requirement_text,
      confidence: row.confidence_score ?? 0.5,
    }));
  }

  async latestAlertAt(dealId: string): Promise<Date | null> {
    const { data, error } = await this.db
      .from('alerts')
      .select('created_at')
      .eq('deal_id', dealId)
      .order('created_at', { ascending: false })
      .limit(1);
    if (error) throw new Error(`Failed to load alerts: ${error.message}`);
    const [latest] = parseRows(AlertTimeRow, data, 'alerts');
    return latest ? new Date(latest.created_at) : null;
  }

  async listCapabilities(): Promise<CapabilityRecord[]> {
    const { data, error } = await this.db.from('employees').select('*').eq('is_active', true);
    if (error) throw new Error(`Failed to load employees: ${error.message}`);
    return parseRows(EmployeeRow, data, 'employees').map(toCapability);
  }

  async getOrganizationProfile(): Promise<OrganizationProfile | null> {
    return this.options.profile;
  }

  async listTeam(dealId: string): Promise<TeamMember[]> {
    const { data, error } = await this.db
      .from('deal_assignments')
      .select('employee_id, role_on_deal, allocation_percent, assigned_by, employees(*)')
      .eq('deal_id', dealId);
    if (error) throw new Error(`Failed to load team: ${error.message}`);

    const team: TeamMember[] = [];
    for (const row of parseRows(AssignmentRow, data, 'deal_assignments')) {
      if (!row.employees) continue;
      const employee = toCapability(row.employees);
      team.push({
        employee_id: row.employee_id,
        name: employee.name,
        role: row.role_on_deal || employee.role,
        department: employee.department,
        skills: employee.skills,
        hourly_rate: employee.hourly_rate,
        allocation_percent: row.allocation_percent ?? 100,
        assigned_by: row.assigned_by,
      });
    }
    return team;
  }

  async replaceAutoAssignments(dealId: string, drafts: AssignmentDraft[]): Promise<void> {
    const { error: deleteError } = await this.db
      .from('deal_assignments')
      .delete()
      .eq('deal_id', dealId)
      .eq('assigned_by', 'auto');
    if (deleteError) throw new Error(`Failed to clear auto assignments: ${deleteError.message}`);

    if (drafts.length === 0) return;
    const { error: insertError } = await this.db.from('deal_assignments').insert(drafts);
    if (insertError) throw new Error(`Failed to insert auto assignments: ${insertError.message}`);
  }

  /** Full-text search over stored proposal sections; relevance decays with rank. */
  async retrieve(context: string, requirementTexts: string[], n: number): Promise<RetrievedPassage[]> {
    const terms = [...new Set(tokenize([context, ...requirementTexts].join(' ')))].slice(0, 30);
    if (terms.length === 0) return [];

    const { data, error } = await this.db
      .from('proposal_sections')
      .select('title, content, source')
      .textSearch('content', terms.join(' | '))
      .limit(n);
    if (error) throw new Error(`Proposal section search failed: ${error.message}`);

    return parseRows(PassageRow, data, 'proposal_sections').map((row, rank) => ({
      text: row.content,
      source: row.source || row.title || 'proposal library',
      relevance: 1 / (rank + 1),
      collection: 'proposal_sections',
    }));
  }

  async fetchRecent(deal: Deal, since: Date): Promise<Communication[]> {
    const { data, error } = await this.db
      .from('communications')
      .select('sender, subject, body, received_at')
      .eq('deal_id', deal.id)
      .gte('received_at', since.toISOString())
      .order('received_at', { ascending: false });
    if (error) throw new Error(`Failed to load communications: ${error.message}`);
    return parseRows(CommunicationRow, data, 'communications').map((row) => ({
      from: row.sender,
      subject: row.subject,
      content: row.body,
      date: row.received_at,
    }));
  }

  async notify(dealId: string, alert: Alert): Promise<void> {
    const { error } = await this.db.from('notifications').insert({
      deal_id: dealId,
      kind: alert.alert_type,
      severity: alert.severity,
      title: alert.title,
      body: alert.description,
    });
    if (error) throw new Error(`Failed to queue notification: ${error.message}`);
  }

  async save(result: FlowResult): Promise<void> {
    switch (result.flow_type) {
      case 'qualification':
        return this.saveQualification(result.state);
      case 'proposal':
        return this.saveProposal(result.state);
      case 'monitoring':
        return this.saveMonitoring(result.state);
    }
  }

  private async saveQualification(state: QualificationState): Promise<void> {
    const { error: analysisError } = await this.db.from('deal_analyses').insert({
      deal_id: state.deal_id,
      run_id: state.run_id,
      recommendation: state.recommendation,
      confidence_score: state.confidence_score,
      reasoning: state.reasoning,
      positive_factors: state.positive_factors,
      risk_factors: state.risk_factors,
      conditions: state.conditions,
      gap_analysis: state.gap_analysis,
      skill_matches: state.skill_matches,
      entities: state.extracted_entities,
    });
    if (analysisError) throw new Error(`Failed to save analysis: ${analysisError.message}`);
    await this.advanceStage(state.deal_id, 'qualification');

    if (state.extracted_requirements.length === 0) return;
    const { error: deleteError } = await this.db.from('deal_requirements').delete().eq('deal_id', state.deal_id);
    if (deleteError) throw new Error(`Failed to replace requirements: ${deleteError.message}`);
    const { error: insertError } = await this.db.from('deal_requirements').insert(
      state.extracted_requirements.map((req) => ({
        deal_id: state.deal_id,
        category: req.category,
        requirement_text: req.text,
        priority: req.priority,
        confidence_score: req.confidence,
      })),
    );
    if (insertError) throw new Error(`Failed to save requirements: ${insertError.message}`);
  }

  private async advanceStage(dealId: string, stage: string): Promise<void> {
    const { error } = await this.db.from('deals').update({ stage }).eq('id', dealId);
    if (error) throw new Error(`Failed to update deal stage: ${error.message}`);
  }

  private async saveProposal(state: ProposalState): Promise<void> {
    const { error } = await this.db.from('proposals').insert({
      deal_id: state.deal_id,
      run_id: state.run_id,
      content: state.final_proposal,
      sections: state.proposal_sections,
      compliance_score: state.compliance_score,
      compliance_issues: state.compliance_issues,
      applied_guidance: state.applied_guidance,
    });
    if (error) throw new Error(`Failed to save proposal: ${error.message}`);
    await this.advanceStage(state.deal_id, 'proposal');
  }

  private async saveMonitoring(state: MonitoringState): Promise<void> {
    const { error: dealError } = await this.db
      .from('deals')
      .update({
        health_score: state.health_score,
        previous_health_score: state.deal.health_score,
        ...(raisesRisk(state.detected_alerts) ? { status: AT_RISK_STATUS } : {}),
      })
      .eq('id', state.deal_id);
    if (dealError) throw new Error(`Failed to update deal health: ${dealError.message}`);

    if (state.detected_alerts.length > 0) {
      const { error: alertError } = await this.db
        .from('alerts')
        .insert(state.detected_alerts.map((alert) => ({ deal_id: state.deal_id, ...alert })));
      if (alertError) throw new Error(`Failed to save alerts: ${alertError.message}`);
    }

    if (state.recovery_email) {
      const { error: recoveryError } = await this.db.from('recovery_actions').insert({
        deal_id: state.deal_id,
        run_id: state.run_id,
        email_subject: state.recovery_subject,
        email_body: state.recovery_body,
        actions: state.recovery_actions,
      });
      if (recoveryError) throw new Error(`Failed to save recovery plan: ${recoveryError.message}`);
    }
  }
}
