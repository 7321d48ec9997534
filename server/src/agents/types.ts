/**
 * Shared types for the deal pipeline flows.
 *
 * Each flow threads one state bag through its stages. Stages only add keys
 * they own; `errors` accumulates non-fatal issues for observability and is
 * distinct from a run's single fatal error.
 */

import type { TokenUsage } from '../lib/llm-provider.js';
import type { OrganizationProfile } from '../lib/organization-profile.js';
import type {
  Decision,
  ExtractedEntities,
  ExtractedRequirement,
  GapAnalysis,
  Recommendation,
} from './schemas/qualification-schemas.js';
import type { ComplianceIssue } from './schemas/proposal-schemas.js';
import type { SentimentScore } from './schemas/monitoring-schemas.js';

export type { OrganizationProfile, ExtractedEntities, ExtractedRequirement, GapAnalysis, Recommendation, Decision };
export type { ComplianceIssue, SentimentScore };

export const FLOW_TYPES = ['qualification', 'proposal', 'monitoring'] as const;

export type FlowType = (typeof FLOW_TYPES)[number];

export type RunStatus = 'queued' | 'running' | 'completed' | 'failed';

// ─── Run lifecycle ───────────────────────────────────────────────────

export interface RunRecord {
  run_id: string;
  deal_id: string;
  flow_type: FlowType;
  status: RunStatus;
  stage: string | null;
  stage_index: number;
  total_stages: number;
  error?: string;
  result_summary?: Record<string, unknown>;
  token_usage: TokenUsage;
  created_at: string;
  updated_at: string;
}

export type ProgressStatus = 'processing' | 'completed' | 'failed';

export interface ProgressEvent {
  run_id: string;
  stage: string;
  /** 1-based; 0 only for a failure before the first stage. */
  stage_index: number;
  total_stages: number;
  status: ProgressStatus;
  message: string;
  data?: Record<string, unknown>;
}

// ─── Collaborator records ────────────────────────────────────────────

export interface Deal {
  id: string;
  title: string;
  client_name: string;
  description: string;
  deal_value: number | null;
  budget_range: string;
  timeline: string;
  health_score: number | null;
  previous_health_score: number | null;
  stage: string | null;
  status: string | null;
}

export interface DealDocument {
  id: string;
  deal_id: string;
  title: string;
  category: string | null;
  extracted_text: string | null;
  size: number | null;
  is_processed: boolean;
  created_at: string;
}

export interface StoredRequirement {
  category: string;
  text: string;
  confidence: number;
}

export interface CapabilityRecord {
  id: string;
  name: string;
  role: string;
  department: string;
  /** Lower-cased. */
  skills: string[];
  availability_percent: number;
  hourly_rate: number;
}

export type AssignmentSource = 'auto' | 'manual';

export interface TeamMember {
  employee_id: string;
  name: string;
  role: string;
  department: string;
  skills: string[];
  hourly_rate: number;
  allocation_percent: number;
  assigned_by: AssignmentSource;
}

export interface AssignmentDraft {
  deal_id: string;
  employee_id: string;
  role_on_deal: string;
  allocation_percent: number;
  match_score: number;
  assigned_by: 'auto';
}

export interface Communication {
  from: string;
  subject: string;
  content: string;
  /** ISO timestamp. */
  date: string;
}

export interface RetrievedPassage {
  text: string;
  source: string;
  relevance: number;
  collection?: string;
}

// ─── State bags ──────────────────────────────────────────────────────

export interface BaseFlowState {
  deal_id: string;
  run_id: string;
  current_stage: string;
  errors: string[];
}

export interface DocumentSummary {
  id: string;
  title: string;
  category: string | null;
  size: number | null;
}

export interface DocumentMetadata {
  document_count: number;
  documents: DocumentSummary[];
  word_count: number;
  char_count: number;
}

export interface CapabilityMatch {
  employee_id: string;
  name: string;
  role: string;
  matching_terms: string[];
  match_score: number;
  availability_percent: number;
  hourly_rate: number;
}

export interface SkillMatch {
  role: string;
  status: 'covered' | 'unfilled';
  candidates: string[];
}

export interface QualificationState extends BaseFlowState {
  deal: Deal;
  document_text: string;
  document_metadata: DocumentMetadata;
  employee_capabilities: CapabilityRecord[];
  organization_profile: OrganizationProfile | null;
  extracted_requirements: ExtractedRequirement[];
  extracted_entities: ExtractedEntities;
  gap_analysis: GapAnalysis | null;
  capability_matches: CapabilityMatch[];
  skill_matches: SkillMatch[];
  recommendation: Recommendation;
  confidence_score: number;
  positive_factors: string[];
  risk_factors: string[];
  conditions: string[];
  reasoning: string;
}

export interface ProposalSection {
  title: string;
  content: string;
}

export interface ProposalState extends BaseFlowState {
  deal: Deal;
  requirements: StoredRequirement[];
  team: TeamMember[];
  organization_profile: OrganizationProfile | null;
  retrieved_sections: RetrievedPassage[];
  applied_guidance: string[];
  proposal_draft: string;
  proposal_sections: ProposalSection[];
  compliance_score: number;
  compliance_issues: ComplianceIssue[];
  final_proposal: string;
}

export type AlertType = 'sentiment_drop' | 'deadline_risk' | 'competitor_mention' | 'positive_update';

export type AlertSeverity = 'critical' | 'high' | 'medium' | 'info';

export interface Alert {
  alert_type: AlertType;
  severity: AlertSeverity;
  title: string;
  description: string;
}

export type HealthTrend = 'up' | 'down' | 'stable';

export interface MonitoringState extends BaseFlowState {
  deal: Deal;
  recent_communications: Communication[];
  no_data_reason: string | null;
  sentiment_scores: SentimentScore[];
  overall_sentiment: number;
  key_concerns: string[];
  positive_signals: string[];
  health_score: number;
  trend: HealthTrend;
  detected_alerts: Alert[];
  recovery_email: string;
  recovery_subject: string;
  recovery_body: string;
  recovery_actions: string[];
}

export type FlowResult =
  | { flow_type: 'qualification'; run_id: string; deal_id: string; state: QualificationState; assignments: AssignmentDraft[] }
  | { flow_type: 'proposal'; run_id: string; deal_id: string; state: ProposalState }
  | { flow_type: 'monitoring'; run_id: string; deal_id: string; state: MonitoringState };
