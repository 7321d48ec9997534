/**
 * Collaborator contracts consumed by the flows. Supabase-backed adapters live
 * in lib/supabase-deal-store.ts; tests and local development use
 * lib/in-memory-deal-store.ts.
 */

import type {
  Alert,
  AssignmentDraft,
  CapabilityRecord,
  Communication,
  Deal,
  DealDocument,
  FlowResult,
  OrganizationProfile,
  RetrievedPassage,
  StoredRequirement,
  TeamMember,
} from './types.js';

/** Submit a prompt, get raw text back. No structured-output guarantee. */
export interface ReasoningPort {
  submit(prompt: string, maxOutputTokens: number): Promise<string>;
}

export interface DealRepository {
  getDeal(dealId: string): Promise<Deal | null>;
  /** Processed documents, oldest first. */
  listProcessedDocuments(dealId: string): Promise<DealDocument[]>;
  getDocument(documentId: string): Promise<DealDocument | null>;
  listRequirements(dealId: string): Promise<StoredRequirement[]>;
  latestAlertAt(dealId: string): Promise<Date | null>;
}

export interface RosterSource {
  listCapabilities(): Promise<CapabilityRecord[]>;
  getOrganizationProfile(): Promise<OrganizationProfile | null>;
}

export interface AssignmentStore {
  listTeam(dealId: string): Promise<TeamMember[]>;
  /** Drop every `auto` assignment for the deal, then insert the drafts. Manual rows are untouched. */
  replaceAutoAssignments(dealId: string, drafts: AssignmentDraft[]): Promise<void>;
}

export interface RetrievalPort {
  retrieve(context: string, requirementTexts: string[], n: number): Promise<RetrievedPassage[]>;
}

export interface CommunicationsSource {
  fetchRecent(deal: Deal, since: Date): Promise<Communication[]>;
}

export interface AlertNotifier {
  notify(dealId: string, alert: Alert): Promise<void>;
}

export interface RunResultSink {
  save(result: FlowResult): Promise<void>;
}
