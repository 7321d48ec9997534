/**
 * In-process implementation of every flow collaborator. Backs the test suite
 * and local development when Supabase is not configured.
 */

import { tokenize } from '../agents/capability-matcher.js';
import { AT_RISK_STATUS, raisesRisk } from '../agents/monitoring/stages.js';
import type {
  AlertNotifier,
  AssignmentStore,
  CommunicationsSource,
  DealRepository,
  RetrievalPort,
  RosterSource,
  RunResultSink,
} from '../agents/ports.js';
import type {
  Alert,
  AssignmentDraft,
  AssignmentSource,
  CapabilityRecord,
  Communication,
  Deal,
  DealDocument,
  FlowResult,
  OrganizationProfile,
  RetrievedPassage,
  StoredRequirement,
  TeamMember,
} from '../agents/types.js';

export interface StoredAssignment {
  deal_id: string;
  employee_id: string;
  role_on_deal: string;
  allocation_percent: number;
  match_score: number;
  assigned_by: AssignmentSource;
}

export interface StoredPassage {
  text: string;
  source: string;
  collection?: string;
}

export interface InMemorySeed {
  deals?: Deal[];
  documents?: DealDocument[];
  requirements?: Record<string, StoredRequirement[]>;
  roster?: CapabilityRecord[];
  profile?: OrganizationProfile | null;
  assignments?: StoredAssignment[];
  passages?: StoredPassage[];
  communications?: Record<string, Communication[]>;
  latestAlerts?: Record<string, Date>;
}

export class InMemoryDealStore
implements DealRepository, RosterSource, AssignmentStore, RetrievalPort, CommunicationsSource, AlertNotifier, RunResultSink {
  readonly deals = new Map<string, Deal>();
  readonly documents: DealDocument[];
  readonly requirements = new Map<string, StoredRequirement[]>();
  roster: CapabilityRecord[];
  profile: OrganizationProfile | null;
  assignments: StoredAssignment[];
  readonly passages: StoredPassage[];
  readonly communications = new Map<string, Communication[]>();
  readonly latestAlerts = new Map<string, Date>();

  /** Every alert passed to `notify`, in order. */
  readonly notifications: Array<{ dealId: string; alert: Alert }> = [];
  /** Every final flow result handed to `save`, in order. */
  readonly results: FlowResult[] = [];

  constructor(seed: InMemorySeed = {}) {
    for (const deal of seed.deals ?? []) this.deals.set(deal.id, deal);
    this.documents = [...(seed.documents ?? [])];
    for (const [dealId, reqs] of Object.entries(seed.requirements ?? {})) this.requirements.set(dealId, [...reqs]);
    this.roster = [...(seed.roster ?? [])];
    this.profile = seed.profile ?? null;
    this.assignments = [...(seed.assignments ?? [])];
    this.passages = [...(seed.passages ?? [])];
    for (const [dealId, comms] of Object.entries(seed.communications ?? {})) this.communications.set(dealId, [...comms]);
    for (const [dealId, at] of Object.entries(seed.latestAlerts ?? {})) this.latestAlerts.set(dealId, at);
  }

  // ─── DealRepository ────────────────────────────────────────────────

  async getDeal(dealId: string): Promise<Deal | null> {
    return this.deals.get(dealId) ?? null;
  }

  async listProcessedDocuments(dealId: string): Promise<DealDocument[]> {
    return this.documents
      .filter((doc) => doc.deal_id === dealId && doc.is_processed)
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  async getDocument(documentId: string): Promise<DealDocument | null> {
    return this.documents.find((doc) => doc.id === documentId) ?? null;
  }

  async listRequirements(dealId: string): Promise<StoredRequirement[]> {
    return [...(this.requirements.get(dealId) ?? [])];
  }

  async latestAlertAt(dealId: string): Promise<Date | null> {
    return this.latestAlerts.get(dealId) ?? null;
  }

  // ─── RosterSource ──────────────────────────────────────────────────

  async listCapabilities(): Promise<CapabilityRecord[]> {
    return this.roster.map((record) => ({ ...record, skills: [...record.skills] }));
  }

  async getOrganizationProfile(): Promise<OrganizationProfile | null> {
    return this.profile;
  }

  // ─── AssignmentStore ───────────────────────────────────────────────

  async listTeam(dealId: string): Promise<TeamMember[]> {
    const team: TeamMember[] = [];
    for (const assignment of this.assignments) {
      if (assignment.deal_id !== dealId) continue;
      const employee = this.roster.find((record) => record.id === assignment.employee_id);
      if (!employee) continue;
      team.push({
        employee_id: employee.id,
        name: employee.name,
        role: assignment.role_on_deal || employee.role,
        department: employee.department,
        skills: [...employee.skills],
        hourly_rate: employee.hourly_rate,
        allocation_percent: assignment.allocation_percent,
        assigned_by: assignment.assigned_by,
      });
    }
    return team;
  }

  async replaceAutoAssignments(dealId: string, drafts: AssignmentDraft[]): Promise<void> {
    this.assignments = [
      ...this.assignments.filter((a) => a.deal_id !== dealId || a.assigned_by === 'manual'),
      ...drafts.map((draft) => ({ ...draft })),
    ];
  }

  // ─── RetrievalPort ─────────────────────────────────────────────────

  /** Keyword-overlap ranking; relevance is the share of query terms a passage contains. */
  async retrieve(context: string, requirementTexts: string[], n: number): Promise<RetrievedPassage[]> {
    const query = new Set(tokenize([context, ...requirementTexts].join(' ')));
    if (query.size === 0) return [];

    return this.passages
      .map((passage) => {
        const terms = new Set(tokenize(passage.text));
        let hits = 0;
        for (const term of query) if (terms.has(term)) hits++;
        return { passage, relevance: hits / query.size };
      })
      .filter((scored) => scored.relevance > 0)
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, n)
      .map(({ passage, relevance }) => ({ ...passage, relevance }));
  }

  // ─── CommunicationsSource ──────────────────────────────────────────

  async fetchRecent(deal: Deal, since: Date): Promise<Communication[]> {
    const cutoff = since.getTime();
    return (this.communications.get(deal.id) ?? []).filter((comm) => {
      const at = Date.parse(comm.date);
      return Number.isNaN(at) || at >= cutoff;
    });
  }

  // ─── AlertNotifier / RunResultSink ─────────────────────────────────

  async notify(dealId: string, alert: Alert): Promise<void> {
    this.notifications.push({ dealId, alert });
  }

  async save(result: FlowResult): Promise<void> {
    this.results.push(result);
    const deal = this.deals.get(result.deal_id);
    if (result.flow_type === 'qualification') {
      this.requirements.set(
        result.deal_id,
        result.state.extracted_requirements.map(({ category, text, confidence }) => ({ category, text, confidence })),
      );
      if (deal) this.deals.set(deal.id, { ...deal, stage: 'qualification' });
    } else if (result.flow_type === 'proposal') {
      if (deal) this.deals.set(deal.id, { ...deal, stage: 'proposal' });
    } else {
      if (deal) {
        this.deals.set(deal.id, {
          ...deal,
          previous_health_score: deal.health_score,
          health_score: result.state.health_score,
          status: raisesRisk(result.state.detected_alerts) ? AT_RISK_STATUS : deal.status,
        });
      }
      if (result.state.detected_alerts.length > 0) {
        this.latestAlerts.set(result.deal_id, new Date());
      }
    }
  }
}
