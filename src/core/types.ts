export type SourceName = 'serpapi' | 'linkedin';

export type LeadSource = SourceName | 'manual';

export type LeadStatus = 'pending' | 'contacted' | 'responded' | 'converted' | 'discarded';

export type LeadId = number;

export interface LeadCandidate {
  displayName: string;
  canonicalUrl?: string; // website or profile url, secondary identity key
  description?: string;
  location?: string;
  sourceName: LeadSource;
  searchTermUsed: string;
  industryName: string;
  extractionMethod: string; // e.g. "serpapi:organic", "linkedin:embedded-json"
  foundAt: string; // ISO timestamp
}

export interface NewLeadRecord extends LeadCandidate {
  email?: string;
  phone?: string;
  status: LeadStatus;
}

export interface Lead extends NewLeadRecord {
  id: LeadId;
}

// A lead accepted during one session, either inserted by it or resolved to an existing row.
export interface SessionLead extends LeadCandidate {
  id: LeadId;
  isNew: boolean;
}

export interface SearchRequest {
  cities: string[];
  keywords: string[];
  maxSearches: number; // budget: keyword x city pairs per collector
  sources: Record<SourceName, boolean>;
}

export interface SessionStats {
  searchesPerformed: number;
  leadsFound: number;
  leadsSaved: number;
  messagesDrafted: number;
  executionTimeSeconds: number;
  industry: string;
}

export type PhaseStatus = 'completed' | 'skipped' | 'failed' | 'cancelled';

export interface PhaseSummary {
  source: SourceName;
  status: PhaseStatus;
  searches: number;
  found: number;
  accepted: number;
  rejected: number;
  invalid: number;
  duplicates: number;
  saved: number;
  persistFailures: number;
  message?: string;
}

export interface DraftedMessage {
  leadId: LeadId;
  leadName: string;
  content: string;
  industry: string;
  generatedAt: string;
}

export type SessionOutcome = 'completed' | 'cancelled';

export interface SessionReport {
  sessionId: string;
  industry: string;
  industryKey: string;
  outcome: SessionOutcome;
  request: SearchRequest;
  startedAt: string;
  finishedAt: string;
  stats: SessionStats;
  phases: PhaseSummary[];
  leads: SessionLead[];
  drafts: DraftedMessage[];
  archivePath?: string;
}
