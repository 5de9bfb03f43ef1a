import { DraftedMessage, LeadId, LeadSource, PhaseSummary, SessionOutcome, SessionReport, SessionStats } from './types';

export const SAMPLE_LEAD_COUNT = 5;
export const DESCRIPTION_PREVIEW_LENGTH = 100;

export interface LeadPreview {
  id: LeadId;
  displayName: string;
  canonicalUrl?: string;
  description?: string;
  location?: string;
  sourceName: LeadSource;
  isNew: boolean;
}

export interface ReportSummary {
  sessionId: string;
  industry: string;
  outcome: SessionOutcome;
  startedAt: string;
  finishedAt: string;
  stats: SessionStats;
  totalLeads: number;
  newLeads: number;
  leadsBySource: Record<string, number>;
  phases: PhaseSummary[];
  sampleLeads: LeadPreview[];
  drafts: DraftedMessage[];
  archivePath?: string;
}

export const truncateText = (text: string | undefined, max = DESCRIPTION_PREVIEW_LENGTH): string | undefined => {
  if (text === undefined || text.length <= max) return text;
  return `${text.slice(0, max)}...`;
};

export const summarizeReport = (report: SessionReport): ReportSummary => {
  const leadsBySource: Record<string, number> = {};
  for (const lead of report.leads) {
    leadsBySource[lead.sourceName] = (leadsBySource[lead.sourceName] ?? 0) + 1;
  }

  return {
    sessionId: report.sessionId,
    industry: report.industry,
    outcome: report.outcome,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    stats: { ...report.stats },
    totalLeads: report.leads.length,
    newLeads: report.leads.filter((lead) => lead.isNew).length,
    leadsBySource,
    phases: report.phases.map((phase) => ({ ...phase })),
    sampleLeads: report.leads.slice(0, SAMPLE_LEAD_COUNT).map((lead) => ({
      id: lead.id,
      displayName: lead.displayName,
      canonicalUrl: lead.canonicalUrl,
      description: truncateText(lead.description),
      location: lead.location,
      sourceName: lead.sourceName,
      isNew: lead.isNew,
    })),
    drafts: report.drafts.map((draft) => ({ ...draft })),
    archivePath: report.archivePath,
  };
};
