import { Lead, LeadId, LeadStatus, NewLeadRecord } from '../core/types';

export type LeadGroupField = 'sourceName' | 'status' | 'industryName';

export interface DraftRecord {
  leadId: LeadId;
  content: string;
  industry: string;
  generatedBy: string;
}

export interface LeadStore {
  findByIdentity(displayName: string, canonicalUrl?: string): Promise<LeadId | null>;
  insert(fields: NewLeadRecord): Promise<LeadId>;
  listRecent(limit: number, status?: LeadStatus): Promise<Lead[]>;
  aggregateCounts(groupField: LeadGroupField): Promise<Record<string, number>>;
  insertDraft(draft: DraftRecord): Promise<number>;
  close(): Promise<void>;
}
