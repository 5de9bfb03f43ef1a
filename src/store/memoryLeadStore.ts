import { normalizeName, normalizeUrl } from '../core/identity';
import { Lead, LeadId, LeadStatus, NewLeadRecord } from '../core/types';
import { DraftRecord, LeadGroupField, LeadStore } from './leadStore';

interface StoredDraft extends DraftRecord {
  id: number;
  generatedAt: string;
}

export class MemoryLeadStore implements LeadStore {
  private leads = new Map<LeadId, Lead>();
  private drafts: StoredDraft[] = [];
  private nextLeadId = 1;

  async findByIdentity(displayName: string, canonicalUrl?: string): Promise<LeadId | null> {
    const name = normalizeName(displayName);
    const url = normalizeUrl(canonicalUrl);
    for (const lead of this.leads.values()) {
      if (normalizeName(lead.displayName) === name) return lead.id;
      if (url && normalizeUrl(lead.canonicalUrl) === url) return lead.id;
    }
    return null;
  }

  async insert(fields: NewLeadRecord): Promise<LeadId> {
    const id = this.nextLeadId;
    this.nextLeadId += 1;
    this.leads.set(id, { ...fields, id });
    return id;
  }

  async listRecent(limit: number, status?: LeadStatus): Promise<Lead[]> {
    return Array.from(this.leads.values())
      .filter((lead) => !status || lead.status === status)
      .sort((a, b) => b.foundAt.localeCompare(a.foundAt) || b.id - a.id)
      .slice(0, Math.max(0, limit));
  }

  async aggregateCounts(groupField: LeadGroupField): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const lead of this.leads.values()) {
      const key = lead[groupField] || 'unknown';
      counts[key] = (counts[key] ?? 0) + 1;
    }
    return counts;
  }

  async insertDraft(draft: DraftRecord): Promise<number> {
    const id = this.drafts.length + 1;
    this.drafts.push({ ...draft, id, generatedAt: new Date().toISOString() });
    return id;
  }

  get(id: LeadId): Lead | undefined {
    return this.leads.get(id);
  }

  list(): Lead[] {
    return Array.from(this.leads.values());
  }

  listDrafts(): StoredDraft[] {
    return [...this.drafts];
  }

  async close(): Promise<void> {
    this.leads.clear();
    this.drafts = [];
  }
}
