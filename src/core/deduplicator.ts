import { LeadStore } from '../store/leadStore';
import { IdentityFields, sameIdentity } from './identity';
import { LeadId, SessionLead } from './types';

export type DuplicateResolution =
  | { kind: 'new' }
  | { kind: 'batch'; id: LeadId }
  | { kind: 'store'; id: LeadId };

/** Leads accepted so far in one session, in acceptance order. */
export class LeadBatch {
  private readonly leads: SessionLead[] = [];

  add(lead: SessionLead): void {
    this.leads.push(lead);
  }

  find(identity: IdentityFields): SessionLead | undefined {
    return this.leads.find((lead) => sameIdentity(lead, identity));
  }

  all(): SessionLead[] {
    return [...this.leads];
  }

  get size(): number {
    return this.leads.length;
  }
}

// The batch is checked first; the store is only asked when the batch has no match.
export const resolveDuplicate = async (
  candidate: IdentityFields,
  batch: LeadBatch | null,
  store: Pick<LeadStore, 'findByIdentity'>,
): Promise<DuplicateResolution> => {
  const inBatch = batch?.find(candidate);
  if (inBatch) return { kind: 'batch', id: inBatch.id };

  const existing = await store.findByIdentity(candidate.displayName, candidate.canonicalUrl ?? undefined);
  if (existing !== null) return { kind: 'store', id: existing };

  return { kind: 'new' };
};

export const isDuplicate = async (
  candidate: IdentityFields,
  batch: LeadBatch | null,
  store: Pick<LeadStore, 'findByIdentity'>,
): Promise<boolean> => (await resolveDuplicate(candidate, batch, store)).kind !== 'new';
