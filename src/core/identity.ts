// Two records denote the same entity when their normalized names match
// or when both carry the same non-empty canonical url.

export const normalizeName = (name: string): string => name.trim().replace(/\s+/g, ' ').toLowerCase();

export const normalizeUrl = (url?: string | null): string => (url ?? '').trim();

export interface IdentityFields {
  displayName: string;
  canonicalUrl?: string | null;
}

export const sameIdentity = (a: IdentityFields, b: IdentityFields): boolean => {
  if (normalizeName(a.displayName) === normalizeName(b.displayName)) return true;
  const url = normalizeUrl(a.canonicalUrl);
  return url !== '' && url === normalizeUrl(b.canonicalUrl);
};

export const hasDisplayName = (lead: { displayName?: string | null }): boolean =>
  typeof lead.displayName === 'string' && lead.displayName.trim().length > 0;
