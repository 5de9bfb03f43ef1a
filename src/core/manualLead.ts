import { DEFAULT_INDUSTRY, resolveIndustry } from '../industries/registry';
import { LeadStore } from '../store/leadStore';
import { isRecord } from '../utils/records';
import { resolveDuplicate } from './deduplicator';
import { RequestValidationError } from './errors';
import { LeadId } from './types';

export interface ManualLeadInput {
  displayName: string;
  email?: string;
  phone?: string;
  canonicalUrl?: string;
  description?: string;
  location?: string;
  industry?: string;
}

export interface ManualLeadOptions {
  /** Industry key used when the input names none. */
  industry?: string;
  now?: Date;
}

export interface ManualLeadResult {
  id: LeadId;
  created: boolean;
}

const OPTIONAL_FIELDS = ['email', 'phone', 'canonicalUrl', 'description', 'location', 'industry'] as const;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const optionalString = (value: unknown, key: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new RequestValidationError(`${key} must be a string`);
  }
  return value.trim() || undefined;
};

export const parseManualLead = (raw: unknown): ManualLeadInput => {
  if (!isRecord(raw)) {
    throw new RequestValidationError('lead must be a JSON object');
  }
  const displayName = optionalString(raw.displayName, 'displayName');
  if (!displayName) {
    throw new RequestValidationError('displayName is required');
  }

  const input: ManualLeadInput = { displayName };
  for (const field of OPTIONAL_FIELDS) {
    input[field] = optionalString(raw[field], field);
  }
  if (input.email && !EMAIL_PATTERN.test(input.email)) {
    throw new RequestValidationError('email is not a valid address');
  }
  return input;
};

// Existing leads are matched with the same identity rule as collected ones.
export const addManualLead = async (
  store: LeadStore,
  input: ManualLeadInput,
  { industry = DEFAULT_INDUSTRY, now = new Date() }: ManualLeadOptions = {},
): Promise<ManualLeadResult> => {
  const displayName = input.displayName.trim();
  if (!displayName) {
    throw new RequestValidationError('displayName is required');
  }

  const resolution = await resolveDuplicate({ displayName, canonicalUrl: input.canonicalUrl }, null, store);
  if (resolution.kind !== 'new') {
    return { id: resolution.id, created: false };
  }

  const id = await store.insert({
    displayName,
    canonicalUrl: input.canonicalUrl,
    description: input.description,
    location: input.location,
    email: input.email,
    phone: input.phone,
    sourceName: 'manual',
    searchTermUsed: '',
    industryName: resolveIndustry(input.industry ?? industry).name,
    extractionMethod: 'manual-entry',
    foundAt: now.toISOString(),
    status: 'pending',
  });
  return { id, created: true };
};
