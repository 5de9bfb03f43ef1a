import { IndustryPolicy } from '../industries/base';
import { LeadCandidate, SourceName } from '../core/types';

export interface SearchPair {
  city: string;
  keyword: string;
}

export interface SearchProgress extends SearchPair {
  completed: number;
  planned: number;
  found: number;
}

export interface SearchOptions {
  shouldStop?: () => boolean;
  onSearch?: (progress: SearchProgress) => void;
}

export interface SourceUsage {
  used: number;
  remaining: number;
  limit: number;
}

export interface SourceCollector {
  readonly name: SourceName;
  available(): boolean;
  search(cities: string[], keywords: string[], budget: number, options?: SearchOptions): Promise<LeadCandidate[]>;
  usage?(): Promise<SourceUsage | null>;
}

// City-major, cut at budget.
export const planSearchPairs = (cities: string[], keywords: string[], budget: number): SearchPair[] => {
  const pairs: SearchPair[] = [];
  for (const city of cities) {
    for (const keyword of keywords) {
      if (pairs.length >= budget) return pairs;
      pairs.push({ city, keyword });
    }
  }
  return pairs;
};

export interface CandidateFields {
  displayName: string;
  canonicalUrl?: string;
  description?: string;
  location?: string;
  extractionMethod: string;
}

export const buildCandidate = (
  source: SourceName,
  policy: IndustryPolicy,
  searchTerm: string,
  fields: CandidateFields,
): LeadCandidate => ({
  displayName: fields.displayName.trim(),
  canonicalUrl: fields.canonicalUrl?.trim() || undefined,
  description: fields.description?.trim() || undefined,
  location: fields.location?.trim() || undefined,
  sourceName: source,
  searchTermUsed: searchTerm,
  industryName: policy.name,
  extractionMethod: fields.extractionMethod,
  foundAt: new Date().toISOString(),
});

export const joinText = (parts: Array<string | undefined>): string | undefined => {
  const present = parts.filter((part): part is string => Boolean(part));
  return present.length > 0 ? present.join(' · ') : undefined;
};
