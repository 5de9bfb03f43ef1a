import { LeadCandidate, SourceName } from '../core/types';

export type IndustryKey = 'medical_aesthetics' | 'real_estate';

export type SearchParams = Record<string, string | number>;

export type SourceSearchParams = Record<SourceName, SearchParams>;

export type ValidationInput = Pick<LeadCandidate, 'displayName' | 'description' | 'canonicalUrl'>;

export type EmailContextInput = Pick<LeadCandidate, 'displayName' | 'description' | 'location'>;

export interface DraftContext {
  leadName: string;
  leadDescription?: string;
  leadLocation?: string;
  industry: string;
  products: string[];
  services: string[];
  targetAudience: string;
  valueProposition: string;
  tone: string;
  language: string;
}

export interface IndustryInfo {
  key: IndustryKey;
  name: string;
  keywords: string[];
  searchTerms: string[];
  companyIndicators: string[];
}

export interface IndustryPolicy {
  readonly key: IndustryKey;
  readonly name: string;
  defaultKeywords(): string[];
  searchTerms(): string[];
  companyIndicators(): string[];
  validate(candidate: ValidationInput): boolean;
  buildSearchParams(keyword: string, city: string): SourceSearchParams;
  buildEmailContext(lead: EmailContextInput): DraftContext;
  info(): IndustryInfo;
}

export interface IndustryVocabulary {
  name: string;
  defaultKeywords: string[];
  searchTerms: string[];
  companyIndicators: string[];
  negativeIndicators: string[];
  email: Omit<DraftContext, 'leadName' | 'leadDescription' | 'leadLocation'>;
}

export interface IndicatorScore {
  positive: number;
  negative: number;
}

const countHits = (text: string, indicators: string[]): number =>
  indicators.filter((indicator) => text.includes(indicator.toLowerCase())).length;

export abstract class BaseIndustryPolicy implements IndustryPolicy {
  abstract readonly key: IndustryKey;

  constructor(private readonly vocabulary: IndustryVocabulary) {}

  get name(): string {
    return this.vocabulary.name;
  }

  defaultKeywords(): string[] {
    return [...this.vocabulary.defaultKeywords];
  }

  searchTerms(): string[] {
    return [...this.vocabulary.searchTerms];
  }

  companyIndicators(): string[] {
    return [...this.vocabulary.companyIndicators];
  }

  score(candidate: ValidationInput): IndicatorScore {
    const text = [candidate.displayName, candidate.description ?? '', candidate.canonicalUrl ?? ''].join(' ').toLowerCase();
    return {
      positive: countHits(text, this.vocabulary.companyIndicators),
      negative: countHits(text, this.vocabulary.negativeIndicators),
    };
  }

  // Zero industry hits always rejects, whatever the negative count.
  validate(candidate: ValidationInput): boolean {
    const { positive, negative } = this.score(candidate);
    return positive > negative && positive >= 1;
  }

  buildSearchParams(keyword: string, city: string): SourceSearchParams {
    return {
      serpapi: this.serpApiParams(keyword.trim(), city.trim()),
      linkedin: this.linkedInParams(keyword.trim(), city.trim()),
    };
  }

  protected serpApiParams(keyword: string, city: string): SearchParams {
    return {
      q: `${keyword} ${city}`,
      location: city,
      hl: 'es',
      gl: 'es',
      google_domain: 'google.es',
    };
  }

  protected linkedInParams(keyword: string, city: string): SearchParams {
    return {
      keywords: `${keyword} ${city}`,
      origin: 'GLOBAL_SEARCH_HEADER',
    };
  }

  buildEmailContext(lead: EmailContextInput): DraftContext {
    const { email } = this.vocabulary;
    return {
      ...email,
      products: [...email.products],
      services: [...email.services],
      leadName: lead.displayName.trim(),
      leadDescription: lead.description,
      leadLocation: lead.location,
    };
  }

  info(): IndustryInfo {
    return {
      key: this.key,
      name: this.name,
      keywords: this.defaultKeywords(),
      searchTerms: this.searchTerms().slice(0, 5),
      companyIndicators: this.companyIndicators().slice(0, 5),
    };
  }
}
