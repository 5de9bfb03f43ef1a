import { AxiosInstance } from 'axios';
import { SourceUnavailableError } from '../core/errors';
import { LeadCandidate, SourceName } from '../core/types';
import { IndustryPolicy } from '../industries/base';
import { createHttpClient } from '../utils/httpClient';
import { log } from '../utils/logger';
import { isRecord, readText } from '../utils/records';
import { CollectorSettings, GridCollector } from './base';
import { buildCandidate, SearchPair, SourceUsage } from './common';

export const SERPAPI_SEARCH_URL = 'https://serpapi.com/search.json';
export const SERPAPI_ACCOUNT_URL = 'https://serpapi.com/account.json';

export interface SerpApiSettings extends CollectorSettings {
  apiKey?: string;
}

export interface OrganicResult {
  title: string;
  link?: string;
  snippet?: string;
}

export const parseOrganicResults = (payload: unknown): OrganicResult[] => {
  if (!isRecord(payload) || !Array.isArray(payload.organic_results)) return [];
  const results: OrganicResult[] = [];
  for (const item of payload.organic_results) {
    if (!isRecord(item)) continue;
    const title = readText(item.title);
    if (!title) continue;
    results.push({ title, link: readText(item.link), snippet: readText(item.snippet) });
  }
  return results;
};

const readCount = (payload: Record<string, unknown>, ...keys: string[]): number => {
  for (const key of keys) {
    const value = Number(payload[key]);
    if (Number.isFinite(value)) return value;
  }
  return 0;
};

export class SerpApiCollector extends GridCollector {
  readonly name: SourceName = 'serpapi';

  private readonly client: AxiosInstance;

  constructor(
    policy: IndustryPolicy,
    private readonly serp: SerpApiSettings,
    client?: AxiosInstance,
  ) {
    super(policy, serp);
    this.client = client ?? createHttpClient(undefined, serp.timeoutMs);
  }

  available(): boolean {
    return Boolean(this.serp.apiKey);
  }

  protected async fetchPair({ keyword, city }: SearchPair): Promise<LeadCandidate[]> {
    const params = this.policy.buildSearchParams(keyword, city).serpapi;
    const { data } = await this.client.get<unknown>(SERPAPI_SEARCH_URL, {
      params: { engine: 'google', ...params, api_key: this.serp.apiKey },
    });
    if (isRecord(data) && typeof data.error === 'string') {
      throw new SourceUnavailableError(this.name, data.error);
    }
    const searchTerm = String(params.q ?? `${keyword} ${city}`);
    return parseOrganicResults(data).map((result) =>
      buildCandidate(this.name, this.policy, searchTerm, {
        displayName: result.title,
        canonicalUrl: result.link,
        description: result.snippet,
        location: city,
        extractionMethod: 'serpapi:organic',
      }),
    );
  }

  async usage(): Promise<SourceUsage | null> {
    if (!this.available()) return null;
    try {
      const { data } = await this.client.get<unknown>(SERPAPI_ACCOUNT_URL, { params: { api_key: this.serp.apiKey } });
      if (!isRecord(data)) return null;
      return {
        used: readCount(data, 'this_month_usage'),
        remaining: readCount(data, 'plan_searches_left', 'total_searches_left'),
        limit: readCount(data, 'searches_per_month'),
      };
    } catch (error) {
      log('WARN', new SourceUnavailableError(this.name, error).message);
      return null;
    }
  }
}
