import { load } from 'cheerio';
import { LeadCandidate, SourceName } from '../core/types';
import { IndustryPolicy, SearchParams } from '../industries/base';
import { fetchPageHtml, PageFetcher } from '../utils/httpClient';
import { readText, readTextField } from '../utils/records';
import { CollectorSettings, GridCollector } from './base';
import { buildCandidate, joinText, SearchPair } from './common';
import { extractEmbeddedJsonBlobs, logFallback, ParserMeta, visitObjects } from './parserSupport';

export const LINKEDIN_ORIGIN = 'https://www.linkedin.com';
export const LINKEDIN_SEARCH_URL = `${LINKEDIN_ORIGIN}/search/results/companies/`;

const PARSER_META: ParserMeta = {
  source: 'linkedin',
  parserVersion: '1.2.0',
  lastUpdated: '2026-09-01',
};

const PROFILE_PATH = /^\/(company|in)\/[^/]+/;

export type LinkedInParseStage = 'embedded-json' | 'dom-fallback';

export interface LinkedInHit {
  displayName: string;
  canonicalUrl: string;
  description?: string;
  location?: string;
  stage: LinkedInParseStage;
}

/** Company or profile URL without query string or fragment, or undefined for anything else. */
export const canonicalProfileUrl = (raw: string | undefined): string | undefined => {
  if (!raw) return undefined;
  try {
    const url = new URL(raw.replace(/\\\//g, '/'), LINKEDIN_ORIGIN);
    if (!url.hostname.endsWith('linkedin.com') || !PROFILE_PATH.test(url.pathname)) return undefined;
    return `${LINKEDIN_ORIGIN}${url.pathname}`;
  } catch {
    return undefined;
  }
};

const fromEmbeddedJson = (html: string): LinkedInHit[] => {
  const hits: LinkedInHit[] = [];
  for (const blob of extractEmbeddedJsonBlobs(html)) {
    visitObjects(blob, (node) => {
      const displayName = readTextField(node, 'title');
      const canonicalUrl = canonicalProfileUrl(readText(node.navigationUrl));
      if (!displayName || !canonicalUrl) return;
      hits.push({
        displayName,
        canonicalUrl,
        description: joinText([readTextField(node, 'primarySubtitle'), readTextField(node, 'summary')]),
        location: readTextField(node, 'secondarySubtitle'),
        stage: 'embedded-json',
      });
    });
  }
  return hits;
};

const fromDom = (html: string): LinkedInHit[] => {
  const $ = load(html);
  const hits: LinkedInHit[] = [];
  $('.entity-result').each((_, el) => {
    const card = $(el);
    const link = card.find('.entity-result__title-text a').first();
    const canonicalUrl = canonicalProfileUrl(link.attr('href'));
    const displayName = readText(link.find('span[aria-hidden="true"]').first().text()) ?? readText(link.text());
    if (!displayName || !canonicalUrl) return;
    hits.push({
      displayName,
      canonicalUrl,
      description: joinText([
        readText(card.find('.entity-result__primary-subtitle').first().text()),
        readText(card.find('.entity-result__summary').first().text()),
      ]),
      location: readText(card.find('.entity-result__secondary-subtitle').first().text()),
      stage: 'dom-fallback',
    });
  });
  return hits;
};

const uniqueByUrl = (hits: LinkedInHit[]): LinkedInHit[] => {
  const seen = new Set<string>();
  return hits.filter((hit) => {
    if (seen.has(hit.canonicalUrl)) return false;
    seen.add(hit.canonicalUrl);
    return true;
  });
};

export const parseLinkedInResults = (html: string): LinkedInHit[] => {
  const embedded = uniqueByUrl(fromEmbeddedJson(html));
  if (embedded.length > 0) return embedded;

  logFallback(PARSER_META, 'no embedded search results, reading result cards');
  return uniqueByUrl(fromDom(html));
};

export const buildLinkedInSearchUrl = (params: SearchParams): string => {
  const query = new URLSearchParams(Object.entries(params).map(([key, value]) => [key, String(value)]));
  return `${LINKEDIN_SEARCH_URL}?${query.toString()}`;
};

export interface LinkedInSettings extends CollectorSettings {
  sessionCookie?: string;
  proxy?: string;
}

export class LinkedInCollector extends GridCollector {
  readonly name: SourceName = 'linkedin';

  constructor(
    policy: IndustryPolicy,
    private readonly linkedin: LinkedInSettings,
    private readonly fetchPage: PageFetcher = fetchPageHtml,
  ) {
    super(policy, { ...linkedin, jitterMs: linkedin.jitterMs ?? 2000 });
  }

  available(): boolean {
    return Boolean(this.linkedin.sessionCookie);
  }

  private cookieHeader(): string {
    const cookie = this.linkedin.sessionCookie?.trim() ?? '';
    return cookie.includes('=') ? cookie : `li_at=${cookie}`;
  }

  protected async fetchPair({ keyword, city }: SearchPair): Promise<LeadCandidate[]> {
    const params = this.policy.buildSearchParams(keyword, city).linkedin;
    const html = await this.fetchPage(
      { url: buildLinkedInSearchUrl(params), headers: { cookie: this.cookieHeader() } },
      { timeoutMs: this.linkedin.timeoutMs, proxy: this.linkedin.proxy },
    );
    const searchTerm = String(params.keywords ?? `${keyword} ${city}`);
    return parseLinkedInResults(html).map((hit) =>
      buildCandidate(this.name, this.policy, searchTerm, {
        displayName: hit.displayName,
        canonicalUrl: hit.canonicalUrl,
        description: hit.description,
        location: hit.location,
        extractionMethod: `linkedin:${hit.stage}`,
      }),
    );
  }
}
