import { TextAugmenter } from '../../augment/textAugmenter';
import { planSearchPairs, SearchOptions, SearchPair, SourceCollector, SourceUsage } from '../../collectors/common';
import { DraftContext } from '../../industries/base';
import { SessionArchive } from '../sessionArchive';
import { LeadCandidate, SessionReport, SourceName } from '../types';

export interface Seed {
  displayName: string;
  description?: string;
  canonicalUrl?: string;
}

export const candidate = (source: SourceName, seed: Seed, pair: SearchPair = { city: 'madrid', keyword: 'botox' }): LeadCandidate => ({
  displayName: seed.displayName,
  canonicalUrl: seed.canonicalUrl,
  description: seed.description,
  location: pair.city,
  sourceName: source,
  searchTermUsed: `${pair.keyword} ${pair.city}`,
  industryName: 'Medical Aesthetics',
  extractionMethod: `${source}:fake`,
  foundAt: new Date().toISOString(),
});

export type Responder = (pair: SearchPair, index: number) => Seed[] | Promise<Seed[]>;

export class FakeCollector implements SourceCollector {
  readonly searches: SearchPair[] = [];

  constructor(
    readonly name: SourceName,
    private readonly respond: Responder,
    private readonly isAvailable: () => boolean = () => true,
    private readonly usageReport: SourceUsage | null = null,
  ) {}

  available(): boolean {
    return this.isAvailable();
  }

  async search(cities: string[], keywords: string[], budget: number, options: SearchOptions = {}): Promise<LeadCandidate[]> {
    const pairs = planSearchPairs(cities, keywords, budget);
    const found: LeadCandidate[] = [];
    for (const [index, pair] of pairs.entries()) {
      if (options.shouldStop?.()) break;
      this.searches.push(pair);
      const seeds = await this.respond(pair, index);
      found.push(...seeds.map((seed) => candidate(this.name, seed, pair)));
      options.onSearch?.({ ...pair, completed: index + 1, planned: pairs.length, found: seeds.length });
    }
    return found;
  }

  async usage(): Promise<SourceUsage | null> {
    return this.usageReport;
  }
}

export class FakeAugmenter implements TextAugmenter {
  readonly name = 'fake-writer';
  readonly contexts: DraftContext[] = [];

  constructor(private readonly failFor: string[] = []) {}

  async draft(context: DraftContext): Promise<string> {
    this.contexts.push(context);
    if (this.failFor.includes(context.leadName)) throw new Error('quota exceeded');
    return `Hola ${context.leadName}`;
  }
}

export class FakeArchive implements SessionArchive {
  readonly written: SessionReport[] = [];

  constructor(private readonly failure?: Error) {}

  async write(report: SessionReport): Promise<string> {
    if (this.failure) throw this.failure;
    this.written.push(report);
    return `sessions/${report.sessionId}.json`;
  }
}

export const deferred = () => {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
};

export const sampleReport = (overrides: Partial<SessionReport> = {}): SessionReport => ({
  sessionId: 'a1b2c3d4-0000-4000-8000-000000000000',
  industry: 'Medical Aesthetics',
  industryKey: 'medical_aesthetics',
  outcome: 'completed',
  request: { cities: ['madrid'], keywords: ['botox'], maxSearches: 1, sources: { serpapi: true, linkedin: true } },
  startedAt: '2026-03-04T09:05:00.000Z',
  finishedAt: '2026-03-04T09:07:30.000Z',
  stats: {
    searchesPerformed: 1,
    leadsFound: 1,
    leadsSaved: 1,
    messagesDrafted: 0,
    executionTimeSeconds: 150,
    industry: 'Medical Aesthetics',
  },
  phases: [],
  leads: [],
  drafts: [],
  ...overrides,
});
