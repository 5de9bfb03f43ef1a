import { SourceUnavailableError } from '../core/errors';
import { LeadCandidate, SourceName } from '../core/types';
import { IndustryPolicy } from '../industries/base';
import { log } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';
import { withTimeout } from '../utils/timeout';
import { planSearchPairs, SearchOptions, SearchPair, SourceCollector } from './common';

export interface CollectorSettings {
  rateLimitMs: number;
  jitterMs?: number;
  timeoutMs: number;
  resultCap: number;
}

/**
 * Walks the keyword x city grid one pair at a time. A failing pair is logged
 * and contributes nothing; the remaining pairs still run.
 */
export abstract class GridCollector implements SourceCollector {
  abstract readonly name: SourceName;

  private readonly limiter: RateLimiter;

  constructor(
    protected readonly policy: IndustryPolicy,
    protected readonly settings: CollectorSettings,
  ) {
    this.limiter = new RateLimiter(settings.rateLimitMs, settings.jitterMs ?? 0);
  }

  abstract available(): boolean;

  protected abstract fetchPair(pair: SearchPair): Promise<LeadCandidate[]>;

  async search(cities: string[], keywords: string[], budget: number, options: SearchOptions = {}): Promise<LeadCandidate[]> {
    if (!this.available()) return [];

    const pairs = planSearchPairs(cities, keywords, budget);
    const collected: LeadCandidate[] = [];
    for (let i = 0; i < pairs.length; i += 1) {
      if (options.shouldStop?.()) {
        log('INFO', `[${this.name}] stop requested, skipping ${pairs.length - i} remaining searches`);
        break;
      }
      const pair = pairs[i];
      await this.limiter.wait();
      const found = await this.attempt(pair);
      collected.push(...found);
      options.onSearch?.({ ...pair, completed: i + 1, planned: pairs.length, found: found.length });
    }
    return collected;
  }

  private async attempt(pair: SearchPair): Promise<LeadCandidate[]> {
    try {
      const results = await withTimeout(
        this.fetchPair(pair),
        this.settings.timeoutMs,
        `${this.name} search "${pair.keyword}" in ${pair.city}`,
      );
      return results.slice(0, this.settings.resultCap);
    } catch (error) {
      const failure = error instanceof SourceUnavailableError ? error : new SourceUnavailableError(this.name, error);
      log('WARN', failure.message, { keyword: pair.keyword, city: pair.city });
      return [];
    }
  }
}
