import { SourceCollector } from '../collectors/common';
import { LinkedInCollector } from '../collectors/linkedin';
import { SerpApiCollector } from '../collectors/serpapi';
import { IndustryPolicy } from '../industries/base';
import { SourceName } from './types';

export interface CollectorConfig {
  serpApi: { apiKey?: string; rateLimitMs: number };
  linkedin: { sessionCookie?: string; rateLimitMs: number; proxy?: string };
  collectors: { timeoutMs: number; resultCap: number };
}

export type CollectorBinder = (policy: IndustryPolicy) => SourceCollector[];

type CollectorBuilder = (policy: IndustryPolicy, config: CollectorConfig) => SourceCollector;

// Phases run in this order.
export const COLLECTOR_PRIORITY: readonly SourceName[] = ['serpapi', 'linkedin'];

const builders: Record<SourceName, CollectorBuilder> = {
  serpapi: (policy, { serpApi, collectors }) =>
    new SerpApiCollector(policy, {
      apiKey: serpApi.apiKey,
      rateLimitMs: serpApi.rateLimitMs,
      timeoutMs: collectors.timeoutMs,
      resultCap: collectors.resultCap,
    }),
  linkedin: (policy, { linkedin, collectors }) =>
    new LinkedInCollector(policy, {
      sessionCookie: linkedin.sessionCookie,
      proxy: linkedin.proxy,
      rateLimitMs: linkedin.rateLimitMs,
      timeoutMs: collectors.timeoutMs,
      resultCap: collectors.resultCap,
    }),
};

export const isSupportedSource = (name: string): name is SourceName =>
  Object.prototype.hasOwnProperty.call(builders, name);

export const buildCollector = (name: string, policy: IndustryPolicy, config: CollectorConfig): SourceCollector => {
  const normalized = name.toLowerCase();
  if (!isSupportedSource(normalized)) {
    throw new Error(`Unsupported source: ${name}`);
  }
  return builders[normalized](policy, config);
};

export const createCollectorBinder =
  (config: CollectorConfig): CollectorBinder =>
  (policy) =>
    COLLECTOR_PRIORITY.map((name) => buildCollector(name, policy, config));
