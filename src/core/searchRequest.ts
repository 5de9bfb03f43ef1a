import { isRecord } from '../utils/records';
import { COLLECTOR_PRIORITY, isSupportedSource } from './collectorFactory';
import { RequestValidationError } from './errors';
import { SearchRequest, SourceName } from './types';

export interface RequestLimits {
  maxSearches: number;
  maxCities: number;
  maxKeywords: number;
}

export interface RequestDefaults {
  cities: string[];
  keywords: string[];
}

export const DEFAULT_LIMITS: RequestLimits = { maxSearches: 10, maxCities: 5, maxKeywords: 10 };

const DEFAULT_MAX_SEARCHES = 3;
const DEFAULT_KEYWORD_COUNT = 5;

const SUPPORTED_KEYS = new Set(['cities', 'keywords', 'maxSearches', 'sources']);

const uniqueTrimmed = (values: string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
};

const validateList = (value: unknown, key: string, fallback: string[], max: number): string[] => {
  let items: string[];
  if (value === undefined) {
    items = uniqueTrimmed(fallback).slice(0, max);
  } else if (typeof value === 'string') {
    items = uniqueTrimmed(value.split(','));
  } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    items = uniqueTrimmed(value);
  } else {
    throw new RequestValidationError(`${key} must be a comma separated string or an array of strings`);
  }

  if (items.length === 0) {
    throw new RequestValidationError(`${key} must name at least one value`);
  }
  if (items.length > max) {
    throw new RequestValidationError(`${key} accepts at most ${max} values`);
  }
  return items;
};

const validateBudget = (value: unknown, max: number): number => {
  if (value === undefined) return Math.min(DEFAULT_MAX_SEARCHES, max);
  const parsed = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new RequestValidationError(`maxSearches must be an integer between 1 and ${max}`);
  }
  return parsed;
};

const validateSources = (value: unknown): Record<SourceName, boolean> => {
  const sources: Record<SourceName, boolean> = { serpapi: true, linkedin: true };
  if (value === undefined) return sources;
  if (!isRecord(value)) {
    throw new RequestValidationError('sources must be an object of booleans');
  }
  for (const [name, enabled] of Object.entries(value)) {
    if (!isSupportedSource(name)) {
      throw new RequestValidationError(`sources.${name} is not a known source (expected ${COLLECTOR_PRIORITY.join(', ')})`);
    }
    if (typeof enabled !== 'boolean') {
      throw new RequestValidationError(`sources.${name} must be a boolean`);
    }
    sources[name] = enabled;
  }
  return sources;
};

export const normalizeSearchRequest = (
  raw: unknown,
  defaults: RequestDefaults,
  limits: RequestLimits = DEFAULT_LIMITS,
): SearchRequest => {
  const body = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(body)) {
    throw new RequestValidationError('search request must be a JSON object');
  }

  for (const key of Object.keys(body)) {
    if (!SUPPORTED_KEYS.has(key)) {
      throw new RequestValidationError(`${key} is not a supported search option`);
    }
  }

  return {
    cities: validateList(body.cities, 'cities', defaults.cities, limits.maxCities),
    keywords: validateList(
      body.keywords,
      'keywords',
      defaults.keywords.slice(0, DEFAULT_KEYWORD_COUNT),
      limits.maxKeywords,
    ),
    maxSearches: validateBudget(body.maxSearches, limits.maxSearches),
    sources: validateSources(body.sources),
  };
};
