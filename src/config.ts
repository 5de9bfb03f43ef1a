import { CollectorConfig } from './core/collectorFactory';
import { DEFAULT_LIMITS, RequestLimits } from './core/searchRequest';
import { DEFAULT_INDUSTRY } from './industries/registry';

type Env = Record<string, string | undefined>;

export interface GeminiConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export interface AppConfig extends CollectorConfig {
  port: number;
  apiKey?: string;
  industry: string;
  defaultCities: string[];
  gemini: GeminiConfig;
  databaseUrl?: string;
  sessionArchiveDir: string;
  draftSampleSize: number;
  limits: RequestLimits;
}

export const parseIntEnv = (env: Env, name: string, fallback: number, min = 0): number => {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
};

export const parseStringEnv = (env: Env, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

export const parseCsvEnv = (env: Env, name: string, fallback: string[]): string[] => {
  const raw = parseStringEnv(env, name);
  if (!raw) return [...fallback];
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : [...fallback];
};

export const DEFAULT_CITIES = ['madrid', 'barcelona', 'valencia'];

export const loadConfig = (env: Env = process.env): AppConfig => ({
  port: parseIntEnv(env, 'PORT', 3000, 1),
  apiKey: parseStringEnv(env, 'API_KEY'),
  industry: parseStringEnv(env, 'INDUSTRY') ?? DEFAULT_INDUSTRY,
  defaultCities: parseCsvEnv(env, 'DEFAULT_CITIES', DEFAULT_CITIES),
  serpApi: {
    apiKey: parseStringEnv(env, 'SERPAPI_KEY'),
    rateLimitMs: parseIntEnv(env, 'SERPAPI_RATE_LIMIT_MS', 2000),
  },
  linkedin: {
    sessionCookie: parseStringEnv(env, 'LINKEDIN_SESSION_COOKIE'),
    rateLimitMs: parseIntEnv(env, 'LINKEDIN_RATE_LIMIT_MS', 4000),
    proxy: parseStringEnv(env, 'PROXY_URL'),
  },
  collectors: {
    timeoutMs: parseIntEnv(env, 'COLLECTOR_TIMEOUT_MS', 20000, 1),
    resultCap: parseIntEnv(env, 'COLLECTOR_RESULT_CAP', 5, 1),
  },
  gemini: {
    apiKey: parseStringEnv(env, 'GEMINI_API_KEY'),
    model: parseStringEnv(env, 'GEMINI_MODEL') ?? 'gemini-1.5-flash',
    timeoutMs: parseIntEnv(env, 'GEMINI_TIMEOUT_MS', 30000, 1),
  },
  databaseUrl: parseStringEnv(env, 'DATABASE_URL'),
  sessionArchiveDir: parseStringEnv(env, 'SESSION_ARCHIVE_DIR') ?? 'sessions',
  draftSampleSize: parseIntEnv(env, 'DRAFT_SAMPLE_SIZE', 5),
  limits: {
    maxSearches: parseIntEnv(env, 'MAX_SEARCHES', DEFAULT_LIMITS.maxSearches, 1),
    maxCities: parseIntEnv(env, 'MAX_CITIES', DEFAULT_LIMITS.maxCities, 1),
    maxKeywords: parseIntEnv(env, 'MAX_KEYWORDS', DEFAULT_LIMITS.maxKeywords, 1),
  },
});
