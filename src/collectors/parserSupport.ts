import { load } from 'cheerio';
import { log } from '../utils/logger';
import { isRecord } from '../utils/records';

export type ParserMeta = {
  source: string;
  parserVersion: string;
  lastUpdated: string;
};

export const parseJsonCandidate = (candidate: string): unknown | null => {
  const trimmed = candidate.trim();
  if (!trimmed || (!trimmed.startsWith('{') && !trimmed.startsWith('['))) return null;
  try {
    return JSON.parse(trimmed);
  } catch {
    return null;
  }
};

const HYDRATION_PATTERNS = [
  /window\.__INITIAL_STATE__\s*=\s*({[\s\S]*?});/g,
  /window\.__APOLLO_STATE__\s*=\s*({[\s\S]*?});/g,
  /window\.__PRELOADED_STATE__\s*=\s*({[\s\S]*?});/g,
];

// LinkedIn ships its search payload inside hidden <code> blocks.
export const extractEmbeddedJsonBlobs = (html: string): unknown[] => {
  const $ = load(html);
  const blobs: unknown[] = [];
  $('script[type="application/json"], script#__NEXT_DATA__, code[id^="bpr-guid"]').each((_, el) => {
    const parsed = parseJsonCandidate($(el).text());
    if (parsed !== null) blobs.push(parsed);
  });

  for (const pattern of HYDRATION_PATTERNS) {
    for (const match of html.matchAll(pattern)) {
      const parsed = parseJsonCandidate(match[1]);
      if (parsed !== null) blobs.push(parsed);
    }
  }

  return blobs;
};

export const visitObjects = (value: unknown, visitor: (node: Record<string, unknown>) => void): void => {
  const seen = new Set<unknown>();
  const walk = (node: unknown): void => {
    if (!node || typeof node !== 'object' || seen.has(node)) return;
    seen.add(node);

    if (Array.isArray(node)) {
      for (const item of node) walk(item);
      return;
    }
    if (!isRecord(node)) return;

    visitor(node);
    for (const child of Object.values(node)) {
      walk(child);
    }
  };

  walk(value);
};

export const logFallback = (meta: ParserMeta, message: string): void => {
  log('WARN', `[${meta.source}] parser fallback`, {
    parserVersion: meta.parserVersion,
    lastUpdated: meta.lastUpdated,
    message,
  });
};
