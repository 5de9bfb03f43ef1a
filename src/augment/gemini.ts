import { AxiosInstance } from 'axios';
import { GeminiConfig } from '../config';
import { DraftContext } from '../industries/base';
import { createHttpClient } from '../utils/httpClient';
import { isRecord } from '../utils/records';
import { buildOutreachPrompt, TextAugmenter } from './textAugmenter';

export const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

// Concatenated text parts of the first candidate, or '' when there is none.
export const extractCandidateText = (payload: unknown): string => {
  if (!isRecord(payload) || !Array.isArray(payload.candidates)) return '';
  const [first] = payload.candidates;
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) return '';
  return first.content.parts
    .map((part) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .join('')
    .trim();
};

export class GeminiAugmenter implements TextAugmenter {
  readonly name: string;

  private readonly client: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs: number,
    client?: AxiosInstance,
  ) {
    this.name = `gemini:${model}`;
    this.client = client ?? createHttpClient(undefined, timeoutMs);
  }

  async draft(context: DraftContext): Promise<string> {
    const { data } = await this.client.post<unknown>(
      `${GEMINI_API_BASE}/models/${encodeURIComponent(this.model)}:generateContent`,
      {
        contents: [{ role: 'user', parts: [{ text: buildOutreachPrompt(context) }] }],
        generationConfig: { temperature: 0.7, maxOutputTokens: 512 },
      },
      { headers: { 'x-goog-api-key': this.apiKey }, timeout: this.timeoutMs },
    );
    const text = extractCandidateText(data);
    if (!text) {
      throw new Error(`${this.name} returned an empty draft`);
    }
    return text;
  }
}

export const createTextAugmenter = (config: GeminiConfig, client?: AxiosInstance): TextAugmenter | null =>
  config.apiKey ? new GeminiAugmenter(config.apiKey, config.model, config.timeoutMs, client) : null;
