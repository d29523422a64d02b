import { GoogleGenAI } from '@google/genai';
import { isTransientError } from '../errors.js';
import { withRetry } from '../retry.js';
import type { SummaryResponse, VideoItem } from '../../types/index.js';
import { createSystemPrompt, createUserPrompt } from './prompts.js';

export interface GeminiClientConfig {
  apiKey: string;
  model?: string;
  maxAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  onRetry?: (attempt: number, maxAttempts: number, error: Error, delayMs: number) => void;
}

export class GeminiClient {
  private client: GoogleGenAI;
  private modelName: string;
  private maxAttempts: number;
  private retryDelayMs: number;
  private onRetry?: GeminiClientConfig['onRetry'];

  constructor(config: GeminiClientConfig) {
    this.client = new GoogleGenAI({
      apiKey: config.apiKey,
      httpOptions: { timeout: config.timeoutMs ?? 60_000 },
    });
    this.modelName = config.model || 'gemini-2.5-flash';
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 5000;
    this.onRetry = config.onRetry;
  }

  get model(): string {
    return this.modelName;
  }

  async summarizeVideo(video: VideoItem, locale: string): Promise<SummaryResponse> {
    const systemPrompt = createSystemPrompt();
    const userPrompt = createUserPrompt(video, locale);

    const text = await withRetry(
      async () => {
        const response = await this.client.models.generateContent({
          model: this.modelName,
          config: {
            systemInstruction: systemPrompt,
            responseMimeType: 'application/json',
            temperature: 0.3,
            maxOutputTokens: 2048,
          },
          contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
        });

        const responseText = response.text;
        if (!responseText) {
          throw new Error('No text content in Gemini response');
        }
        return responseText;
      },
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryDelayMs,
        isRetryable: isTransientError,
        onRetry: this.onRetry,
      }
    );

    return this.parseResponse(text);
  }

  parseResponse(text: string): SummaryResponse {
    // Clean up the response - remove markdown code blocks if present
    let cleanText = text.trim();
    if (cleanText.startsWith('```json')) {
      cleanText = cleanText.slice(7);
    } else if (cleanText.startsWith('```')) {
      cleanText = cleanText.slice(3);
    }
    if (cleanText.endsWith('```')) {
      cleanText = cleanText.slice(0, -3);
    }
    cleanText = cleanText.trim();

    // Check for HTML response (indicates API error)
    if (cleanText.startsWith('<!DOCTYPE') || cleanText.startsWith('<html')) {
      throw new Error('Received HTML instead of JSON - possible API authentication or permission error');
    }

    // The model ignored the JSON instruction and answered in prose
    if (!cleanText.startsWith('{')) {
      if (!cleanText) throw new Error('Empty Gemini response');
      return { translatedTitle: '', summary: cleanText };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.fixUnescapedQuotes(cleanText));
    } catch {
      throw new Error(`Failed to parse Gemini response: ${cleanText.slice(0, 200)}`);
    }

    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('Failed to parse Gemini response: not a JSON object');
    }

    const summary = 'summary' in parsed && typeof parsed.summary === 'string' ? parsed.summary.trim() : '';
    const translatedTitle =
      'translatedTitle' in parsed && typeof parsed.translatedTitle === 'string' ? parsed.translatedTitle.trim() : '';

    if (!summary) {
      throw new Error('Gemini response has no summary');
    }

    return { translatedTitle, summary: summary.replace(/\\n/g, '\n') };
  }

  /**
   * Fix unescaped quotes inside JSON string values.
   * Example: {"key": "value with "unescaped" quotes"} -> {"key": "value with \"unescaped\" quotes"}
   */
  private fixUnescapedQuotes(json: string): string {
    const result: string[] = [];
    let inString = false;

    for (let i = 0; i < json.length; i++) {
      const char = json[i];
      const prevChar = i > 0 ? json[i - 1] : '';

      if (char !== '"' || prevChar === '\\') {
        result.push(char);
        continue;
      }

      if (!inString) {
        inString = true;
        result.push(char);
        continue;
      }

      // A closing quote is followed by a structural character
      const afterQuote = json.slice(i + 1).trimStart();
      const isEndOfString =
        afterQuote.startsWith(',') ||
        afterQuote.startsWith('}') ||
        afterQuote.startsWith(']') ||
        afterQuote.startsWith(':') ||
        afterQuote.length === 0;

      if (isEndOfString) {
        inString = false;
        result.push(char);
      } else {
        result.push('\\"');
      }
    }

    return result.join('');
  }
}
