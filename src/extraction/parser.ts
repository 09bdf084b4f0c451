/**
 * Extraction Response Parsing
 *
 * Turns raw model output into a ticker list. Models often wrap the JSON
 * in markdown fences or surround it with prose; both are tolerated.
 *
 * @module extraction/parser
 */

import { describeError } from '../pipeline/types.js';
import { ExtractionResponseSchema } from '../schemas/index.js';

export type ParseResult =
  | { ok: true; tickers: string[] }
  | { ok: false; reason: string };

/**
 * Remove a markdown code fence (```json ... ``` or ``` ... ```) that wraps
 * the whole reply. Fences inside prose are left alone; text without a
 * surrounding fence is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * Find the first balanced `{...}` substring.
 *
 * Braces inside JSON string literals do not count towards the depth.
 * Returns null when there is no opening brace or it is never closed.
 */
export function findJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.substring(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Parse a model response into tickers.
 *
 * A missing or non-array `recommended_stocks` yields an empty list.
 * Non-string entries are dropped; the rest are trimmed and kept verbatim
 * (no case normalization).
 */
export function parseRecommendationResponse(responseText: string): ParseResult {
  const jsonText = findJsonObject(stripCodeFences(responseText));
  if (jsonText === null) {
    return { ok: false, reason: 'No JSON object found in response' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (error) {
    return { ok: false, reason: `Invalid JSON: ${describeError(error)}` };
  }

  const validated = ExtractionResponseSchema.safeParse(parsed);
  if (!validated.success) {
    return { ok: false, reason: 'Response is not a JSON object' };
  }

  const stocks = validated.data.recommended_stocks;
  if (!Array.isArray(stocks)) {
    return { ok: true, tickers: [] };
  }

  const tickers: string[] = [];
  for (const entry of stocks) {
    if (typeof entry !== 'string') {
      continue;
    }
    const ticker = entry.trim();
    if (ticker) {
      tickers.push(ticker);
    }
  }

  return { ok: true, tickers };
}
