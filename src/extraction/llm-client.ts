/**
 * Completion Model Client
 *
 * One-shot text completion against Google Generative AI. The extractor
 * depends only on the {@link CompletionModel} interface so tests can
 * substitute a canned model.
 *
 * @module extraction/llm-client
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { ModelConfig } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Token usage for one call
 */
export interface TokenUsage {
  input: number;
  output: number;
}

/**
 * Result from a completion call
 */
export interface CompletionResult {
  /** Raw text response from the model */
  text: string;
  /** Model ID that was used */
  modelId: string;
  tokenUsage: TokenUsage;
}

/**
 * A language model configured once with its system instruction.
 */
export interface CompletionModel {
  readonly modelId: string;
  complete(prompt: string): Promise<CompletionResult>;
}

// ============================================================================
// Timeout
// ============================================================================

/**
 * Execute a function with timeout using Promise.race pattern
 *
 * The Google Generative AI SDK does not support AbortSignal, so the
 * underlying request keeps running after a timeout; only the caller stops waiting.
 *
 * @throws Error if `timeoutMs` elapses first
 */
export async function callWithTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(`LLM call timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// ============================================================================
// Gemini
// ============================================================================

/**
 * Gemini-backed completion model.
 *
 * @example
 * ```typescript
 * const model = new GeminiCompletionModel(apiKey, getExtractionModelConfig(), instruction);
 * const { text, tokenUsage } = await model.complete(prompt);
 * ```
 */
export class GeminiCompletionModel implements CompletionModel {
  readonly modelId: string;
  private readonly model: GenerativeModel;
  private readonly timeoutMs: number;

  constructor(apiKey: string, config: ModelConfig, systemInstruction: string) {
    this.modelId = config.modelId;
    this.timeoutMs = config.timeoutMs;

    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({
      model: config.modelId,
      systemInstruction,
      generationConfig: {
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        responseMimeType: 'application/json',
      },
    });
  }

  async complete(prompt: string): Promise<CompletionResult> {
    const result = await callWithTimeout(() => this.model.generateContent(prompt), this.timeoutMs);

    const text = result.response.text();
    // Fall back to total minus prompt when the candidate count is missing
    const usageMetadata = result.response.usageMetadata;
    const input = usageMetadata?.promptTokenCount ?? 0;
    const output =
      usageMetadata?.candidatesTokenCount ??
      (usageMetadata ? Math.max(0, usageMetadata.totalTokenCount - input) : 0);

    return { text, modelId: this.modelId, tokenUsage: { input, output } };
  }
}
