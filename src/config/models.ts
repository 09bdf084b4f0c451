/**
 * Model Configuration
 *
 * Defines the LLM model, temperature, and token budgets used for
 * ticker extraction. The model id can be overridden via EXTRACTION_MODEL.
 *
 * @module config/models
 */

/**
 * Default Gemini model for transcript extraction
 */
export const DEFAULT_EXTRACTION_MODEL = 'gemini-2.0-flash';

/**
 * Model configuration for a specific task
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Temperature setting (0.0 - 1.0) */
  temperature: number;
  /** Maximum transcript characters embedded in a prompt */
  maxTranscriptChars: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
  /** Timeout for a single completion call */
  timeoutMs: number;
}

const EXTRACTION_DEFAULTS: Omit<ModelConfig, 'modelId'> = {
  temperature: 0.1,
  maxTranscriptChars: 60000,
  maxOutputTokens: 1024,
  timeoutMs: 30000,
};

/**
 * Get the extraction model configuration for a model id.
 *
 * @param modelId - Model identifier, usually `config.models.extraction`
 */
export function getExtractionModelConfig(
  modelId: string = DEFAULT_EXTRACTION_MODEL
): ModelConfig {
  return { ...EXTRACTION_DEFAULTS, modelId };
}
