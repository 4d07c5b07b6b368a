/**
 * OpenAI extractor constants
 */

/**
 * Raw content beyond this many characters is not sent to the model
 */
export const OPENAI_MAX_CONTENT_CHARS = 12_000;

export const OPENAI_TEMPERATURE = 0.1;

export const OPENAI_MAX_OUTPUT_TOKENS = 2_000;

export const OPENAI_TIMEOUT_MS = 60_000;
