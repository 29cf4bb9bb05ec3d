/**
 * Tokenizer Port
 *
 * Counts model tokens for a piece of text. Encoders are resolved per model
 * and memoized; any encoding failure falls back to a character estimate.
 */

import { encode as encodeCl100k } from 'gpt-tokenizer/encoding/cl100k_base';
import { encode as encodeO200k } from 'gpt-tokenizer/encoding/o200k_base';

/**
 * Encoding families supported by the default resolver
 */
export type EncodingName = 'cl100k_base' | 'o200k_base';

/**
 * Turns text into token ids
 */
export type Encoder = (text: string) => number[];

/**
 * Token counting capability injected into the preprocessing pipeline
 */
export type TokenCounter = (text: string, model: string) => number;

/**
 * Options for building a token counter
 */
export interface TokenCounterOptions {
  /** Resolve an encoder for a normalized model name (default: gpt-tokenizer) */
  resolveEncoder?: (modelName: string) => Encoder;
  /** Called when encoding fails and the estimate is used instead */
  onFallback?: (modelName: string, error: unknown) => void;
}

const ENCODERS: Record<EncodingName, Encoder> = {
  cl100k_base: encodeCl100k,
  o200k_base: encodeO200k,
};

/**
 * Model name prefixes that use the o200k encoding
 */
const O200K_MODEL_PREFIXES = ['gpt-4o', 'gpt-4.1', 'gpt-4.5', 'gpt-5', 'chatgpt-4o', 'o1', 'o3', 'o4'];

/**
 * Strip a `provider:` prefix and lower-case the model name. Only the first
 * segment is treated as the provider, so `ollama:llama3:8b` keeps its tag.
 *
 * @example
 * normalizeModelName('anthropic:claude-3-haiku-latest') // 'claude-3-haiku-latest'
 */
export function normalizeModelName(model: string): string {
  const colon = model.indexOf(':');
  const name = colon === -1 ? model : model.slice(colon + 1);
  return name.trim().toLowerCase();
}

/**
 * Pick the encoding family for a normalized model name.
 * Claude and unknown models use cl100k_base.
 */
export function resolveEncodingName(modelName: string): EncodingName {
  if (modelName.includes('claude')) {
    return 'cl100k_base';
  }
  return O200K_MODEL_PREFIXES.some((prefix) => modelName.startsWith(prefix))
    ? 'o200k_base'
    : 'cl100k_base';
}

function defaultResolveEncoder(modelName: string): Encoder {
  return ENCODERS[resolveEncodingName(modelName)];
}

/**
 * Character-based estimate used when no encoder is available
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * Create a token counter with its own encoder cache.
 *
 * The cache is keyed by normalized model name and filled lazily. Two callers
 * resolving the same model store the same encoder, so the last write wins.
 */
export function createTokenCounter(options: TokenCounterOptions = {}): TokenCounter {
  const resolveEncoder = options.resolveEncoder ?? defaultResolveEncoder;
  const cache = new Map<string, Encoder>();
  const warned = new Set<string>();

  const onFallback =
    options.onFallback ??
    ((modelName: string, error: unknown) => {
      if (warned.has(modelName)) {
        return;
      }
      warned.add(modelName);
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Tokenizer] Falling back to character estimate for "${modelName}": ${message}`);
    });

  return (text: string, model: string): number => {
    if (!text) {
      return 0;
    }

    const modelName = normalizeModelName(model);

    try {
      let encoder = cache.get(modelName);
      if (!encoder) {
        encoder = resolveEncoder(modelName);
        cache.set(modelName, encoder);
      }
      return encoder(text).length;
    } catch (error) {
      onFallback(modelName, error);
      return estimateTokens(text);
    }
  };
}

/**
 * Process-wide token counter backed by gpt-tokenizer
 */
export const countTokens: TokenCounter = createTokenCounter();
