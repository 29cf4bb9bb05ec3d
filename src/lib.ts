/**
 * diff-trim library entry
 */

export * from './diff/index.js';
export {
  countTokens,
  createTokenCounter,
  estimateTokens,
  normalizeModelName,
  resolveEncodingName,
  type Encoder,
  type EncodingName,
  type TokenCounter,
  type TokenCounterOptions,
} from './tokenizer/index.js';
export * from './config/index.js';
export { runCli, type CliIO } from './cli/run.js';
export { parseCliArgs, type CliOptions } from './cli/args.js';
