/**
 * rootcause - confidence-gated incident investigation harness
 *
 * Main entry point for the rootcause library.
 */

export * from './agent/index.js';

export { loadConfig, parseConfig, type RootcauseConfig } from './core/config.js';
export {
  createLlmClient,
  AnthropicClient,
  OpenAiClient,
  LocalClient,
  FallbackLlmClient,
  TimeoutLlmClient,
  isRateLimitError,
  type LlmClient,
  type ChatMessage,
} from './core/llm.js';
export { Logger, type LogLevel } from './core/logger.js';

// Version
export const VERSION = '0.1.0';
