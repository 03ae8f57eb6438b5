export { AgentLoop, COMPLETED_FALLBACK_RESPONSE, NO_RESPONSE_FALLBACK } from './agent-loop.js';
export { ToolCallNormalizer, parseToolArguments } from './tool-call-normalizer.js';
export { deduplicateContent, normalizeBlock, DEFAULT_DEDUPLICATION_OPTIONS } from './content-deduplicator.js';
export { DEFAULT_SYSTEM_PROMPT } from './prompts.js';
export type {
  AgentLoopOptions,
  AgentLoopResult,
  AgentTermination,
  DeduplicationOptions,
  ResponseSource,
} from './types.js';
