export { logger, type Logger } from './logger.js';
export { getTracer, traceIdOf, withSpan } from './tracing.js';
export { CircuitBreaker, CircuitBreakerOpenError, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
export { CompletionError, CompletionTimeoutError, MalformedCompletionError, errorMessage } from './errors.js';
export { deadline, raceAbort, type Deadline } from './abort.js';
export * from './model-types.js';
export * from './stream-events.js';
export { encodeEvent, decodeRecord, decodeEventStream, SseDecoder, openEventStream, writeEventStream } from './sse.js';
export { loadModelConfig, PROVIDERS, type ModelConfig, type ModelProvider } from './model-config.js';
export {
  ProviderCompletionClient,
  createCompletionClient,
  isRecord,
  parseToolArguments,
  toAnthropicMessages,
  toOpenAIMessages,
  type ParsedToolArguments,
  type ProviderAdapter,
} from './completion-client.js';
