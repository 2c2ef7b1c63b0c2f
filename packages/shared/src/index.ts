export { StructuredOutputError } from './errors/structured-output-error';
export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
} from './utils/concurrent-pool';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallBaseConfig,
  type LLMCallConfig,
  type LLMCallResult,
  type LLMTextCallConfig,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  type TokenUsage,
} from './utils/llm-token-usage-aggregator';
export { type ProviderType, detectProvider } from './utils/provider-detector';
