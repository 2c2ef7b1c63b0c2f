export {
  InMemoryRefinementCache,
  createRefinementCacheKey,
} from './refinement-cache';
export type { RefinementCache } from './refinement-cache';
export { RefinementInvoker, estimateTokens } from './refinement-invoker';
export type { RefinementInvokerOptions } from './refinement-invoker';
