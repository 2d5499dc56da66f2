export { TraversalEngine, TraversalStateError } from './engine.js';
export type { TraversalOptions, TraversalState } from './engine.js';
export { Frontier } from './frontier.js';
export { VisitedSet, buildWalkResult } from './base.js';
export {
  resolveStrategy,
  insertionPolicyFor,
  UnknownStrategyError,
  STRATEGIES,
  DEFAULT_STRATEGY,
} from './strategy.js';
export type { InsertionPolicy } from './strategy.js';
