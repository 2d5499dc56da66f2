import type { Strategy } from '../types.js';
import type { Frontier } from './frontier.js';

/**
 * The canonical strategy names.
 */
export const STRATEGIES = ['depth-first', 'breadth-first'] as const satisfies readonly Strategy[];

/**
 * Used when no strategy name is given.
 */
export const DEFAULT_STRATEGY: Strategy = 'breadth-first';

const STRATEGY_NAMES: Record<string, Strategy> = {
  'depth-first': 'depth-first',
  dfs: 'depth-first',
  'breadth-first': 'breadth-first',
  bfs: 'breadth-first',
};

/**
 * Thrown when a strategy name matches none of the recognized values.
 */
export class UnknownStrategyError extends Error {
  readonly validStrategies: readonly Strategy[] = STRATEGIES;

  constructor(public readonly strategy: string) {
    super(
      `Unknown strategy "${strategy}". Valid strategies are: ${STRATEGIES.join(', ')}`,
    );
    this.name = 'UnknownStrategyError';
  }
}

/**
 * How a newly discovered URL enters the frontier.
 */
export type InsertionPolicy = (frontier: Frontier, url: string) => void;

const INSERTION_POLICIES: Record<Strategy, InsertionPolicy> = {
  'depth-first': (frontier, url) => frontier.pushDepthFirst(url),
  'breadth-first': (frontier, url) => frontier.pushBreadthFirst(url),
};

/**
 * Map a strategy name to a Strategy. Matching ignores case and surrounding
 * whitespace and accepts the short forms "dfs" and "bfs".
 *
 * @param name - Strategy name; the default strategy when omitted
 * @throws UnknownStrategyError if the name is not recognized
 */
export function resolveStrategy(name?: string): Strategy {
  if (name === undefined) {
    return DEFAULT_STRATEGY;
  }
  const key = name.trim().toLowerCase();
  if (!Object.hasOwn(STRATEGY_NAMES, key)) {
    throw new UnknownStrategyError(name);
  }
  return STRATEGY_NAMES[key];
}

export function insertionPolicyFor(strategy: Strategy): InsertionPolicy {
  return INSERTION_POLICIES[strategy];
}
