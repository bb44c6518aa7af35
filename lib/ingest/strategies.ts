/**
 * Ordered fallback strategies
 *
 * Segmentation and answer extraction both try a list of heuristics in order
 * and stop at the first one that produces something. Each strategy is a pure
 * function so it can be tested on its own.
 */

export interface Strategy<T, N extends string = string> {
  name: N;
  apply: (text: string) => T | null;
}

export interface StrategyMatch<T, N extends string = string> {
  strategy: N;
  value: T;
}

export function firstMatch<T, N extends string>(
  strategies: readonly Strategy<T, N>[],
  text: string,
): StrategyMatch<T, N> | null {
  for (const strategy of strategies) {
    const value = strategy.apply(text);
    if (value !== null) {
      return { strategy: strategy.name, value };
    }
  }
  return null;
}
