import { Seed } from '../data/seed.js';

/**
 * Describe what is wrong with a weight table, or null when every weight is
 * a positive integer, there is at least one, and their total is a safe
 * integer.
 */
export function weightProblem(weights: readonly number[]): string | null {
  if (weights.length === 0) {
    return 'no weighted choices are available';
  }
  let total = 0;
  for (let i = 0; i < weights.length; i++) {
    const weight = weights[i];
    if (!Number.isSafeInteger(weight) || weight <= 0) {
      return `weight at position ${i} is ${weight}; weights must be positive integers`;
    }
    total += weight;
    if (total > Number.MAX_SAFE_INTEGER) {
      return `weights add up to more than ${Number.MAX_SAFE_INTEGER}`;
    }
  }
  return null;
}

/**
 * Running totals of a validated weight table: `[1, 3]` becomes `[1, 4]`.
 */
export function cumulative(weights: readonly number[]): number[] {
  const totals: number[] = [];
  let total = 0;
  for (const weight of weights) {
    total += weight;
    totals.push(total);
  }
  return totals;
}

/**
 * Draw an index with probability proportional to its weight, given the
 * running totals of the weights.
 */
export function pickIndex(totals: readonly number[], seed: Seed): [number, Seed] {
  const [target, next] = seed.nextBounded(totals[totals.length - 1]);

  // First running total strictly above the target.
  let low = 0;
  let high = totals.length - 1;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (totals[mid] > target) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return [low, next];
}
