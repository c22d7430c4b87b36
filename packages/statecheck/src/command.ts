/**
 * Weighted, state-conditioned choice of the next command.
 */

import { Seed } from './data/seed.js';
import { Size } from './data/size.js';
import { GenerationError } from './errors.js';
import { cumulative, pickIndex, weightProblem } from './gen/weighted.js';
import type { WeightedCommand } from './model.js';
import { TreeShrinkable, type Shrinkable } from './shrinkable.js';

/**
 * Running totals of the weights, after checking that every weight is a
 * positive integer. `[[1, a], [3, b]]` gives `[1, 4]`.
 */
export function cumulativeWeights<C>(
  choices: ReadonlyArray<WeightedCommand<C>>
): number[] {
  const weights = choices.map(([weight]) => weight);
  const problem = weightProblem(weights);
  if (problem !== null) {
    throw new GenerationError(`Cannot choose a command: ${problem}`);
  }
  return cumulative(weights);
}

/**
 * Pick one entry with probability proportional to its weight and generate a
 * shrinkable command from it. Returns the seed for the next draw.
 */
export function chooseCommand<C>(
  choices: ReadonlyArray<WeightedCommand<C>>,
  size: Size,
  seed: Seed
): [Shrinkable<C>, Seed] {
  const totals = cumulativeWeights(choices);
  const [pickSeed, rest] = seed.split();
  const [valueSeed, nextSeed] = rest.split();
  const [index] = pickIndex(totals, pickSeed);

  let element: Shrinkable<C>;
  try {
    element = TreeShrinkable.fromGen(choices[index][1], size, valueSeed);
  } catch (error) {
    throw new GenerationError(
      `Command generator ${index} failed: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  return [element, nextSeed];
}
