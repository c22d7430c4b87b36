/**
 * Result types for stateful property runs.
 */

import { Seed } from './data/seed.js';
import { Size } from './data/size.js';
import type { GenerationError, RunError } from './errors.js';
import type { CommandSequence } from './sequence.js';

/**
 * Statistics collected during a run.
 */
export interface TestStats {
  /** Number of sequences that ran without failing. */
  readonly testsRun: number;
  /** Shrink steps that kept the failure and were accepted. */
  readonly shrinkSteps: number;
  /** Candidate sequences executed while shrinking. */
  readonly shrinkAttempts: number;
}

/**
 * A command sequence together with the error it failed with.
 */
export interface Failure<C, R> {
  readonly sequence: CommandSequence<C, R>;
  readonly error: RunError;
}

export type PlanResult<C, R> = PassResult | FailResult<C, R> | AbortedResult;

/**
 * Every generated sequence ran without failing.
 */
export interface PassResult {
  readonly type: 'pass';
  readonly stats: TestStats;
  /** Run seed; pass it to `Config.withSeed` to repeat the run. */
  readonly seed: number;
}

/**
 * A sequence failed; `counterexample` is the smallest failing sequence the
 * shrink search found.
 */
export interface FailResult<C, R> {
  readonly type: 'fail';
  readonly stats: TestStats;
  readonly seed: number;
  /** Zero-based number of the failing trial. */
  readonly trial: number;
  /** Seed and size that regenerate the failing trial on their own. */
  readonly trialSeed: Seed;
  readonly size: Size;
  readonly originalFailure: Failure<C, R>;
  readonly counterexample: Failure<C, R>;
  /**
   * Set when a command generator threw while its shrinks were expanded.
   * Shrinking stopped there and `counterexample` is the last failing
   * sequence found before it.
   */
  readonly shrinkError: GenerationError | null;
}

/**
 * The model could not produce a command, so the run stopped without a
 * verdict.
 */
export interface AbortedResult {
  readonly type: 'aborted';
  readonly stats: TestStats;
  readonly seed: number;
  readonly error: GenerationError;
}

export function passResult(stats: TestStats, seed: number): PassResult {
  return { type: 'pass', stats, seed };
}

export function failResult<C, R>(
  stats: TestStats,
  seed: number,
  trial: number,
  trialSeed: Seed,
  size: Size,
  originalFailure: Failure<C, R>,
  counterexample: Failure<C, R>,
  shrinkError: GenerationError | null = null
): FailResult<C, R> {
  return {
    type: 'fail',
    stats,
    seed,
    trial,
    trialSeed,
    size,
    originalFailure,
    counterexample,
    shrinkError,
  };
}

export function abortedResult(
  stats: TestStats,
  seed: number,
  error: GenerationError
): AbortedResult {
  return { type: 'aborted', stats, seed, error };
}

/**
 * Create empty test statistics.
 */
export function emptyStats(): TestStats {
  return { testsRun: 0, shrinkSteps: 0, shrinkAttempts: 0 };
}

export function addTest(stats: TestStats): TestStats {
  return { ...stats, testsRun: stats.testsRun + 1 };
}

/**
 * Update test statistics after shrinking.
 */
export function addShrinks(stats: TestStats, steps: number, attempts: number): TestStats {
  return {
    ...stats,
    shrinkSteps: stats.shrinkSteps + steps,
    shrinkAttempts: stats.shrinkAttempts + attempts,
  };
}
