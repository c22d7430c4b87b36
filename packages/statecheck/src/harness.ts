/**
 * Stateful property execution: generate command sequences, run them against
 * fresh systems under test and shrink the first failure.
 */

import { SequenceBuilder } from './builder.js';
import { Config } from './config.js';
import { Seed, randomSeedValue } from './data/seed.js';
import { Size } from './data/size.js';
import { GenerationError, isRunError, type RunError } from './errors.js';
import { formatAborted, formatFailure, formatValue } from './format.js';
import type { StateMachine, SystemFactory } from './model.js';
import {
  type Failure,
  type PlanResult,
  abortedResult,
  addShrinks,
  addTest,
  emptyStats,
  failResult,
  passResult,
} from './result.js';
import type { SequenceShrinker } from './search.js';
import type { CommandSequence } from './sequence.js';

/**
 * Outcome of running a single generated sequence.
 */
export interface TrialOutcome<C, R> {
  readonly sequence: CommandSequence<C, R>;
  /** Null when the sequence ran without failing. */
  readonly error: RunError | null;
}

interface Minimized<C, R> {
  readonly failure: Failure<C, R>;
  readonly steps: number;
  readonly attempts: number;
  readonly interruption: GenerationError | null;
}

/**
 * A stateful property: a reference model and a way to build the system it
 * describes.
 */
export class StatefulProperty<C, R> {
  constructor(
    private readonly model: StateMachine<C, R>,
    private readonly sutFactory: SystemFactory<C, R>
  ) {}

  /**
   * Run up to `testLimit` generated sequences. The first failing one is
   * shrunk and reported. Errors other than a failed postcondition or a
   * throwing system under test propagate.
   */
  async run(config: Config = Config.default()): Promise<PlanResult<C, R>> {
    const runSeed = config.seed ?? randomSeedValue();
    const builder = new SequenceBuilder(this.model, config);
    let stats = emptyStats();
    let currentSeed = Seed.fromNumber(runSeed);

    for (let trial = 0; trial < config.testLimit; trial++) {
      // Size grows linearly with the trial number.
      const size = Size.of(
        Math.min(config.sizeLimit, Math.floor((trial * config.sizeLimit) / config.testLimit))
      );
      const [trialSeed, nextSeed] = currentSeed.split();
      currentSeed = nextSeed;

      let search: SequenceShrinker<C, R>;
      try {
        search = builder.build(size, trialSeed);
      } catch (error) {
        if (error instanceof GenerationError) {
          log(config, `Aborting after ${stats.testsRun} tests: ${error.message}`);
          return abortedResult(stats, runSeed, error);
        }
        throw error;
      }

      const sequence = search.current();
      const error = await this.execute(sequence);
      if (error === null) {
        stats = addTest(stats);
        continue;
      }

      log(config, `Trial ${trial} failed after ${sequence.length} commands: ${error.message}`);
      const minimized = await this.minimize(search, { sequence, error }, config);
      stats = addShrinks(stats, minimized.steps, minimized.attempts);
      log(
        config,
        `Shrunk to ${minimized.failure.sequence.length} commands in ${minimized.steps} steps:\n` +
          minimized.failure.sequence.toString()
      );

      return failResult(
        stats,
        runSeed,
        trial,
        trialSeed,
        size,
        { sequence, error },
        minimized.failure,
        minimized.interruption
      );
    }

    log(config, `Passed ${stats.testsRun} tests (seed ${runSeed})`);
    return passResult(stats, runSeed);
  }

  /**
   * Run the property, throwing an `Error` with a formatted report when it
   * fails or aborts.
   */
  async check(config: Config = Config.default()): Promise<void> {
    const result = await this.run(config);
    if (result.type === 'fail') {
      throw new Error(formatFailure(result));
    } else if (result.type === 'aborted') {
      throw new Error(formatAborted(result));
    }
  }

  /**
   * Regenerate and run the one sequence identified by a trial seed and
   * size, as reported in a `FailResult`. Only the sequence bounds of
   * `config` matter here.
   */
  async replay(
    trialSeed: Seed,
    size: Size,
    config: Config = Config.default()
  ): Promise<TrialOutcome<C, R>> {
    const sequence = new SequenceBuilder(this.model, config).build(size, trialSeed).current();
    return { sequence, error: await this.execute(sequence) };
  }

  private async execute(sequence: CommandSequence<C, R>): Promise<RunError | null> {
    const sut = await this.sutFactory();
    try {
      await sequence.run(sut);
      return null;
    } catch (error) {
      if (isRunError(error)) {
        return error;
      }
      throw error;
    }
  }

  /**
   * Alternate `simplify()` with a run of the candidate against a fresh
   * system. A failing candidate, of any kind, becomes the new minimum; a
   * passing one is undone with `complicate()`. A generator that throws while
   * its shrinks are expanded ends the search with the failure found so far.
   */
  private async minimize(
    search: SequenceShrinker<C, R>,
    original: Failure<C, R>,
    config: Config
  ): Promise<Minimized<C, R>> {
    let failure = original;
    let steps = 0;
    let attempts = 0;
    let interruption: GenerationError | null = null;

    while (attempts < config.shrinkLimit) {
      let moved: boolean;
      try {
        moved = search.simplify();
      } catch (error) {
        const reason = error instanceof Error ? error.message : formatValue(error);
        interruption = new GenerationError(
          `Command generator failed while shrinking: ${reason}`,
          error
        );
        log(config, `Shrinking stopped after ${steps} steps: ${interruption.message}`);
        break;
      }
      if (!moved) {
        break;
      }

      attempts++;
      const candidate = search.current();
      const error = await this.execute(candidate);
      if (error !== null) {
        failure = { sequence: candidate, error };
        steps++;
        log(config, `Shrink step ${steps}: ${candidate.length} commands still fail`);
      } else {
        search.complicate();
      }
    }

    return { failure, steps, attempts, interruption };
  }
}

/**
 * Build a stateful property from a model and a system factory.
 *
 * @example
 * ```ts
 * await forAllCommands(new CacheModel(3), () => new FifoCache(3))
 *   .check(Config.default().withTests(50));
 * ```
 */
export function forAllCommands<C, R>(
  model: StateMachine<C, R>,
  sutFactory: SystemFactory<C, R>
): StatefulProperty<C, R> {
  return new StatefulProperty(model, sutFactory);
}

/**
 * Run a stateful property once with the given configuration.
 */
export function executePlan<C, R>(
  config: Config,
  model: StateMachine<C, R>,
  sutFactory: SystemFactory<C, R>
): Promise<PlanResult<C, R>> {
  return new StatefulProperty(model, sutFactory).run(config);
}

function log(config: Config, message: string): void {
  if (config.enableLogging) {
    console.log(message);
  }
}
