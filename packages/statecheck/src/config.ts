/**
 * Configuration for stateful property testing.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const count = (minimum: number) =>
  z
    .number()
    .int('must be an integer')
    .min(minimum, `must be at least ${minimum}`);

const configSchema = z
  .object({
    minSequenceSize: count(1),
    maxSequenceSize: count(1),
    shrinkCommands: z.boolean(),
    seed: count(0).optional(),
    testLimit: count(0),
    shrinkLimit: count(0),
    sizeLimit: count(0),
    minShrinkLength: count(1),
    enableLogging: z.boolean(),
  })
  .superRefine((options, ctx) => {
    if (options.maxSequenceSize < options.minSequenceSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxSequenceSize'],
        message: `must be at least minSequenceSize (${options.minSequenceSize})`,
      });
    }
  });

export type ConfigOptions = z.infer<typeof configSchema>;

const defaults: ConfigOptions = {
  minSequenceSize: 1,
  maxSequenceSize: 100,
  shrinkCommands: false,
  seed: undefined,
  testLimit: 100,
  shrinkLimit: 1000,
  sizeLimit: 100,
  minShrinkLength: 1,
  enableLogging: false,
};

/**
 * Immutable run configuration. Every `with*` method returns a new,
 * validated `Config`; invalid values throw a `ConfigError`.
 */
export class Config {
  /** Shortest generated command sequence. */
  public readonly minSequenceSize: number;
  /** Longest generated command sequence. */
  public readonly maxSequenceSize: number;
  /**
   * Whether shrinking goes on to simplify individual commands once no more
   * commands can be deleted.
   */
  public readonly shrinkCommands: boolean;
  /** Run seed. A random one is drawn per run when absent. */
  public readonly seed: number | undefined;
  /** Maximum number of sequences to generate and run. */
  public readonly testLimit: number;
  /** Maximum number of shrink attempts after a failure. */
  public readonly shrinkLimit: number;
  /** Maximum size parameter used for generating command arguments. */
  public readonly sizeLimit: number;
  /** Deletion never leaves fewer commands than this. */
  public readonly minShrinkLength: number;
  /** Log trial failures and shrink progress to the console. */
  public readonly enableLogging: boolean;

  constructor(options: Partial<ConfigOptions> = {}) {
    const parsed = configSchema.safeParse({ ...defaults, ...options });
    if (!parsed.success) {
      throw new ConfigError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    const values = parsed.data;
    this.minSequenceSize = values.minSequenceSize;
    this.maxSequenceSize = values.maxSequenceSize;
    this.shrinkCommands = values.shrinkCommands;
    this.seed = values.seed;
    this.testLimit = values.testLimit;
    this.shrinkLimit = values.shrinkLimit;
    this.sizeLimit = values.sizeLimit;
    this.minShrinkLength = values.minShrinkLength;
    this.enableLogging = values.enableLogging;
  }

  /**
   * Create the default configuration.
   */
  static default(): Config {
    return new Config();
  }

  toOptions(): ConfigOptions {
    return {
      minSequenceSize: this.minSequenceSize,
      maxSequenceSize: this.maxSequenceSize,
      shrinkCommands: this.shrinkCommands,
      seed: this.seed,
      testLimit: this.testLimit,
      shrinkLimit: this.shrinkLimit,
      sizeLimit: this.sizeLimit,
      minShrinkLength: this.minShrinkLength,
      enableLogging: this.enableLogging,
    };
  }

  private with(changes: Partial<ConfigOptions>): Config {
    return new Config({ ...this.toOptions(), ...changes });
  }

  /**
   * Create a new config with the given number of tests.
   */
  withTests(tests: number): Config {
    return this.with({ testLimit: tests });
  }

  /**
   * Create a new config with the given shrink limit.
   */
  withShrinks(shrinks: number): Config {
    return this.with({ shrinkLimit: shrinks });
  }

  withSizeLimit(size: number): Config {
    return this.with({ sizeLimit: size });
  }

  /**
   * Bound generated sequence lengths to [min, max], both inclusive.
   */
  withSequenceSize(min: number, max: number): Config {
    return this.with({ minSequenceSize: min, maxSequenceSize: max });
  }

  withCommandShrinking(enabled = true): Config {
    return this.with({ shrinkCommands: enabled });
  }

  withSeed(seed: number): Config {
    return this.with({ seed });
  }

  withMinShrinkLength(length: number): Config {
    return this.with({ minShrinkLength: length });
  }

  withLogging(enabled = true): Config {
    return this.with({ enableLogging: enabled });
  }

  toString(): string {
    const seed = this.seed === undefined ? 'random' : String(this.seed);
    return (
      `Config(tests: ${this.testLimit}, shrinks: ${this.shrinkLimit}, size: ${this.sizeLimit}, ` +
      `sequence: ${this.minSequenceSize}..${this.maxSequenceSize}, ` +
      `shrinkCommands: ${this.shrinkCommands}, seed: ${seed})`
    );
  }
}
