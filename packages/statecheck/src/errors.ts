/**
 * Errors raised while generating, running and checking command sequences.
 */

import { formatValue } from './data/show.js';

export type StatefulErrorKind =
  | 'generation'
  | 'system-under-test'
  | 'postcondition'
  | 'config';

export abstract class StatefulError extends Error {
  abstract readonly kind: StatefulErrorKind;
}

/**
 * The model offered no usable command (an empty list, or a weight that is
 * not a positive integer), or a command generator threw.
 */
export class GenerationError extends StatefulError {
  readonly kind = 'generation';

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GenerationError';
  }
}

/**
 * The system under test threw (or rejected) while executing a command.
 */
export class SystemUnderTestError<C = unknown> extends StatefulError {
  readonly kind = 'system-under-test';

  constructor(
    public readonly command: C,
    /** Position of the command within the executed sequence. */
    public readonly index: number,
    cause: unknown
  ) {
    super(
      `System under test failed. Command: ${formatValue(command)}. Error: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'SystemUnderTestError';
  }
}

/**
 * The system under test returned something the model did not expect.
 */
export class PostconditionError<C = unknown> extends StatefulError {
  readonly kind = 'postcondition';

  constructor(
    public readonly command: C,
    public readonly expected: unknown,
    public readonly actual: unknown
  ) {
    super(
      `Postcondition does not hold. Command: ${formatValue(command)}. ` +
        `Expected result: ${formatValue(expected)}. Actual result: ${formatValue(actual)}`
    );
    this.name = 'PostconditionError';
  }
}

export class ConfigError extends StatefulError {
  readonly kind = 'config';

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * The failures that make a sequence count as a counterexample.
 */
export type RunError<C = unknown> = PostconditionError<C> | SystemUnderTestError<C>;

export function isRunError(error: unknown): error is RunError {
  return error instanceof PostconditionError || error instanceof SystemUnderTestError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : formatValue(cause);
}
