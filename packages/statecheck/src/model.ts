/**
 * The two capabilities a stateful property is written against: an abstract
 * reference model and the real system under test.
 */

import type { Gen } from './gen.js';
import { PostconditionError } from './errors.js';

/**
 * One legal command shape: a positive integer weight and the generator for
 * commands of that shape.
 */
export type WeightedCommand<C> = readonly [number, Gen<C>];

/**
 * Reference model of the system under test.
 *
 * The model keeps its own state. `commands()` and `postcondition()` read
 * it, `nextState()` advances it, `reset()` returns it to the initial state.
 *
 * Commands are only ever generated from the state they were chosen in.
 * After shrinking deletes earlier commands, the remaining ones are replayed
 * as they are, without checking that the model would still have offered
 * them. `postcondition` (and the system under test) must therefore accept
 * any command it can receive, not just the ones `commands()` offers for the
 * current state.
 *
 * @example
 * ```ts
 * class CounterModel implements StateMachine<'inc' | 'read', number> {
 *   private count = 0;
 *   reset() { this.count = 0; }
 *   commands() {
 *     return [[3, Gen.constant('inc')], [1, Gen.constant('read')]] as const;
 *   }
 *   postcondition(command: 'inc' | 'read', result: number) {
 *     if (command === 'read') expectEqual(command, this.count, result);
 *   }
 *   nextState(command: 'inc' | 'read') { if (command === 'inc') this.count++; }
 *   clone() { const copy = new CounterModel(); copy.count = this.count; return copy; }
 * }
 * ```
 */
export interface StateMachine<C, R> {
  /** Return to the canonical initial state. */
  reset(): void;

  /** Command shapes that are legal in the current state. */
  commands(): ReadonlyArray<WeightedCommand<C>>;

  /**
   * Check a result of the system under test against the current state.
   * Throws a `PostconditionError` when they disagree. Called before
   * `nextState(command)`.
   */
  postcondition(command: C, result: R): void;

  /** Apply the command to the model state. */
  nextState(command: C): void;

  /** An independent copy; mutating one never affects the other. */
  clone(): StateMachine<C, R>;
}

/**
 * The real system. Any thrown error or rejected promise counts as a
 * failure of the command.
 */
export interface SystemUnderTest<C, R> {
  run(command: C): R | Promise<R>;
}

/**
 * Builds a fresh system under test for each executed sequence.
 */
export type SystemFactory<C, R> = () =>
  | SystemUnderTest<C, R>
  | Promise<SystemUnderTest<C, R>>;

/**
 * Throw a `PostconditionError` unless `actual` matches `expected`.
 *
 * Arrays, plain objects, `Map`s and `Set`s are compared structurally: object
 * keys in any order, `Map` keys and `Set` members by identity first and then
 * structurally. Everything else, BigInts included, is compared with
 * `Object.is`.
 */
export function expectEqual<C>(command: C, expected: unknown, actual: unknown): void {
  if (!structurallyEqual(expected, actual)) {
    throw new PostconditionError(command, expected, actual);
  }
}

function structurallyEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) {
    return false;
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => structurallyEqual(item, b[i]));
  }
  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) {
      return false;
    }
    for (const [key, value] of a) {
      const match = b.has(key) ? key : findMember(b.keys(), key);
      if (match === missing || !structurallyEqual(value, b.get(match))) {
        return false;
      }
    }
    return true;
  }
  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) {
      return false;
    }
    for (const member of a) {
      if (!b.has(member) && findMember(b.values(), member) === missing) {
        return false;
      }
    }
    return true;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) {
    return false;
  }
  const aRecord: Record<string, unknown> = { ...a };
  const bRecord: Record<string, unknown> = { ...b };
  return aKeys.every(
    (key) => Object.hasOwn(bRecord, key) && structurallyEqual(aRecord[key], bRecord[key])
  );
}

const missing = Symbol('missing');

function findMember(candidates: Iterable<unknown>, target: unknown): unknown {
  for (const candidate of candidates) {
    if (structurallyEqual(candidate, target)) {
      return candidate;
    }
  }
  return missing;
}
