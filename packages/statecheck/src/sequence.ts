/**
 * A concrete command sequence and the runner that replays it against a
 * system under test and its model.
 */

import { formatValue } from './data/show.js';
import { SystemUnderTestError } from './errors.js';
import type { StateMachine, SystemUnderTest } from './model.js';

export class CommandSequence<C, R> implements Iterable<C> {
  constructor(
    public readonly commands: readonly C[],
    private readonly model: StateMachine<C, R>
  ) {}

  get length(): number {
    return this.commands.length;
  }

  [Symbol.iterator](): Iterator<C> {
    return this.commands[Symbol.iterator]();
  }

  /**
   * Execute every command in order against `sut`, checking each result
   * against the model. Rejects with a `SystemUnderTestError` when the system
   * throws, or with the model's `PostconditionError`; stops at the first
   * failure.
   */
  async run(sut: SystemUnderTest<C, R>): Promise<void> {
    this.model.reset();
    for (let index = 0; index < this.commands.length; index++) {
      const command = this.commands[index];
      let result: R;
      try {
        result = await sut.run(command);
      } catch (error) {
        throw new SystemUnderTestError(command, index, error);
      }
      this.model.postcondition(command, result);
      this.model.nextState(command);
    }
  }

  toString(): string {
    return this.commands.map((command) => formatValue(command)).join('\n');
  }
}
