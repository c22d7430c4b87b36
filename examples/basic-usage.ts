/**
 * Basic Usage
 *
 * A counter that misbehaves once it passes ten, checked against a model
 * that simply counts. Run with a TypeScript loader such as tsx.
 */

import {
  Config,
  Gen,
  expectEqual,
  forAllCommands,
  formatFailure,
  type StateMachine,
  type SystemUnderTest,
} from 'statecheck';

type CounterCommand = { type: 'increment' } | { type: 'decrement' } | { type: 'read' };

class Counter {
  private value = 0;

  increment(): void {
    // Saturates too early.
    if (this.value < 10) {
      this.value++;
    }
  }

  decrement(): void {
    this.value--;
  }

  read(): number {
    return this.value;
  }
}

class CounterSystem implements SystemUnderTest<CounterCommand, number | null> {
  private readonly counter = new Counter();

  run(command: CounterCommand): number | null {
    switch (command.type) {
      case 'increment':
        this.counter.increment();
        return null;
      case 'decrement':
        this.counter.decrement();
        return null;
      case 'read':
        return this.counter.read();
    }
  }
}

class CounterModel implements StateMachine<CounterCommand, number | null> {
  private count = 0;

  reset(): void {
    this.count = 0;
  }

  commands() {
    return [
      [4, Gen.constant<CounterCommand>({ type: 'increment' })],
      [1, Gen.constant<CounterCommand>({ type: 'decrement' })],
      [1, Gen.constant<CounterCommand>({ type: 'read' })],
    ] as const;
  }

  postcondition(command: CounterCommand, result: number | null): void {
    if (command.type === 'read') {
      expectEqual(command, this.count, result);
    }
  }

  nextState(command: CounterCommand): void {
    if (command.type === 'increment') {
      this.count++;
    } else if (command.type === 'decrement') {
      this.count--;
    }
  }

  clone(): CounterModel {
    const copy = new CounterModel();
    copy.count = this.count;
    return copy;
  }
}

console.log('=== Counter model ===\n');

const property = forAllCommands(new CounterModel(), () => new CounterSystem());
const result = await property.run(Config.default().withTests(200).withSeed(42));

if (result.type === 'fail') {
  console.log(formatFailure(result));
} else {
  console.log(`Result: ${result.type} after ${result.stats.testsRun} tests`);
}
