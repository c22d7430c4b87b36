/**
 * Cache Model
 *
 * A bounded cache that replaces the oldest written key once full. Values
 * are looked up by key, the cache can be flushed, and overwriting a key
 * keeps its position. The model tracks insertion order explicitly; the
 * implementation under test keeps a queue of keys.
 */

import {
  Config,
  Gen,
  Range,
  expectEqual,
  executePlan,
  formatFailure,
  type StateMachine,
  type SystemUnderTest,
  type WeightedCommand,
} from 'statecheck';

type CacheCommand =
  | { type: 'get'; key: number }
  | { type: 'set'; key: number; value: number }
  | { type: 'flush' };

type CacheResult = number | null;

class QueueCache {
  private keys: number[] = [];
  private readonly values = new Map<number, number>();

  constructor(
    private readonly capacity: number,
    private readonly forgetsOnOverwrite = false
  ) {}

  get(key: number): number | null {
    return this.values.get(key) ?? null;
  }

  set(key: number, value: number): void {
    if (this.values.has(key)) {
      if (this.forgetsOnOverwrite) {
        // Moves the key to the back of the queue instead of keeping its slot.
        this.keys = [...this.keys.filter((k) => k !== key), key];
      }
    } else {
      if (this.keys.length === this.capacity) {
        const oldest = this.keys.shift();
        if (oldest !== undefined) {
          this.values.delete(oldest);
        }
      }
      this.keys.push(key);
    }
    this.values.set(key, value);
  }

  flush(): void {
    this.keys = [];
    this.values.clear();
  }
}

class CacheSystem implements SystemUnderTest<CacheCommand, CacheResult> {
  constructor(private readonly cache: QueueCache) {}

  run(command: CacheCommand): CacheResult {
    switch (command.type) {
      case 'get':
        return this.cache.get(command.key);
      case 'set':
        this.cache.set(command.key, command.value);
        return null;
      case 'flush':
        this.cache.flush();
        return null;
    }
  }
}

class CacheModel implements StateMachine<CacheCommand, CacheResult> {
  private entries = new Map<number, { index: number; value: number }>();
  private minIndex = 0;
  private maxIndex = 0;

  constructor(private readonly capacity: number) {}

  private key(): Gen<number> {
    return Gen.oneOf([
      Gen.int(Range.uniform(1, this.capacity)),
      Gen.int(Range.uniform(-1000, 1000)),
    ]);
  }

  reset(): void {
    this.entries.clear();
    this.minIndex = 0;
    this.maxIndex = 0;
  }

  commands(): ReadonlyArray<WeightedCommand<CacheCommand>> {
    const options: WeightedCommand<CacheCommand>[] = [
      [1, this.key().map((key): CacheCommand => ({ type: 'get', key }))],
      [
        3,
        Gen.object({ key: this.key(), value: Gen.int(Range.uniform(-1000, 1000)) }).map(
          ({ key, value }): CacheCommand => ({ type: 'set', key, value })
        ),
      ],
    ];
    if (this.entries.size > 0) {
      options.push([1, Gen.constant<CacheCommand>({ type: 'flush' })]);
    }
    return options;
  }

  postcondition(command: CacheCommand, result: CacheResult): void {
    if (command.type === 'get') {
      expectEqual(command, this.entries.get(command.key)?.value ?? null, result);
    }
  }

  nextState(command: CacheCommand): void {
    if (command.type === 'flush') {
      this.reset();
    } else if (command.type === 'set') {
      const entry = this.entries.get(command.key);
      if (entry !== undefined) {
        entry.value = command.value;
        return;
      }
      if (this.entries.size === this.capacity) {
        for (const [key, candidate] of this.entries) {
          if (candidate.index === this.minIndex) {
            this.entries.delete(key);
            break;
          }
        }
        this.minIndex++;
      }
      this.entries.set(command.key, { index: this.maxIndex++, value: command.value });
    }
  }

  clone(): CacheModel {
    const copy = new CacheModel(this.capacity);
    for (const [key, entry] of this.entries) {
      copy.entries.set(key, { ...entry });
    }
    copy.minIndex = this.minIndex;
    copy.maxIndex = this.maxIndex;
    return copy;
  }
}

const CAPACITY = 4;
const config = Config.default().withSeed(7).withCommandShrinking();

console.log('=== Correct cache ===');
const good = await executePlan(config, new CacheModel(CAPACITY), () => new CacheSystem(new QueueCache(CAPACITY)));
console.log(`Result: ${good.type} after ${good.stats.testsRun} tests\n`);

console.log('=== Cache that reorders on overwrite ===');
const bad = await executePlan(
  config,
  new CacheModel(CAPACITY),
  () => new CacheSystem(new QueueCache(CAPACITY, true))
);
console.log(bad.type === 'fail' ? formatFailure(bad) : `Result: ${bad.type}`);
