/**
 * Leaf value generators for command arguments.
 *
 * A `Gen<T>` turns a size and a seed into a `Tree<T>`: the generated value
 * plus its shrink candidates. Models hand one `Gen` per command shape to
 * the command generator, which walks the tree when shrinking.
 */

import { Seed } from './data/seed.js';
import { Size, Range } from './data/size.js';
import { Tree } from './data/tree.js';
import { listTree, numericTree, rowTree } from './gen/shrink.js';
import { cumulative, pickIndex, weightProblem } from './gen/weighted.js';

/**
 * Generator function type.
 */
export type GeneratorFn<T> = (size: Size, seed: Seed) => Tree<T>;

export interface ArrayOptions {
  minLength?: number;
  /** Defaults to the current size. */
  maxLength?: number;
}

export class Gen<T> {
  constructor(public readonly generator: GeneratorFn<T>) {}

  generate(size: Size, seed: Seed): Tree<T> {
    return this.generator(size, seed);
  }

  map<U>(fn: (value: T) => U): Gen<U> {
    return Gen.create((size, seed) => this.generate(size, seed).map(fn));
  }

  /**
   * Generate a value, then a second generator from it. Shrinking the first
   * value regenerates the second from the same seed.
   */
  chain<U>(fn: (value: T) => Gen<U>): Gen<U> {
    return Gen.create((size, seed) => {
      const [leftSeed, rightSeed] = seed.split();
      return this.generate(size, leftSeed).bind((value) =>
        fn(value).generate(size, rightSeed)
      );
    });
  }

  filter(predicate: (value: T) => boolean, maxRetries = 100): Gen<T> {
    return Gen.create((size, seed) => {
      let currentSeed = seed;
      for (let i = 0; i < maxRetries; i++) {
        const [attemptSeed, nextSeed] = currentSeed.split();
        const tree = this.generate(size, attemptSeed).filter(predicate);
        if (tree !== null) {
          return tree;
        }
        currentSeed = nextSeed;
      }
      throw new Error(
        `Failed to generate value satisfying predicate after ${maxRetries} attempts`
      );
    });
  }

  sample(seed: Seed = Seed.random(), size: Size = Size.of(10)): T {
    return this.generate(size, seed).value;
  }

  samples(count: number, seed: Seed = Seed.random(), size: Size = Size.of(10)): T[] {
    const results: T[] = [];
    let currentSeed = seed;
    for (let i = 0; i < count; i++) {
      const [sampleSeed, nextSeed] = currentSeed.split();
      results.push(this.generate(size, sampleSeed).value);
      currentSeed = nextSeed;
    }
    return results;
  }

  static create<T>(fn: GeneratorFn<T>): Gen<T> {
    return new Gen(fn);
  }

  /**
   * Always the same value, with nothing to shrink to.
   */
  static constant<T>(value: T): Gen<T> {
    return new Gen(() => Tree.singleton(value));
  }

  static bool(): Gen<boolean> {
    return Gen.create((_size, seed) => {
      const [value] = seed.nextBool();
      return value
        ? Tree.withChildren(true, [Tree.singleton(false)])
        : Tree.singleton(false);
    });
  }

  /**
   * Integers in the range, shrinking towards its origin (or the bound
   * nearest zero).
   */
  static int(range: Range): Gen<number> {
    return Gen.create((_size, seed) => {
      const [value] = seed.nextInRange(range.min, range.max);
      return numericTree(value, range.shrinkTarget(), (c) => range.contains(c));
    });
  }

  /**
   * One of the given values, shrinking towards the first.
   */
  static item<T>(items: readonly T[]): Gen<T> {
    if (items.length === 0) {
      throw new Error('item requires at least one item');
    }
    return Gen.int(Range.uniform(0, items.length - 1)).map((index) => items[index]);
  }

  /**
   * One of the generators with equal probability, shrinking towards the
   * earlier alternatives.
   */
  static oneOf<T>(gens: readonly Gen<T>[]): Gen<T> {
    if (gens.length === 0) {
      throw new Error('oneOf requires at least one generator');
    }
    return Gen.int(Range.uniform(0, gens.length - 1)).chain((index) => gens[index]);
  }

  /**
   * One of the generators, chosen in proportion to its positive integer
   * weight.
   */
  static frequency<T>(choices: ReadonlyArray<readonly [number, Gen<T>]>): Gen<T> {
    const problem = weightProblem(choices.map(([weight]) => weight));
    if (problem !== null) {
      throw new Error(`frequency: ${problem}`);
    }
    const totals = cumulative(choices.map(([weight]) => weight));
    return Gen.create((size, seed) => {
      const [pickSeed, valueSeed] = seed.split();
      const [index] = pickIndex(totals, pickSeed);
      return choices[index][1].generate(size, valueSeed);
    });
  }

  /**
   * Arrays whose length lies in [minLength, maxLength]. Shrinks to shorter
   * prefixes first, then drops single elements, then shrinks them.
   */
  static array<T>(gen: Gen<T>, options: ArrayOptions = {}): Gen<T[]> {
    const minLength = options.minLength ?? 0;
    return Gen.create((size, seed) => {
      const maxLength = Math.max(minLength, options.maxLength ?? size.get());
      const [length, elementsSeed] = seed.nextInRange(minLength, maxLength);

      const trees: Tree<T>[] = [];
      let currentSeed = elementsSeed;
      for (let i = 0; i < length; i++) {
        const [elementSeed, nextSeed] = currentSeed.split();
        trees.push(gen.generate(size, elementSeed));
        currentSeed = nextSeed;
      }

      return listTree(trees, minLength);
    });
  }

  /**
   * Fixed-length tuples, one generator per position.
   */
  static tuple<T extends readonly unknown[]>(
    ...gens: { [K in keyof T]: Gen<T[K]> }
  ): Gen<T> {
    return Gen.create((size, seed) => {
      const trees: Tree<unknown>[] = [];
      let currentSeed = seed;
      for (let i = 0; i < gens.length; i++) {
        const [elementSeed, nextSeed] = currentSeed.split();
        trees.push(gens[i].generate(size, elementSeed));
        currentSeed = nextSeed;
      }
      return rowTree(trees).map((values) => values as unknown as T);
    });
  }

  /**
   * Objects with one generator per field. Each field shrinks independently.
   */
  static object<T extends Record<string, unknown>>(fields: {
    [K in keyof T]: Gen<T[K]>;
  }): Gen<T> {
    const keys = Object.keys(fields) as Array<Extract<keyof T, string>>;
    const assemble = (values: unknown[]): T => {
      const result: Record<string, unknown> = {};
      keys.forEach((key, index) => {
        result[key] = values[index];
      });
      return result as T;
    };

    return Gen.create((size, seed) => {
      const trees: Tree<unknown>[] = [];
      let currentSeed = seed;
      for (const key of keys) {
        const [fieldSeed, nextSeed] = currentSeed.split();
        trees.push(fields[key].generate(size, fieldSeed));
        currentSeed = nextSeed;
      }

      return rowTree(trees).map(assemble);
    });
  }
}
