import { describe, test, expect } from 'vitest';
import { executePlan } from '../harness.js';
import { Config } from '../config.js';
import { Gen } from '../gen.js';
import { Seed } from '../data/seed.js';
import { Size, Range } from '../data/size.js';
import { numericTree } from '../gen/shrink.js';
import { SequenceShrinker } from '../search.js';
import { TreeShrinkable } from '../shrinkable.js';
import { PlanModel, PlanSystem, down, up, type Move } from '../testing/plan-model.js';
import { NumberModel } from '../testing/number-model.js';

const plans = Gen.array(Gen.bool(), { minLength: 0, maxLength: 15 }).map((flags): Move[] => [
  ...flags.map((flag, index) => (flag ? up(index) : down)),
  up(flags.length),
]);

describe('shrinking properties', () => {
  test('plans shrink to exactly their ups', async () => {
    const samples = plans.samples(40, Seed.fromNumber(101));
    for (const plan of samples) {
      const model = new PlanModel(plan);
      const config = Config.default()
        .withSequenceSize(plan.length, plan.length)
        .withTests(1)
        .withSeed(7);
      const result = await executePlan(config, model, () => new PlanSystem());
      expect(result.type).toBe('fail');
      if (result.type !== 'fail') continue;

      expect(result.counterexample.sequence.length).toBe(model.target);
      expect(result.counterexample.sequence.commands).toEqual(
        plan.filter((move) => move.type === 'up')
      );
      expect(result.stats.shrinkAttempts).toBeLessThanOrEqual(plan.length);
    }
  });

  test('complicate restores what simplify changed', () => {
    const values = Gen.array(Gen.int(Range.uniform(0, 50)), { minLength: 1, maxLength: 8 });
    const decisions = Gen.array(Gen.bool(), { minLength: 60, maxLength: 60 });
    let seed = Seed.fromNumber(102);
    for (let i = 0; i < 30; i++) {
      const [valueSeed, rest] = seed.split();
      const [decisionSeed, next] = rest.split();
      const elements = values
        .sample(valueSeed, Size.of(8))
        .map((value) => new TreeShrinkable(numericTree(value, 0, () => true)));
      const search = new SequenceShrinker(elements, new NumberModel(), {
        shrinkCommands: true,
        minShrinkLength: 1,
      });
      for (const keep of decisions.sample(decisionSeed)) {
        const before = search.current().commands;
        if (!search.simplify()) {
          expect(search.current().commands).toEqual(before);
          break;
        }
        if (!keep && search.complicate()) {
          expect(search.current().commands).toEqual(before);
        }
      }
      expect(search.current().length).toBeGreaterThanOrEqual(1);
      seed = next;
    }
  });
});
