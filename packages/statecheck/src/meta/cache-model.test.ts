import { describe, test, expect } from 'vitest';
import { executePlan, forAllCommands } from '../harness.js';
import { Config } from '../config.js';
import { PostconditionError } from '../errors.js';
import {
  CacheModel,
  CacheSystem,
  FifoCache,
  LeakyFifoCache,
} from '../testing/cache-model.js';

const CAPACITY = 3;

describe('cache model', () => {
  test('a correct cache satisfies the model', async () => {
    const result = await executePlan(
      Config.default().withTests(30).withSequenceSize(1, 40).withSeed(17),
      new CacheModel(CAPACITY),
      () => new CacheSystem(new FifoCache(CAPACITY))
    );
    expect(result.type).toBe('pass');
    expect(result.stats.testsRun).toBe(30);
  });

  test('a cache that survives flushes is caught and shrunk', async () => {
    const property = forAllCommands(
      new CacheModel(CAPACITY),
      () => new CacheSystem(new LeakyFifoCache(CAPACITY))
    );
    const result = await property.run(Config.default().withSeed(17));
    expect(result.type).toBe('fail');
    if (result.type !== 'fail') return;

    const { sequence, error } = result.counterexample;
    expect(error).toBeInstanceOf(PostconditionError);
    expect(sequence.length).toBeLessThanOrEqual(result.originalFailure.sequence.length);
    expect(sequence.commands[sequence.length - 1].type).toBe('get');

    await expect(sequence.run(new CacheSystem(new LeakyFifoCache(CAPACITY)))).rejects.toThrow(
      error.message
    );
    await expect(sequence.run(new CacheSystem(new FifoCache(CAPACITY)))).resolves.toBeUndefined();
  });

  test('command shrinking keeps the failure', async () => {
    const property = forAllCommands(
      new CacheModel(CAPACITY),
      () => new CacheSystem(new LeakyFifoCache(CAPACITY))
    );
    const deleted = await property.run(Config.default().withSeed(23));
    const shrunk = await property.run(Config.default().withSeed(23).withCommandShrinking());
    if (deleted.type !== 'fail' || shrunk.type !== 'fail') {
      throw new Error('expected both runs to fail');
    }
    expect(shrunk.stats.shrinkSteps).toBeGreaterThanOrEqual(deleted.stats.shrinkSteps);
    expect(shrunk.counterexample.sequence.length).toBe(deleted.counterexample.sequence.length);
    await expect(
      shrunk.counterexample.sequence.run(new CacheSystem(new LeakyFifoCache(CAPACITY)))
    ).rejects.toBeInstanceOf(PostconditionError);
  });
});
