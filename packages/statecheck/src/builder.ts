/**
 * Builds the shrinkable command sequence for one trial.
 */

import { chooseCommand } from './command.js';
import type { Config } from './config.js';
import { Seed } from './data/seed.js';
import { Size } from './data/size.js';
import type { StateMachine } from './model.js';
import { SequenceShrinker } from './search.js';
import type { Shrinkable } from './shrinkable.js';

export class SequenceBuilder<C, R> {
  constructor(
    private readonly model: StateMachine<C, R>,
    private readonly config: Config
  ) {}

  /**
   * Draw a length in `[minSequenceSize, maxSequenceSize]`, then generate
   * that many commands, each chosen from the commands the model offers
   * after the previous ones. The caller's model is never mutated.
   *
   * Throws a `GenerationError` when the model offers no usable command.
   */
  build(size: Size, seed: Seed): SequenceShrinker<C, R> {
    const [lengthSeed, commandSeed] = seed.split();
    const [length] = lengthSeed.nextInRange(
      this.config.minSequenceSize,
      this.config.maxSequenceSize
    );

    const model = this.model.clone();
    model.reset();

    const elements: Shrinkable<C>[] = [];
    let currentSeed = commandSeed;
    for (let i = 0; i < length; i++) {
      const [element, nextSeed] = chooseCommand(model.commands(), size, currentSeed);
      model.nextState(element.current());
      elements.push(element);
      currentSeed = nextSeed;
    }

    model.reset();
    return new SequenceShrinker(elements, model, this.config);
  }
}
