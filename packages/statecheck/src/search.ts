/**
 * Two-phase shrink search over a generated command sequence.
 *
 * The delete phase walks the positions once, excluding one command per
 * step. The shrink phase then walks them again, simplifying each remaining
 * command through its own `Shrinkable` until it is locally exhausted.
 * Positions are never renumbered: excluded commands keep their slot.
 */

import type { Config } from './config.js';
import type { StateMachine } from './model.js';
import { CommandSequence } from './sequence.js';
import type { Shrinkable } from './shrinkable.js';

export type ShrinkPhase =
  | { readonly kind: 'delete'; readonly index: number }
  | { readonly kind: 'shrink'; readonly index: number }
  | { readonly kind: 'exhausted' };

type ShrinkStep =
  | { readonly kind: 'delete'; readonly index: number }
  | { readonly kind: 'shrink'; readonly index: number };

export type ShrinkOptions = Pick<Config, 'shrinkCommands' | 'minShrinkLength'>;

export class SequenceShrinker<C, R> implements Shrinkable<CommandSequence<C, R>> {
  private readonly included: boolean[];
  private retained = 0;
  private state: ShrinkPhase = { kind: 'delete', index: 0 };
  private lastStep: ShrinkStep | null = null;

  /**
   * @param model replayed from its reset state by every sequence this
   *   search hands out
   */
  constructor(
    private readonly elements: ReadonlyArray<Shrinkable<C>>,
    private readonly model: StateMachine<C, R>,
    private readonly options: ShrinkOptions
  ) {
    this.included = elements.map(() => true);
    this.retained = elements.length;
  }

  /** Number of generated commands, included or not. */
  get length(): number {
    return this.elements.length;
  }

  get includedCount(): number {
    return this.retained;
  }

  get phase(): ShrinkPhase {
    return this.state;
  }

  current(): CommandSequence<C, R> {
    const commands: C[] = [];
    this.elements.forEach((element, index) => {
      if (this.included[index]) {
        commands.push(element.current());
      }
    });
    const model = this.model.clone();
    model.reset();
    return new CommandSequence(commands, model);
  }

  simplify(): boolean {
    if (this.state.kind === 'delete') {
      let index = this.state.index;
      while (index < this.elements.length && !this.included[index]) {
        index++;
      }

      if (index >= this.elements.length || this.retained <= this.options.minShrinkLength) {
        this.state = this.options.shrinkCommands
          ? { kind: 'shrink', index: 0 }
          : { kind: 'exhausted' };
      } else {
        this.included[index] = false;
        this.retained--;
        this.lastStep = { kind: 'delete', index };
        this.state = { kind: 'delete', index: index + 1 };
        return true;
      }
    }

    if (this.state.kind === 'shrink') {
      let index = this.state.index;
      while (index < this.elements.length) {
        if (this.included[index] && this.elements[index].simplify()) {
          this.lastStep = { kind: 'shrink', index };
          this.state = { kind: 'shrink', index };
          return true;
        }
        index++;
      }
      this.state = { kind: 'exhausted' };
    }

    return false;
  }

  complicate(): boolean {
    const step = this.lastStep;
    if (step === null) {
      return false;
    }

    if (step.kind === 'delete') {
      this.included[step.index] = true;
      this.retained++;
      this.lastStep = null;
      return true;
    }

    if (this.elements[step.index].complicate()) {
      return true;
    }
    this.lastStep = null;
    return false;
  }
}
