/**
 * Reversible, step-at-a-time shrinking.
 *
 * A `Shrinkable` owns one generated value and walks towards simpler ones.
 * Callers alternate `simplify()` with an outside test of `current()`, and
 * call `complicate()` when the simplified value turned out not to reproduce
 * the failure.
 */

import { Gen } from './gen.js';
import { Seed } from './data/seed.js';
import { Size } from './data/size.js';
import { Tree } from './data/tree.js';

export interface Shrinkable<T> {
  /** The value at the current position. */
  current(): T;

  /**
   * Move to a simpler value. Returns false, leaving `current()` unchanged,
   * when nothing simpler is left to try.
   */
  simplify(): boolean;

  /**
   * Undo the last successful `simplify()`. Returns false when there is
   * nothing to undo.
   */
  complicate(): boolean;
}

interface Descent<T> {
  readonly parent: Tree<T>;
  readonly childIndex: number;
}

/**
 * Walks a shrink tree depth first.
 *
 * `simplify()` descends into the next untried child. `complicate()` climbs
 * back to the parent and marks that child as rejected, so the next
 * `simplify()` tries its sibling. Each node is visited at most once.
 */
export class TreeShrinkable<T> implements Shrinkable<T> {
  private node: Tree<T>;
  private nextChild = 0;
  private lastDescent: Descent<T> | null = null;

  constructor(tree: Tree<T>) {
    this.node = tree;
  }

  static fromGen<T>(gen: Gen<T>, size: Size, seed: Seed): TreeShrinkable<T> {
    return new TreeShrinkable(gen.generate(size, seed));
  }

  current(): T {
    return this.node.value;
  }

  simplify(): boolean {
    if (this.nextChild >= this.node.children.length) {
      return false;
    }
    this.lastDescent = { parent: this.node, childIndex: this.nextChild };
    this.node = this.node.children[this.nextChild];
    this.nextChild = 0;
    return true;
  }

  complicate(): boolean {
    if (this.lastDescent === null) {
      return false;
    }
    this.node = this.lastDescent.parent;
    this.nextChild = this.lastDescent.childIndex + 1;
    this.lastDescent = null;
    return true;
  }
}

/**
 * A value that never shrinks.
 */
export function fixed<T>(value: T): Shrinkable<T> {
  return new TreeShrinkable(Tree.singleton(value));
}
