/**
 * Shrink tree builders shared by the generators in `gen.ts`.
 */

import { Tree } from '../data/tree.js';

/**
 * Candidates between `origin` and `value`, closest to the origin first:
 * the origin itself, then `value` minus successive halvings of the
 * distance. `towards(0, 100)` is `[0, 50, 75, 88, 94, 97, 99]`.
 */
export function towards(origin: number, value: number): number[] {
  if (origin === value) {
    return [];
  }

  const candidates = [origin];
  let diff = Math.trunc(value / 2) - Math.trunc(origin / 2);
  while (diff !== 0) {
    const candidate = value - diff;
    if (candidate !== origin) {
      candidates.push(candidate);
    }
    diff = Math.trunc(diff / 2);
  }
  return candidates;
}

/**
 * An integer and, recursively, everything it can shrink to.
 */
export function numericTree(
  value: number,
  origin: number,
  isValid: (candidate: number) => boolean
): Tree<number> {
  return new Tree(value, () =>
    towards(origin, value)
      .filter(isValid)
      .map((candidate) => numericTree(candidate, origin, isValid))
  );
}

/**
 * A list built from per-element trees. Shrinks, in order: shorter prefixes
 * (shortest first), dropping one element, then shrinking one element.
 * No candidate is shorter than `minLength`.
 */
export function listTree<T>(elements: Tree<T>[], minLength: number): Tree<T[]> {
  return new Tree(
    elements.map((tree) => tree.value),
    () => {
      const shrinks: Tree<T[]>[] = [];
      for (let length = minLength; length < elements.length; length++) {
        shrinks.push(listTree(elements.slice(0, length), minLength));
      }
      if (elements.length > minLength) {
        // Dropping the last element is already the longest prefix.
        for (let i = 0; i < elements.length - 1; i++) {
          const rest = [...elements.slice(0, i), ...elements.slice(i + 1)];
          shrinks.push(listTree(rest, minLength));
        }
      }
      shrinks.push(
        ...replacements(elements).map((next) => listTree(next, minLength))
      );
      return shrinks;
    }
  );
}

/**
 * A fixed-length row of element trees, shrinking one position at a time.
 */
export function rowTree<T>(elements: Tree<T>[]): Tree<T[]> {
  return new Tree(
    elements.map((tree) => tree.value),
    () => replacements(elements).map((next) => rowTree(next))
  );
}

function replacements<T>(elements: Tree<T>[]): Tree<T>[][] {
  const result: Tree<T>[][] = [];
  elements.forEach((tree, index) => {
    for (const child of tree.children) {
      const next = [...elements];
      next[index] = child;
      result.push(next);
    }
  });
  return result;
}
