/**
 * A rose tree containing a value and its shrink candidates.
 *
 * Children are expanded on first access, so deep shrink trees cost only
 * what a shrinker actually visits. Children are ordered from most to least
 * aggressive reduction; a `TreeShrinkable` walks them left to right.
 */
export class Tree<T> {
  private expand: (() => Tree<T>[]) | null;
  private expanded: Tree<T>[] | null = null;

  constructor(
    public readonly value: T,
    children: Tree<T>[] | (() => Tree<T>[]) = []
  ) {
    this.expand = typeof children === 'function' ? children : () => children;
  }

  static singleton<T>(value: T): Tree<T> {
    return new Tree(value);
  }

  static withChildren<T>(
    value: T,
    children: Tree<T>[] | (() => Tree<T>[])
  ): Tree<T> {
    return new Tree(value, children);
  }

  get children(): Tree<T>[] {
    if (this.expanded === null) {
      this.expanded = this.expand === null ? [] : this.expand();
      this.expand = null;
    }
    return this.expanded;
  }

  map<U>(f: (value: T) => U): Tree<U> {
    return new Tree(f(this.value), () =>
      this.children.map((child) => child.map(f))
    );
  }

  /**
   * Substitute every value with a tree built from it. Shrinks of the inner
   * tree come first, then those of the outer one.
   */
  bind<U>(f: (value: T) => Tree<U>): Tree<U> {
    const inner = f(this.value);
    return new Tree(inner.value, () => [
      ...inner.children,
      ...this.children.map((child) => child.bind(f)),
    ]);
  }

  /**
   * Keep only nodes satisfying the predicate; null when the root fails.
   */
  filter(predicate: (value: T) => boolean): Tree<T> | null {
    if (!predicate(this.value)) {
      return null;
    }
    return new Tree(this.value, () =>
      this.children
        .map((child) => child.filter(predicate))
        .filter((child): child is Tree<T> => child !== null)
    );
  }

  /**
   * All shrink values in breadth-first order. Expands the whole tree, so
   * only meant for small ones.
   */
  shrinks(): T[] {
    const result: T[] = [];
    const queue: Tree<T>[] = [...this.children];
    for (let tree = queue.shift(); tree !== undefined; tree = queue.shift()) {
      result.push(tree.value);
      queue.push(...tree.children);
    }
    return result;
  }

  hasShrinks(): boolean {
    return this.children.length > 0;
  }

  countNodes(): number {
    return (
      1 + this.children.reduce((sum, child) => sum + child.countNodes(), 0)
    );
  }

  toString(): string {
    if (this.children.length === 0) {
      return `Tree(${this.value})`;
    }
    return `Tree(${this.value}, [${this.children.map((c) => c.toString()).join(', ')}])`;
  }
}
