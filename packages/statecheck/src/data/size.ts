/**
 * Size parameter for argument generation.
 *
 * The harness grows the size from 0 towards the configured limit over the
 * course of a run, so early trials draw smaller arguments.
 */
export class Size {
  constructor(readonly value: number) {
    if (value < 0) {
      throw new Error('Size must be non-negative');
    }
  }

  static of(value: number): Size {
    return new Size(value);
  }

  get(): number {
    return this.value;
  }

  toString(): string {
    return `Size(${this.value})`;
  }
}

/**
 * An inclusive integer range with the point that shrinking moves towards.
 */
export class Range {
  constructor(
    public readonly min: number,
    public readonly max: number,
    public readonly origin: number | null = null
  ) {
    if (min > max) {
      throw new Error('Range min must be <= max');
    }
  }

  static uniform(min: number, max: number): Range {
    return new Range(min, max);
  }

  static constant(value: number): Range {
    return new Range(value, value, value);
  }

  withOrigin(origin: number): Range {
    return new Range(this.min, this.max, origin);
  }

  /**
   * The origin clamped into the range; zero when none was given.
   */
  shrinkTarget(): number {
    const origin = this.origin ?? 0;
    return Math.max(this.min, Math.min(this.max, origin));
  }

  contains(value: number): boolean {
    return value >= this.min && value <= this.max;
  }
}
