/**
 * Random source for generation: SplitMix64 over 64-bit BigInt state.
 *
 * A `Seed` never changes. Each draw hands back the value and the seed for
 * the following draw, and `split()` forks off an independent stream, so a
 * run is fully determined by the number it started from.
 */

const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const TWO_POW_32 = 0x100000000;
const TWO_POW_53 = 2 ** 53;

const u64 = (n: bigint): bigint => BigInt.asUintN(64, n);

export class Seed {
  constructor(
    public readonly state: bigint,
    public readonly gamma: bigint
  ) {}

  static fromNumber(value: number): Seed {
    const state = mix64(BigInt(Math.floor(value)));
    return new Seed(state, oddGamma(state));
  }

  static random(): Seed {
    return Seed.fromNumber(randomSeedValue());
  }

  /**
   * Fork into two streams. The first continues this one; the second starts
   * from the mixed output with a gamma of its own.
   */
  split(): [Seed, Seed] {
    const [output, next] = this.step();
    return [next, new Seed(output, oddGamma(output))];
  }

  nextUint32(): [number, Seed] {
    const [output, next] = this.step();
    // High half; the low bits of SplitMix64 output are the weaker ones.
    return [Number(output >> 32n), next];
  }

  /**
   * Draw an integer in [0, bound). Bounds up to 2^32 take one 32-bit draw;
   * larger ones, up to `Number.MAX_SAFE_INTEGER`, take the top 53 bits so
   * every value stays reachable.
   */
  nextBounded(bound: number): [number, Seed] {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new Error(`Invalid bound parameter: ${bound}. Bounds must be positive integers.`);
    }
    if (bound <= TWO_POW_32) {
      const [value, next] = this.nextUint32();
      return [Math.floor((value / TWO_POW_32) * bound), next];
    }
    const [output, next] = this.step();
    const fraction = Number(output >> 11n) / TWO_POW_53;
    return [Math.floor(fraction * bound), next];
  }

  /**
   * Draw an integer in [min, max], both ends inclusive.
   */
  nextInRange(min: number, max: number): [number, Seed] {
    if (min > max) {
      throw new Error(`Invalid range: [${min}, ${max}]`);
    }
    const [offset, next] = this.nextBounded(max - min + 1);
    return [min + offset, next];
  }

  nextBool(): [boolean, Seed] {
    const [output, next] = this.step();
    return [(output & 1n) === 1n, next];
  }

  /** In [0, 1). */
  nextFloat(): [number, Seed] {
    const [value, next] = this.nextUint32();
    return [value / TWO_POW_32, next];
  }

  equals(other: Seed): boolean {
    return this.state === other.state && this.gamma === other.gamma;
  }

  toString(): string {
    return `Seed(${this.state}, ${this.gamma})`;
  }

  private step(): [bigint, Seed] {
    const state = u64(this.state + this.gamma);
    return [mix64(state), new Seed(state, this.gamma)];
  }
}

/**
 * A random unsigned 32-bit integer, used when a run has no fixed seed.
 */
export function randomSeedValue(): number {
  return Math.floor(Math.random() * TWO_POW_32);
}

function mix64(value: bigint): bigint {
  let z = u64(value + GOLDEN_GAMMA);
  z = u64((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n);
  z = u64((z ^ (z >> 27n)) * 0x94d049bb133111ebn);
  return z ^ (z >> 31n);
}

// SplitMix64 needs an odd gamma for a full period.
function oddGamma(value: bigint): bigint {
  return u64((mix64(value) | 1n) * GOLDEN_GAMMA);
}
