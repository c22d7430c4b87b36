import { describe, test, expect } from 'vitest';
import { Seed } from './seed.js';

describe('Seed', () => {
  test('creates seed from number', () => {
    const seed = Seed.fromNumber(42);
    expect(seed.toString()).toMatch(/^Seed\(\d+, \d+\)$/);
  });

  test('same number gives the same seed', () => {
    expect(Seed.fromNumber(7).equals(Seed.fromNumber(7))).toBe(true);
    expect(Seed.fromNumber(7).equals(Seed.fromNumber(8))).toBe(false);
  });

  test('gamma is always odd', () => {
    for (let i = 0; i < 20; i++) {
      expect(Seed.fromNumber(i).gamma % 2n).toBe(1n);
    }
  });

  test('splits seed into two independent seeds', () => {
    const original = Seed.fromNumber(42);
    const [left, right] = original.split();

    expect(left.equals(right)).toBe(false);
    expect(left.equals(original)).toBe(false);
    expect(right.equals(original)).toBe(false);
  });

  test('generates deterministic values', () => {
    const seed = Seed.fromNumber(42);
    const [value1, next1] = seed.nextUint32();
    const [value2, next2] = seed.nextUint32();

    expect(value1).toBe(value2);
    expect(next1.equals(next2)).toBe(true);
  });

  test('generates bounded values', () => {
    let seed = Seed.fromNumber(42);
    for (let i = 0; i < 200; i++) {
      const [value, next] = seed.nextBounded(10);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(10);
      seed = next;
    }
  });

  test('bounds above 2^32 reach values a 32-bit draw would skip', () => {
    let seed = Seed.fromNumber(42);
    const values: number[] = [];
    for (let i = 0; i < 50; i++) {
      const [value, next] = seed.nextBounded(2 ** 40);
      values.push(value);
      seed = next;
    }
    expect(values.every((value) => value >= 0 && value < 2 ** 40)).toBe(true);
    // A 32-bit draw scaled to 2^40 only ever lands on multiples of 256.
    expect(values.some((value) => value % 256 !== 0)).toBe(true);
    expect(values.some((value) => value >= 2 ** 32)).toBe(true);
  });

  test('nextInRange covers both ends of the range', () => {
    let seed = Seed.fromNumber(3);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const [value, next] = seed.nextInRange(2, 5);
      seen.add(value);
      seed = next;
    }
    expect([...seen].sort()).toEqual([2, 3, 4, 5]);
  });

  test('nextInRange with equal ends always returns that value', () => {
    const [value] = Seed.fromNumber(9).nextInRange(4, 4);
    expect(value).toBe(4);
  });

  test('rejects invalid bounds', () => {
    const seed = Seed.fromNumber(42);
    expect(() => seed.nextBounded(0)).toThrow(/Invalid bound parameter: 0/);
    expect(() => seed.nextBounded(-5)).toThrow(/Invalid bound parameter: -5/);
    expect(() => seed.nextBounded(NaN)).toThrow(/Invalid bound parameter: NaN/);
    expect(() => seed.nextBounded(2.5)).toThrow(/Invalid bound parameter: 2.5/);
    expect(() => seed.nextBounded(2 ** 53)).toThrow(/Invalid bound parameter/);
    expect(() => seed.nextInRange(3, 1)).toThrow('Invalid range: [3, 1]');
  });

  test('generates float values in [0, 1)', () => {
    const [float] = Seed.fromNumber(42).nextFloat();
    expect(float).toBeGreaterThanOrEqual(0);
    expect(float).toBeLessThan(1);
  });

  test('generates boolean values', () => {
    const [bool, next] = Seed.fromNumber(42).nextBool();
    expect(typeof bool).toBe('boolean');
    expect(next.equals(Seed.fromNumber(42))).toBe(false);
  });
});
