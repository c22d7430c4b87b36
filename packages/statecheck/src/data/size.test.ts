import { describe, test, expect } from 'vitest';
import { Size, Range } from './size.js';

describe('Size', () => {
  test('holds a non-negative value', () => {
    expect(Size.of(5).get()).toBe(5);
    expect(Size.of(0).toString()).toBe('Size(0)');
    expect(() => Size.of(-1)).toThrow('Size must be non-negative');
  });
});

describe('Range', () => {
  test('shrinks towards zero when it lies inside', () => {
    expect(Range.uniform(-10, 10).shrinkTarget()).toBe(0);
  });

  test('shrinks towards the nearest bound otherwise', () => {
    expect(Range.uniform(5, 10).shrinkTarget()).toBe(5);
    expect(Range.uniform(-10, -3).shrinkTarget()).toBe(-3);
  });

  test('an explicit origin is clamped into the range', () => {
    expect(Range.uniform(0, 10).withOrigin(4).shrinkTarget()).toBe(4);
    expect(Range.uniform(0, 10).withOrigin(40).shrinkTarget()).toBe(10);
    expect(Range.constant(7).shrinkTarget()).toBe(7);
  });

  test('contains its bounds', () => {
    const range = Range.uniform(1, 3);
    expect(range.contains(1)).toBe(true);
    expect(range.contains(3)).toBe(true);
    expect(range.contains(4)).toBe(false);
    expect(() => Range.uniform(3, 1)).toThrow('Range min must be <= max');
  });
});
