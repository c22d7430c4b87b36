import { describe, test, expect } from 'vitest';
import {
  ConfigError,
  GenerationError,
  PostconditionError,
  StatefulError,
  SystemUnderTestError,
  isRunError,
} from './errors.js';
import { expectEqual } from './model.js';

describe('errors', () => {
  test('postcondition message names the command and both results', () => {
    const error = new PostconditionError({ type: 'get', key: 1 }, 7, null);
    expect(error.message).toBe(
      'Postcondition does not hold. Command: {"type":"get","key":1}. Expected result: 7. Actual result: null'
    );
    expect(error.kind).toBe('postcondition');
    expect(error.name).toBe('PostconditionError');
    expect(error).toBeInstanceOf(StatefulError);
  });

  test('system errors keep the command, position and cause', () => {
    const cause = new RangeError('disk full');
    const error = new SystemUnderTestError('write', 3, cause);
    expect(error.message).toBe('System under test failed. Command: "write". Error: disk full');
    expect(error.index).toBe(3);
    expect(error.cause).toBe(cause);
    expect(error.kind).toBe('system-under-test');
  });

  test('non-error causes are rendered as values', () => {
    const error = new SystemUnderTestError(1n, 0, { code: 5 });
    expect(error.message).toBe('System under test failed. Command: 1n. Error: {"code":5}');
  });

  test('only run failures count as counterexamples', () => {
    expect(isRunError(new PostconditionError('a', 1, 2))).toBe(true);
    expect(isRunError(new SystemUnderTestError('a', 0, 'x'))).toBe(true);
    expect(isRunError(new GenerationError('no commands'))).toBe(false);
    expect(isRunError(new ConfigError(['x: bad']))).toBe(false);
    expect(isRunError(new Error('other'))).toBe(false);
  });
});

describe('expectEqual', () => {
  test('accepts equal primitives and structures', () => {
    expect(() => expectEqual('cmd', 1, 1)).not.toThrow();
    expect(() => expectEqual('cmd', null, null)).not.toThrow();
    expect(() => expectEqual('cmd', NaN, NaN)).not.toThrow();
    expect(() => expectEqual('cmd', { a: [1, 2] }, { a: [1, 2] })).not.toThrow();
  });

  test('rejects differing values with a postcondition error', () => {
    expect(() => expectEqual('cmd', 1, 2)).toThrow(
      'Postcondition does not hold. Command: "cmd". Expected result: 1. Actual result: 2'
    );
    expect(() => expectEqual('cmd', null, 0)).toThrow(PostconditionError);
    expect(() => expectEqual('cmd', [1, 2], [2, 1])).toThrow(PostconditionError);
  });

  test('ignores the order of object keys', () => {
    expect(() => expectEqual('cmd', { a: 1, b: 2 }, { b: 2, a: 1 })).not.toThrow();
    expect(() => expectEqual('cmd', { a: 1 }, { a: 1, b: undefined })).toThrow(
      PostconditionError
    );
  });

  test('compares maps and sets by their contents', () => {
    expect(() => expectEqual('cmd', new Map([[1, 1]]), new Map())).toThrow(PostconditionError);
    expect(() => expectEqual('cmd', new Map([[1, 1]]), new Map([[1, 2]]))).toThrow(
      PostconditionError
    );
    expect(() =>
      expectEqual('cmd', new Map([[1, { v: [1] }]]), new Map([[1, { v: [1] }]]))
    ).not.toThrow();
    expect(() => expectEqual('cmd', new Map([[{ k: 1 }, 'x']]), new Map([[{ k: 1 }, 'x']]))).not.toThrow();
    expect(() => expectEqual('cmd', new Set([1, 2]), new Set([2, 1]))).not.toThrow();
    expect(() => expectEqual('cmd', new Set([1]), new Set([2]))).toThrow(PostconditionError);
    expect(() => expectEqual('cmd', new Map(), {})).toThrow(PostconditionError);
  });

  test('compares bigints inside structures without throwing', () => {
    expect(() => expectEqual('cmd', { a: 1n }, { a: 1n })).not.toThrow();
    expect(() => expectEqual('cmd', { a: 1n }, { a: 2n })).toThrow(
      'Postcondition does not hold. Command: "cmd". Expected result: {"a":"1n"}. Actual result: {"a":"2n"}'
    );
  });
});
