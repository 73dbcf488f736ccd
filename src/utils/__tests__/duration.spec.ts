import {
  fromMilliseconds,
  microseconds,
  milliseconds,
  nanoseconds,
  seconds,
  toMilliseconds,
  toTokens,
} from '../duration';
import { INFINITY_DURATION } from '../constants';

describe('duration helpers', () => {
  it('should build nanosecond durations', () => {
    expect(nanoseconds(7)).toBe(7n);
    expect(microseconds(3)).toBe(3_000n);
    expect(milliseconds(250)).toBe(250_000_000n);
    expect(seconds(2)).toBe(2_000_000_000n);
  });

  it('should accept fractional milliseconds', () => {
    expect(fromMilliseconds(1.5)).toBe(1_500_000n);
    expect(toMilliseconds(1_500_000n)).toBe(1.5);
    expect(toMilliseconds(milliseconds(250))).toBe(250);
  });

  it('should map infinite waits to the unbounded sentinel', () => {
    expect(fromMilliseconds(Infinity)).toBe(INFINITY_DURATION);
    expect(fromMilliseconds(1e300)).toBe(INFINITY_DURATION);
  });

  it('should reject NaN', () => {
    expect(() => fromMilliseconds(NaN)).toThrow(RangeError);
  });
});

describe('toTokens', () => {
  it('should pass bigints through and convert safe integers', () => {
    expect(toTokens(1n << 62n)).toBe(1n << 62n);
    expect(toTokens(3)).toBe(3n);
  });

  it.each([2.5, Number.MAX_SAFE_INTEGER + 1, NaN])(
    'should reject %p',
    (value) => {
      expect(() => toTokens(value)).toThrow(RangeError);
    },
  );
});
