import { describe, expect, it } from 'vitest';
import {
  INT16_MAX,
  INT16_MIN,
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  INT8_MAX,
  INT8_MIN,
  UINT16_MAX,
  UINT16_SIZE,
  UINT32_MAX,
  UINT32_RANGE,
  UINT32_SIZE,
  UINT64_MAX,
  UINT64_SIZE,
  UINT8_MAX,
  UINT8_SIZE,
} from './constants';

describe('field widths', () => {
  it('unsigned maxima fill exactly the field width', () => {
    expect(UINT8_MAX).toBe(2 ** (8 * UINT8_SIZE) - 1);
    expect(UINT16_MAX).toBe(2 ** (8 * UINT16_SIZE) - 1);
    expect(UINT32_MAX).toBe(2 ** (8 * UINT32_SIZE) - 1);
    expect(UINT64_MAX).toBe(2n ** BigInt(8 * UINT64_SIZE) - 1n);
  });

  it('UINT32_RANGE is one past UINT32_MAX', () => {
    expect(UINT32_RANGE).toBe(UINT32_MAX + 1);
  });
});

describe('signed ranges', () => {
  it('minimum is one below the negated maximum', () => {
    expect(INT8_MIN).toBe(-INT8_MAX - 1);
    expect(INT16_MIN).toBe(-INT16_MAX - 1);
    expect(INT32_MIN).toBe(-INT32_MAX - 1);
    expect(INT64_MIN).toBe(-INT64_MAX - 1n);
  });

  it('match the typed-array limits', () => {
    expect(new Int8Array([INT8_MAX + 1])[0]).toBe(INT8_MIN);
    expect(new Int16Array([INT16_MAX + 1])[0]).toBe(INT16_MIN);
    expect(new Int32Array([INT32_MAX + 1])[0]).toBe(INT32_MIN);
    expect(BigInt.asIntN(64, INT64_MAX + 1n)).toBe(INT64_MIN);
  });
});
