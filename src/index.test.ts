import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  OutOfBoundsError,
  readInt8,
  readUInt16LE,
  readUInt32LE,
  readUInt64LEAsNumber,
  readUInt8,
  resetForTesting,
  setLogger,
  toBytes,
} from './index';

describe('package entry point', () => {
  afterEach(() => {
    resetForTesting();
  });

  it('decodes consecutive header fields with caller-tracked offsets', () => {
    // type(u8) version(i8) count(u16) size(u32)
    const header = toBytes(
      new Uint8Array([0x01, 0xfe, 0x10, 0x00, 0x00, 0x10, 0x00, 0x00]).buffer,
    );
    let offset = 0;
    const type = readUInt8(header, offset);
    offset += 1;
    const version = readInt8(header, offset);
    offset += 1;
    const count = readUInt16LE(header, offset);
    offset += 2;
    const size = readUInt32LE(header, offset);

    expect({ type, version, count, size }).toEqual({
      type: 1,
      version: -2,
      count: 16,
      size: 4096,
    });
  });

  it('surfaces OutOfBoundsError for a truncated buffer', () => {
    expect(() => readUInt32LE(toBytes(new ArrayBuffer(3)), 0)).toThrow(
      OutOfBoundsError,
    );
  });
});

describe('resetForTesting', () => {
  it('restores the default logger', () => {
    const warn = vi.fn();
    const originalConsoleWarn = console.warn;
    console.warn = vi.fn();
    setLogger({ warn });

    try {
      resetForTesting();
      readUInt64LEAsNumber(new Uint8Array(8).fill(0xff), 0);

      expect(warn).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
    } finally {
      console.warn = originalConsoleWarn;
    }
  });
});
