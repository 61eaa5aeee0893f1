import { type Mock, vi } from 'vitest';
import type { Logger } from './logger';

/**
 * Encodes an integer into `width` little-endian bytes.
 * Negative numbers are encoded as two's complement of that width.
 */
export function encodeLE(value: number, width: number): Uint8Array {
  const out = new Uint8Array(width);
  let rest = value < 0 ? value + 2 ** (8 * width) : value;
  for (let i = 0; i < width; i++) {
    out[i] = rest % 256;
    rest = Math.floor(rest / 256);
  }
  return out;
}

export function encodeBigLE(value: bigint, width: number): Uint8Array {
  const out = new Uint8Array(width);
  let rest = BigInt.asUintN(8 * width, value);
  for (let i = 0; i < width; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

/** Copies `field` into a zeroed buffer at `offset`, with `padding` trailing bytes. */
export function embed(
  field: Uint8Array,
  offset: number,
  padding = 0,
): Uint8Array {
  const out = new Uint8Array(offset + field.length + padding);
  out.set(field, offset);
  return out;
}

type LogMethod = (message: string, ...args: unknown[]) => void;

export interface MockLogger extends Logger {
  debug: Mock<LogMethod>;
  warn: Mock<LogMethod>;
}

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
  };
}
