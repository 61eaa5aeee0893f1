import type { ByteSequence } from './bytes';
import {
  BYTE_MASK,
  INT16_SIZE,
  INT32_SIZE,
  INT64_SIZE,
  INT8_SIZE,
  UINT16_SIZE,
  UINT32_RANGE,
  UINT32_SIZE,
  UINT64_SIZE,
  UINT8_SIZE,
} from './constants';
import { OutOfBoundsError } from './errors';
import { logPrecisionLoss, logRejectedRead } from './logger';

function assertInBounds(
  bytes: ByteSequence,
  offset: number,
  width: number,
): void {
  // Negated <= so a missing or NaN length rejects the read
  if (
    !Number.isInteger(offset) ||
    offset < 0 ||
    !(offset + width <= bytes.length)
  ) {
    logRejectedRead(offset, width, bytes.length);
    throw new OutOfBoundsError(offset, width, bytes.length);
  }
}

// Callers check bounds first
function byteAt(bytes: ByteSequence, index: number): number {
  return bytes[index]! & BYTE_MASK;
}

function uint16At(bytes: ByteSequence, offset: number): number {
  return byteAt(bytes, offset) | (byteAt(bytes, offset + 1) << 8);
}

function uint32At(bytes: ByteSequence, offset: number): number {
  // >>> 0 keeps bit 31 from turning the result negative
  return (
    (byteAt(bytes, offset) |
      (byteAt(bytes, offset + 1) << 8) |
      (byteAt(bytes, offset + 2) << 16) |
      (byteAt(bytes, offset + 3) << 24)) >>>
    0
  );
}

function bigUint64At(bytes: ByteSequence, offset: number): bigint {
  const low = BigInt(uint32At(bytes, offset));
  const high = BigInt(uint32At(bytes, offset + 4));
  return (high << 32n) | low;
}

export function readUInt8(bytes: ByteSequence, offset: number): number {
  assertInBounds(bytes, offset, UINT8_SIZE);
  return byteAt(bytes, offset);
}

export function readInt8(bytes: ByteSequence, offset: number): number {
  assertInBounds(bytes, offset, INT8_SIZE);
  return (byteAt(bytes, offset) << 24) >> 24;
}

export function readUInt16LE(bytes: ByteSequence, offset: number): number {
  assertInBounds(bytes, offset, UINT16_SIZE);
  return uint16At(bytes, offset);
}

export function readInt16LE(bytes: ByteSequence, offset: number): number {
  assertInBounds(bytes, offset, INT16_SIZE);
  return (uint16At(bytes, offset) << 16) >> 16;
}

export function readUInt32LE(bytes: ByteSequence, offset: number): number {
  assertInBounds(bytes, offset, UINT32_SIZE);
  return uint32At(bytes, offset);
}

export function readInt32LE(bytes: ByteSequence, offset: number): number {
  assertInBounds(bytes, offset, INT32_SIZE);
  return uint32At(bytes, offset) | 0;
}

export function readBigUInt64LE(bytes: ByteSequence, offset: number): bigint {
  assertInBounds(bytes, offset, UINT64_SIZE);
  return bigUint64At(bytes, offset);
}

export function readBigInt64LE(bytes: ByteSequence, offset: number): bigint {
  assertInBounds(bytes, offset, INT64_SIZE);
  return BigInt.asIntN(64, bigUint64At(bytes, offset));
}

/**
 * Reads an unsigned 64-bit field into a plain number.
 *
 * Sizes and offsets in archive and image headers rarely need more than
 * 53 bits, so this avoids bigint at call sites. Values above
 * `Number.MAX_SAFE_INTEGER` are still returned, rounded to the nearest
 * double, and a warning goes to the logger.
 */
export function readUInt64LEAsNumber(
  bytes: ByteSequence,
  offset: number,
): number {
  assertInBounds(bytes, offset, UINT64_SIZE);
  const value =
    uint32At(bytes, offset + 4) * UINT32_RANGE + uint32At(bytes, offset);
  if (value > Number.MAX_SAFE_INTEGER) {
    logPrecisionLoss(offset);
  }
  return value;
}
