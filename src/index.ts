/**
 * le-fields - little-endian integer field decoding for binary-format readers.
 *
 * @packageDocumentation
 *
 * @example Reading a header
 * ```typescript
 * import { readUInt16LE, readUInt32LE, toBytes } from 'le-fields';
 *
 * const bytes = toBytes(await file.arrayBuffer());
 * const version = readUInt16LE(bytes, 6);
 * const size = readUInt32LE(bytes, 8);
 * ```
 *
 * @example Handling short buffers
 * ```typescript
 * import { OutOfBoundsError, readUInt32LE } from 'le-fields';
 *
 * try {
 *   readUInt32LE(bytes, offset);
 * } catch (e) {
 *   if (e instanceof OutOfBoundsError) {
 *     console.log(`need ${e.offset + e.width} bytes, have ${e.length}`);
 *   }
 * }
 * ```
 */

import { resetLogger } from './logger';

// ============================================================================
// READERS
// ============================================================================

export {
  readBigInt64LE,
  readBigUInt64LE,
  readInt16LE,
  readInt32LE,
  readInt8,
  readUInt16LE,
  readUInt32LE,
  readUInt64LEAsNumber,
  readUInt8,
} from './little-endian';

/** Accepted byte storage and raw input types */
export type { BinaryInput, ByteSequence } from './bytes';
export { toBytes } from './bytes';

// ============================================================================
// ERRORS
// ============================================================================

export { OutOfBoundsError } from './errors';

// ============================================================================
// CONSTANTS - field widths and value ranges
// ============================================================================

export {
  INT16_MAX,
  INT16_MIN,
  INT16_SIZE,
  INT32_MAX,
  INT32_MIN,
  INT32_SIZE,
  INT64_MAX,
  INT64_MIN,
  INT64_SIZE,
  INT8_MAX,
  INT8_MIN,
  INT8_SIZE,
  UINT16_MAX,
  UINT16_SIZE,
  UINT32_MAX,
  UINT32_SIZE,
  UINT64_MAX,
  UINT64_SIZE,
  UINT8_MAX,
  UINT8_SIZE,
} from './constants';

// ============================================================================
// CONFIGURATION - For custom logging
// ============================================================================

export type { Logger } from './logger';
export { enableDebugLogging, resetLogger, setLogger } from './logger';

// ============================================================================
// TESTING - For test isolation
// ============================================================================

/**
 * Resets module-level state. **For testing only.**
 * Restores the default logger.
 */
export function resetForTesting(): void {
  resetLogger();
}
