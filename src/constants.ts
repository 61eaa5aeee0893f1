// Field widths in bytes
export const UINT8_SIZE = 1;
export const INT8_SIZE = 1;
export const UINT16_SIZE = 2;
export const INT16_SIZE = 2;
export const UINT32_SIZE = 4;
export const INT32_SIZE = 4;
export const UINT64_SIZE = 8;
export const INT64_SIZE = 8;

// Value ranges
export const UINT8_MAX = 0xff;
export const INT8_MIN = -0x80;
export const INT8_MAX = 0x7f;
export const UINT16_MAX = 0xffff;
export const INT16_MIN = -0x8000;
export const INT16_MAX = 0x7fff;
export const UINT32_MAX = 0xffffffff;
export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT64_MAX = 0xffffffffffffffffn;
export const INT64_MIN = -0x8000000000000000n;
export const INT64_MAX = 0x7fffffffffffffffn;

/** Mask applied to every element before assembly, so signed storage reads as 0..255 */
export const BYTE_MASK = 0xff;
/** Multiplier for the high half of a 64-bit value decoded into a number */
export const UINT32_RANGE = 2 ** 32;
