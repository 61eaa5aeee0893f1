/**
 * Any indexable run of 8-bit units: Uint8Array, Int8Array, Buffer or number[].
 * Elements may be stored signed or unsigned; readers mask them to 0..255.
 */
export type ByteSequence = ArrayLike<number>;

export type BinaryInput = ByteSequence | ArrayBuffer | DataView;

// Brand checks rather than instanceof, so buffers from a vm context or
// another frame are recognized too.
function hasTag(input: BinaryInput, tag: string): boolean {
  return Object.prototype.toString.call(input) === `[object ${tag}]`;
}

function isDataView(input: BinaryInput): input is DataView {
  return hasTag(input, 'DataView');
}

function isArrayBuffer(input: BinaryInput): input is ArrayBuffer {
  return hasTag(input, 'ArrayBuffer') || hasTag(input, 'SharedArrayBuffer');
}

/**
 * Normalizes raw binary input into something the readers accept.
 * ArrayBuffer and DataView get a Uint8Array view over the same memory;
 * nothing is copied.
 */
export function toBytes(input: BinaryInput): ByteSequence {
  if (isDataView(input)) {
    return new Uint8Array(input.buffer, input.byteOffset, input.byteLength);
  }
  if (isArrayBuffer(input)) {
    return new Uint8Array(input);
  }
  return input;
}
