/**
 * Error thrown when a field does not fit inside the buffer it is read from.
 *
 * Covers a negative or non-integer offset as well as `offset + width`
 * running past the end. Nothing is read when this is thrown.
 */
export class OutOfBoundsError extends RangeError {
  constructor(
    public readonly offset: number,
    public readonly width: number,
    public readonly length: number,
  ) {
    super(
      `Cannot read ${width} byte(s) at offset ${offset}: buffer length is ${length}`,
    );
    this.name = 'OutOfBoundsError';
  }
}
