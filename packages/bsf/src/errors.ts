/**
 * Typed error classes for the chunk decoder.
 *
 * Every error records the absolute byte offset (within the buffer handed to
 * the parser) at which decoding stopped.
 */

/** Base class for all decode errors. */
export class BsfDecodeError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = 'BsfDecodeError';
  }
}

/** Fewer bytes remain than a fixed-size field needs. */
export class TruncatedInputError extends BsfDecodeError {
  constructor(
    offset: number,
    public readonly needed: number,
    public readonly available: number,
  ) {
    super(`Truncated input at offset ${offset}: needed ${needed} byte(s), ${available} available`, offset);
    this.name = 'TruncatedInputError';
  }
}

/** A chunk header declares a payload larger than the bytes that follow it. */
export class BoundsError extends BsfDecodeError {
  constructor(
    offset: number,
    public readonly chunkType: number,
    public readonly declaredSize: number,
    public readonly available: number,
  ) {
    super(
      `Chunk 0x${chunkType.toString(16).padStart(8, '0')} at offset ${offset} declares ${declaredSize} ` +
        `byte(s) but only ${available} remain`,
      offset,
    );
    this.name = 'BoundsError';
  }
}

/** A byte or nibble does not map to any defined enumerator. */
export class InvalidEnumValueError extends BsfDecodeError {
  constructor(
    offset: number,
    public readonly enumName: string,
    public readonly value: number,
  ) {
    super(`Invalid ${enumName} value ${value} at offset ${offset}`, offset);
    this.name = 'InvalidEnumValueError';
  }
}
