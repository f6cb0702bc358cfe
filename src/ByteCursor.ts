import { DecodeError } from './DecodeError';

export const DEFAULT_MAX_DEPTH = 512;

/**
 * Largest `maxDepth` a cursor accepts. Decoding recurses once per open
 * container, so this keeps the deepest accepted input inside the call stack.
 */
export const MAX_SUPPORTED_DEPTH = 2048;

export interface ByteCursorOptions {
  /** Deepest container nesting accepted (default: 512, at most 2048). */
  maxDepth?: number;
}

/**
 * Forward-only reader over an immutable byte array.
 * Tracks container nesting so the recursive decoders can refuse
 * input nested deeper than `maxDepth`.
 */
export class ByteCursor {
  private readonly _data: Uint8Array;
  private readonly _maxDepth: number;
  private _offset: number;
  private _depth: number;

  private constructor(data: Uint8Array, maxDepth: number) {
    this._data = data;
    this._maxDepth = maxDepth;
    this._offset = 0;
    this._depth = 0;
  }

  /** Wrap bytes for reading. The array is not copied and must not change while read. */
  static from(data: Uint8Array, options?: ByteCursorOptions): ByteCursor {
    const maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
    assertMaxDepth(maxDepth);
    return new ByteCursor(data, maxDepth);
  }

  /** Total number of bytes. */
  get length(): number {
    return this._data.length;
  }

  /** Current read position. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this._data.length - this._offset;
  }

  /** Number of containers currently open. */
  get depth(): number {
    return this._depth;
  }

  get maxDepth(): number {
    return this._maxDepth;
  }

  /** Next byte without consuming it, or undefined at end of input. */
  peek(): number | undefined {
    return this._offset < this._data.length ? this._data[this._offset] : undefined;
  }

  /** Consume one byte. */
  readByte(what: string): number {
    if (this._offset >= this._data.length) {
      throw new DecodeError('UnexpectedEof', this._offset, `input ended while reading ${what}`);
    }
    return this._data[this._offset++];
  }

  /** Consume `count` bytes and return a copy of them. */
  readBytes(count: number, what: string): Uint8Array {
    if (count > this.remaining) {
      throw new DecodeError(
        'UnexpectedEof',
        this._data.length,
        `${what} needs ${count} bytes but only ${this.remaining} remain`,
      );
    }
    const start = this._offset;
    this._offset += count;
    return this._data.slice(start, this._offset);
  }

  /** Copy of the bytes in [start, end), for metadata. */
  extract(start: number, end: number): Uint8Array {
    return this._data.slice(start, end);
  }

  /**
   * Record entry into a list or dictionary whose opening marker sits at `markerOffset`.
   * Throws NestingTooDeep when this would exceed the depth bound.
   */
  enter(markerOffset: number): void {
    if (this._depth >= this._maxDepth) {
      throw new DecodeError(
        'NestingTooDeep',
        markerOffset,
        `containers nested deeper than the limit of ${this._maxDepth}`,
      );
    }
    this._depth++;
  }

  /** Record leaving the innermost container. */
  leave(): void {
    this._depth--;
  }
}

/** @throws Error unless maxDepth is an integer in [1, MAX_SUPPORTED_DEPTH] */
export function assertMaxDepth(maxDepth: number): void {
  if (!Number.isSafeInteger(maxDepth) || maxDepth < 1) {
    throw new Error(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  if (maxDepth > MAX_SUPPORTED_DEPTH) {
    throw new Error(`maxDepth must be at most ${MAX_SUPPORTED_DEPTH}, got ${maxDepth}`);
  }
}
