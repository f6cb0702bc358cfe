import { assertMaxDepth, ByteCursor, ByteCursorOptions, DEFAULT_MAX_DEPTH } from './ByteCursor';
import { ByteWriter } from './ByteWriter';
import { captureDecode, DecodeResult } from './DecodeError';
import type { DecodedNode } from './codecs/DecodedNode';
import { decodeComplete, ValueCodec } from './codecs/ValueCodec';
import { fromHex, toBytes } from './helpers';
import type { Value } from './Value';

export type DecodeOptions = ByteCursorOptions;

/**
 * High-level codec with fixed decode options.
 * Encodes values to Uint8Array and decodes Uint8Array back to values.
 *
 * Decode methods return a DecodeResult; malformed input never throws.
 */
export class BencodeCodec {
  private readonly _codec = new ValueCodec();
  private readonly _maxDepth: number;

  constructor(options?: DecodeOptions) {
    this._maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
    assertMaxDepth(this._maxDepth);
  }

  get maxDepth(): number {
    return this._maxDepth;
  }

  /** Encode a value to its canonical bytes. */
  encode(value: Value): Uint8Array {
    const writer = ByteWriter.alloc();
    this._codec.encode(writer, value);
    return writer.toUint8Array();
  }

  /** Encode a value and return hex string. */
  encodeToHex(value: Value): string {
    const writer = ByteWriter.alloc();
    this._codec.encode(writer, value);
    return writer.toHex();
  }

  /** Decode bytes (or a string, UTF-8 encoded first) that hold exactly one value. */
  decode(data: Uint8Array | string): DecodeResult<Value> {
    return captureDecode(() => decodeComplete(this.cursor(data), c => this._codec.decode(c)));
  }

  /** Decode a hex string back to a value. */
  decodeFromHex(hex: string): DecodeResult<Value> {
    return this.decode(fromHex(hex));
  }

  /** Like decode, but throws the DecodeError instead of returning it. */
  decodeOrThrow(data: Uint8Array | string): Value {
    return decodeComplete(this.cursor(data), c => this._codec.decode(c));
  }

  /** Decode with byte offsets and raw encodings for every node. */
  decodeWithMetadata(data: Uint8Array | string): DecodeResult<DecodedNode> {
    return captureDecode(() => decodeComplete(this.cursor(data), c => this._codec.decodeWithMetadata(c)));
  }

  /** Access the underlying value codec. */
  get codec(): ValueCodec {
    return this._codec;
  }

  private cursor(data: Uint8Array | string): ByteCursor {
    return ByteCursor.from(toBytes(data), { maxDepth: this._maxDepth });
  }
}
