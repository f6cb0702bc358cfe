import type { ByteCursor } from '../ByteCursor';
import type { ByteWriter } from '../ByteWriter';
import type { DecodedNode } from './DecodedNode';

/**
 * Base interface for all bencode codecs.
 * @template T The value variant this codec encodes/decodes.
 * @template N The metadata node produced by decodeWithMetadata.
 */
export interface Codec<T, N extends DecodedNode = DecodedNode> {
  /** Encode a value into the writer. Never fails on a well-formed value. */
  encode(writer: ByteWriter, value: T): void;

  /** Decode a value from the cursor at its current offset. Throws DecodeError. */
  decode(cursor: ByteCursor): T;

  /** Decode a value with metadata (byte offset, length, raw encoding). */
  decodeWithMetadata(cursor: ByteCursor): N;
}
