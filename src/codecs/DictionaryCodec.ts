import { ByteCursor } from '../ByteCursor';
import { ByteWriter } from '../ByteWriter';
import { DecodeError } from '../DecodeError';
import type { DictionaryEntry, DictionaryValue, Value } from '../Value';
import { ByteStringCodec } from './ByteStringCodec';
import { Codec } from './Codec';
import { captureMeta, DecodedDictionary, DecodedDictionaryEntry, DecodedByteString } from './DecodedNode';
import {
  BYTE_DICTIONARY,
  BYTE_END,
  compareBytes,
  describeByte,
  expectMarker,
  isDigit,
  readContainerEnd,
  utf8Text,
} from '../helpers';

export interface DictionaryCodecOptions {
  /** Codec for the value of each entry. */
  valueCodec: Codec<Value>;
}

/**
 * Dictionary codec: `d(<byte string><value>)*e`.
 *
 * Encoding always sorts entries by key bytes, so equal dictionaries give
 * identical output whatever order their entries were built in. Decoding
 * accepts only strictly ascending keys; an out-of-order or repeated key
 * is rejected rather than re-sorted.
 */
export class DictionaryCodec implements Codec<DictionaryValue, DecodedDictionary> {
  private readonly keyCodec = new ByteStringCodec();
  private readonly valueCodec: Codec<Value>;

  constructor(options: DictionaryCodecOptions) {
    this.valueCodec = options.valueCodec;
  }

  encode(writer: ByteWriter, value: DictionaryValue): void {
    writer.writeByte(BYTE_DICTIONARY);
    for (const entry of sortedEntries(value)) {
      this.keyCodec.encode(writer, { kind: 'byteString', bytes: entry.key });
      this.valueCodec.encode(writer, entry.value);
    }
    writer.writeByte(BYTE_END);
  }

  decode(cursor: ByteCursor): DictionaryValue {
    const offset = expectMarker(cursor, BYTE_DICTIONARY, 'a dictionary');
    cursor.enter(offset);
    const entries: DictionaryEntry[] = [];
    let previousKey: Uint8Array | undefined;
    while (!readContainerEnd(cursor, offset, entries.length, 'dictionary')) {
      const keyOffset = this.checkKeyStart(cursor);
      const key = this.keyCodec.decode(cursor).bytes;
      this.checkKeyOrder(previousKey, key, keyOffset);
      entries.push({ key, value: this.valueCodec.decode(cursor) });
      previousKey = key;
    }
    cursor.leave();
    return { kind: 'dictionary', entries };
  }

  decodeWithMetadata(cursor: ByteCursor): DecodedDictionary {
    const offset = expectMarker(cursor, BYTE_DICTIONARY, 'a dictionary');
    cursor.enter(offset);
    const entries: DecodedDictionaryEntry[] = [];
    let previousKey: DecodedByteString | undefined;
    while (!readContainerEnd(cursor, offset, entries.length, 'dictionary')) {
      const keyOffset = this.checkKeyStart(cursor);
      const key = this.keyCodec.decodeWithMetadata(cursor);
      this.checkKeyOrder(previousKey?.value, key.value, keyOffset);
      entries.push({ key, value: this.valueCodec.decodeWithMetadata(cursor) });
      previousKey = key;
    }
    cursor.leave();
    return { kind: 'dictionary', value: entries, meta: captureMeta(cursor, offset) };
  }

  /** A key must be a byte string, so it has to start with a length digit. */
  private checkKeyStart(cursor: ByteCursor): number {
    const offset = cursor.offset;
    const next = cursor.peek();
    if (next === undefined || !isDigit(next)) {
      const found = next === undefined ? 'end of input' : describeByte(next);
      throw new DecodeError('NonStringDictKey', offset, `dictionary key must be a byte string, found ${found}`);
    }
    return offset;
  }

  private checkKeyOrder(previous: Uint8Array | undefined, key: Uint8Array, keyOffset: number): void {
    if (previous === undefined) return;
    const order = compareBytes(previous, key);
    if (order >= 0) {
      const problem = order === 0 ? 'duplicate key' : 'key out of order';
      throw new DecodeError(
        'UnsortedOrDuplicateKey',
        keyOffset,
        `${problem}: '${utf8Text(key)}' after '${utf8Text(previous)}'`,
      );
    }
  }
}

/** Entries of a dictionary in ascending key-byte order, as they go on the wire. */
export function sortedEntries(value: DictionaryValue): DictionaryEntry[] {
  return [...value.entries].sort((a, b) => compareBytes(a.key, b.key));
}
