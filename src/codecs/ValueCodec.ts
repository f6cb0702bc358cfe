import { ByteCursor } from '../ByteCursor';
import { ByteWriter } from '../ByteWriter';
import { DecodeError } from '../DecodeError';
import type { Value } from '../Value';
import { ByteStringCodec } from './ByteStringCodec';
import { Codec } from './Codec';
import type { DecodedNode } from './DecodedNode';
import { DictionaryCodec, sortedEntries } from './DictionaryCodec';
import { IntegerCodec } from './IntegerCodec';
import { ListCodec } from './ListCodec';
import { BYTE_DICTIONARY, BYTE_END, BYTE_INTEGER, BYTE_LIST, describeByte, isDigit } from '../helpers';

type VariantCodec = ByteStringCodec | IntegerCodec | ListCodec | DictionaryCodec;

/**
 * Codec for any value. Decoding picks the production from one byte of
 * lookahead: a digit starts a byte string, `i` an integer, `l` a list,
 * `d` a dictionary.
 */
export class ValueCodec implements Codec<Value> {
  readonly byteString = new ByteStringCodec();
  readonly integer = new IntegerCodec();
  readonly list: ListCodec = new ListCodec({ itemCodec: this });
  readonly dictionary: DictionaryCodec = new DictionaryCodec({ valueCodec: this });

  /**
   * Containers are expanded onto an explicit work stack rather than by
   * recursion, so trees of any depth encode.
   */
  encode(writer: ByteWriter, value: Value): void {
    // A number on the stack is a terminator byte still to be written.
    const pending: (Value | number)[] = [value];
    let next = pending.pop();
    while (next !== undefined) {
      if (typeof next === 'number') {
        writer.writeByte(next);
      } else {
        switch (next.kind) {
          case 'byteString':
            this.byteString.encode(writer, next);
            break;
          case 'integer':
            this.integer.encode(writer, next);
            break;
          case 'list':
            writer.writeByte(BYTE_LIST);
            pending.push(BYTE_END);
            for (let i = next.items.length - 1; i >= 0; i--) {
              pending.push(next.items[i]);
            }
            break;
          case 'dictionary': {
            writer.writeByte(BYTE_DICTIONARY);
            pending.push(BYTE_END);
            const entries = sortedEntries(next);
            for (let i = entries.length - 1; i >= 0; i--) {
              pending.push(entries[i].value, { kind: 'byteString', bytes: entries[i].key });
            }
            break;
          }
        }
      }
      next = pending.pop();
    }
  }

  decode(cursor: ByteCursor): Value {
    return this.select(cursor).decode(cursor);
  }

  decodeWithMetadata(cursor: ByteCursor): DecodedNode {
    return this.select(cursor).decodeWithMetadata(cursor);
  }

  private select(cursor: ByteCursor): VariantCodec {
    const next = cursor.peek();
    if (next === undefined) {
      throw new DecodeError('UnexpectedEof', cursor.offset, 'input ended where a value was expected');
    }
    if (isDigit(next)) return this.byteString;
    switch (next) {
      case BYTE_INTEGER:
        return this.integer;
      case BYTE_LIST:
        return this.list;
      case BYTE_DICTIONARY:
        return this.dictionary;
      default:
        throw new DecodeError('InvalidTypePrefix', cursor.offset, `${describeByte(next)} does not start a value`);
    }
  }
}

/**
 * Decode one value that must span the whole input.
 * Bytes left after it are TrailingData.
 */
export function decodeComplete<N>(cursor: ByteCursor, read: (cursor: ByteCursor) => N): N {
  const result = read(cursor);
  if (cursor.remaining > 0) {
    throw new DecodeError(
      'TrailingData',
      cursor.offset,
      `${cursor.remaining} byte(s) left after a complete value`,
    );
  }
  return result;
}
