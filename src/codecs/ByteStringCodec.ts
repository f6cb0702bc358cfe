import { ByteCursor } from '../ByteCursor';
import { ByteWriter } from '../ByteWriter';
import { DecodeError } from '../DecodeError';
import type { ByteStringValue } from '../Value';
import { Codec } from './Codec';
import { captureMeta, DecodedByteString } from './DecodedNode';
import { BYTE_COLON, BYTE_ZERO, describeByte, isDigit } from '../helpers';

/**
 * Byte string codec: `<length>:<raw bytes>`.
 * The length is decimal with no leading zero unless it is exactly `0`.
 */
export class ByteStringCodec implements Codec<ByteStringValue, DecodedByteString> {
  encode(writer: ByteWriter, value: ByteStringValue): void {
    writer.writeAscii(`${value.bytes.length}:`);
    writer.writeBytes(value.bytes);
  }

  decode(cursor: ByteCursor): ByteStringValue {
    const length = this.decodeLength(cursor);
    return { kind: 'byteString', bytes: cursor.readBytes(length, 'byte string content') };
  }

  decodeWithMetadata(cursor: ByteCursor): DecodedByteString {
    const offset = cursor.offset;
    const length = this.decodeLength(cursor);
    const value = cursor.readBytes(length, 'byte string content');
    return { kind: 'byteString', value, meta: captureMeta(cursor, offset) };
  }

  /** Read the length prefix up to and including the ':' separator. */
  private decodeLength(cursor: ByteCursor): number {
    const start = cursor.offset;
    const first = cursor.readByte('a byte string length');
    if (!isDigit(first)) {
      throw new DecodeError('InvalidLength', start, `expected a length digit, found ${describeByte(first)}`);
    }

    let length = first - BYTE_ZERO;
    for (;;) {
      const at = cursor.offset;
      const byte = cursor.readByte('a byte string length');
      if (byte === BYTE_COLON) return length;
      if (!isDigit(byte)) {
        throw new DecodeError('InvalidLength', at, `expected a digit or ':', found ${describeByte(byte)}`);
      }
      if (first === BYTE_ZERO) {
        throw new DecodeError('InvalidLength', start, 'length has a leading zero');
      }
      length = length * 10 + (byte - BYTE_ZERO);
      if (length > Number.MAX_SAFE_INTEGER) {
        throw new DecodeError('InvalidLength', start, 'length is too large');
      }
    }
  }
}
