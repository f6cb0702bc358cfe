import { ByteCursor } from '../ByteCursor';
import { ByteWriter } from '../ByteWriter';
import { DecodeError } from '../DecodeError';
import { integer, IntegerValue } from '../Value';
import { Codec } from './Codec';
import { captureMeta, DecodedInteger } from './DecodedNode';
import { BYTE_END, BYTE_INTEGER, BYTE_MINUS, describeByte, expectMarker, isDigit } from '../helpers';

/**
 * Integer codec: `i<['-']digits>e`.
 * Only the shortest form is accepted: no leading zero, no `-0`.
 */
export class IntegerCodec implements Codec<IntegerValue, DecodedInteger> {
  encode(writer: ByteWriter, value: IntegerValue): void {
    // bigint has no negative zero and prints no leading zeros
    writer.writeAscii(`i${value.value.toString()}e`);
  }

  decode(cursor: ByteCursor): IntegerValue {
    return integer(this.decodeBigInt(cursor));
  }

  decodeWithMetadata(cursor: ByteCursor): DecodedInteger {
    const offset = cursor.offset;
    const value = this.decodeBigInt(cursor);
    return { kind: 'integer', value, meta: captureMeta(cursor, offset) };
  }

  private decodeBigInt(cursor: ByteCursor): bigint {
    const start = expectMarker(cursor, BYTE_INTEGER, 'an integer');

    let negative = false;
    if (cursor.peek() === BYTE_MINUS) {
      cursor.readByte('an integer');
      negative = true;
    }

    let digits = '';
    for (;;) {
      const at = cursor.offset;
      const byte = cursor.readByte('an integer');
      if (byte === BYTE_END) break;
      if (!isDigit(byte)) {
        throw new DecodeError('InvalidInteger', at, `unexpected ${describeByte(byte)} in integer`);
      }
      if (digits === '0') {
        throw new DecodeError('InvalidInteger', start, 'integer has a leading zero');
      }
      digits += String.fromCharCode(byte);
    }

    if (digits.length === 0) {
      throw new DecodeError('InvalidInteger', start, 'integer has no digits');
    }
    if (negative && digits === '0') {
      throw new DecodeError('InvalidInteger', start, 'negative zero is not allowed');
    }

    const magnitude = BigInt(digits);
    return negative ? -magnitude : magnitude;
  }
}
