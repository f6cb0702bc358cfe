import { ByteCursor } from '../../src/ByteCursor';
import { ByteWriter } from '../../src/ByteWriter';
import { DecodeError } from '../../src/DecodeError';
import { IntegerCodec } from '../../src/codecs/IntegerCodec';
import { utf8 } from '../../src/helpers';
import { integer } from '../../src/Value';

function decodeError(run: () => unknown): DecodeError {
  try {
    run();
  } catch (e) {
    if (e instanceof DecodeError) return e;
    throw e;
  }
  throw new Error('expected a DecodeError');
}

function encodeText(value: number | bigint): string {
  const writer = ByteWriter.alloc();
  new IntegerCodec().encode(writer, integer(value));
  return new TextDecoder().decode(writer.toUint8Array());
}

describe('IntegerCodec', () => {
  const codec = new IntegerCodec();
  const decodeText = (text: string) => codec.decode(ByteCursor.from(utf8(text))).value;

  describe('encode', () => {
    it('writes the shortest decimal form', () => {
      expect(encodeText(42)).toBe('i42e');
      expect(encodeText(-10)).toBe('i-10e');
      expect(encodeText(0)).toBe('i0e');
      expect(encodeText(-0)).toBe('i0e');
    });

    it('writes values beyond 64 bits', () => {
      expect(encodeText(2n ** 70n)).toBe('i1180591620717411303424e');
      expect(encodeText(-(2n ** 64n))).toBe('i-18446744073709551616e');
    });
  });

  describe('decode', () => {
    it('reads positive, negative and zero values', () => {
      expect(decodeText('i42e')).toBe(42n);
      expect(decodeText('i-10e')).toBe(-10n);
      expect(decodeText('i0e')).toBe(0n);
    });

    it('reads values wider than 64 bits', () => {
      expect(decodeText('i123456789012345678901234567890e')).toBe(123456789012345678901234567890n);
      expect(decodeText('i-9223372036854775809e')).toBe(-9223372036854775809n);
    });

    it('stops right after the terminator', () => {
      const cursor = ByteCursor.from(utf8('i7e4:spam'));
      codec.decode(cursor);
      expect(cursor.offset).toBe(3);
    });

    it.each([
      ['i03e', 'integer has a leading zero'],
      ['i00e', 'integer has a leading zero'],
      ['i-03e', 'integer has a leading zero'],
      ['i-0e', 'negative zero is not allowed'],
      ['ie', 'integer has no digits'],
      ['i-e', 'integer has no digits'],
    ])('rejects %s', (input, reason) => {
      const error = decodeError(() => decodeText(input));
      expect(error.kind).toBe('InvalidInteger');
      expect(error.offset).toBe(0);
      expect(error.message).toBe(`InvalidInteger at byte 0: ${reason}`);
    });

    it('rejects a non-digit before the terminator', () => {
      const error = decodeError(() => decodeText('i1x2e'));
      expect(error.kind).toBe('InvalidInteger');
      expect(error.offset).toBe(2);
    });

    it('rejects a second sign', () => {
      const error = decodeError(() => decodeText('i--1e'));
      expect(error.kind).toBe('InvalidInteger');
      expect(error.offset).toBe(2);
    });

    it('reports a missing terminator as UnexpectedEof', () => {
      expect(decodeError(() => decodeText('i12')).kind).toBe('UnexpectedEof');
      expect(decodeError(() => decodeText('i12')).offset).toBe(3);
      expect(decodeError(() => decodeText('i')).offset).toBe(1);
    });

    it('rejects input without the i marker', () => {
      const error = decodeError(() => decodeText('4:spam'));
      expect(error.kind).toBe('InvalidTypePrefix');
      expect(error.message).toBe("InvalidTypePrefix at byte 0: expected 'i' to start an integer, found '4'");
    });
  });

  describe('decodeWithMetadata', () => {
    it('records offset, length and raw bytes', () => {
      const cursor = ByteCursor.from(utf8('i-10e'));
      expect(codec.decodeWithMetadata(cursor)).toEqual({
        kind: 'integer',
        value: -10n,
        meta: { offset: 0, length: 5, rawBytes: utf8('i-10e') },
      });
    });
  });
});
