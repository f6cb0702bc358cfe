import { ByteCursor } from '../../src/ByteCursor';
import { ByteWriter } from '../../src/ByteWriter';
import { DecodeError } from '../../src/DecodeError';
import { decodeComplete, ValueCodec } from '../../src/codecs/ValueCodec';
import { utf8 } from '../../src/helpers';
import { byteString, dictionary, integer, list, Value } from '../../src/Value';

function decodeError(run: () => unknown): DecodeError {
  try {
    run();
  } catch (e) {
    if (e instanceof DecodeError) return e;
    throw e;
  }
  throw new Error('expected a DecodeError');
}

describe('ValueCodec', () => {
  const codec = new ValueCodec();
  const decodeText = (text: string) => codec.decode(ByteCursor.from(utf8(text)));

  it('selects the production from the first byte', () => {
    expect(decodeText('4:spam')).toEqual(byteString('spam'));
    expect(decodeText('i-10e')).toEqual(integer(-10));
    expect(decodeText('l4:spam4:eggse')).toEqual(list([byteString('spam'), byteString('eggs')]));
    expect(decodeText('d3:cow3:moo4:spam4:eggse')).toEqual(
      dictionary({ cow: byteString('moo'), spam: byteString('eggs') }),
    );
  });

  it('rejects a byte that starts no value', () => {
    for (const input of ['e', 'x', ':', '-1', ' ']) {
      const error = decodeError(() => decodeText(input));
      expect(error.kind).toBe('InvalidTypePrefix');
      expect(error.offset).toBe(0);
    }
    expect(decodeError(() => decodeText('\u0000')).message).toBe(
      'InvalidTypePrefix at byte 0: 0x00 does not start a value',
    );
  });

  it('reports empty input as UnexpectedEof', () => {
    const error = decodeError(() => decodeText(''));
    expect(error.kind).toBe('UnexpectedEof');
    expect(error.message).toBe('UnexpectedEof at byte 0: input ended where a value was expected');
  });

  it('encodes every variant', () => {
    const value: Value = dictionary({
      int: integer(-3),
      list: list([byteString('a'), dictionary({})]),
      str: byteString('xyz'),
    });
    const writer = ByteWriter.alloc();
    codec.encode(writer, value);
    expect(new TextDecoder().decode(writer.toUint8Array())).toBe('d3:inti-3e4:listl1:adee3:str3:xyze');
  });

  it('keeps item order and sorts keys inside nested containers', () => {
    const value = list([dictionary({ b: integer(1), a: list([integer(2)]) }), byteString('z')]);
    const writer = ByteWriter.alloc();
    codec.encode(writer, value);
    expect(new TextDecoder().decode(writer.toUint8Array())).toBe('ld1:ali2ee1:bi1ee1:ze');
  });

  it('encodes lists nested far deeper than the call stack allows', () => {
    let value: Value = list([]);
    for (let i = 1; i < 20000; i++) value = list([value]);
    const writer = ByteWriter.alloc();
    codec.encode(writer, value);
    expect(new TextDecoder().decode(writer.toUint8Array())).toBe('l'.repeat(20000) + 'e'.repeat(20000));
  });

  it('encodes deeply nested dictionaries', () => {
    let value: Value = list([]);
    for (let i = 0; i < 20000; i++) value = dictionary({ a: value });
    const writer = ByteWriter.alloc();
    codec.encode(writer, value);
    expect(new TextDecoder().decode(writer.toUint8Array())).toBe(
      'd1:a'.repeat(20000) + 'le' + 'e'.repeat(20000),
    );
  });
});

describe('decodeComplete', () => {
  const codec = new ValueCodec();

  it('returns the value when it spans the whole input', () => {
    const cursor = ByteCursor.from(utf8('i1e'));
    expect(decodeComplete(cursor, c => codec.decode(c))).toEqual(integer(1));
  });

  it('rejects bytes after a complete value as TrailingData', () => {
    const cursor = ByteCursor.from(utf8('i1ei2e'));
    const error = decodeError(() => decodeComplete(cursor, c => codec.decode(c)));
    expect(error.kind).toBe('TrailingData');
    expect(error.offset).toBe(3);
    expect(error.message).toBe('TrailingData at byte 3: 3 byte(s) left after a complete value');
  });
});
