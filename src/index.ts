export type {
  Value,
  ValueKind,
  ByteStringValue,
  IntegerValue,
  ListValue,
  DictionaryValue,
  DictionaryEntry,
  DictionaryInput,
} from './Value';
export { byteString, integer, list, dictionary, lookup, valueEquals } from './Value';
export { decode, decodeOrThrow, decodeWithMetadata, encode } from './bencode';
export { BencodeCodec } from './BencodeCodec';
export type { DecodeOptions } from './BencodeCodec';
export { DecodeError, isDecodeError } from './DecodeError';
export type { DecodeErrorKind, DecodeResult } from './DecodeError';
export { ByteCursor, DEFAULT_MAX_DEPTH, MAX_SUPPORTED_DEPTH } from './ByteCursor';
export type { ByteCursorOptions } from './ByteCursor';
export { ByteWriter } from './ByteWriter';
export type { Codec } from './codecs/Codec';
export type {
  DecodedNode,
  DecodedByteString,
  DecodedInteger,
  DecodedList,
  DecodedDictionary,
  DecodedDictionaryEntry,
  NodeMeta,
} from './codecs/DecodedNode';
export { stripMetadata } from './codecs/stripMetadata';
export { ByteStringCodec } from './codecs/ByteStringCodec';
export { IntegerCodec } from './codecs/IntegerCodec';
export { ListCodec } from './codecs/ListCodec';
export type { ListCodecOptions } from './codecs/ListCodec';
export { DictionaryCodec } from './codecs/DictionaryCodec';
export type { DictionaryCodecOptions } from './codecs/DictionaryCodec';
export { ValueCodec } from './codecs/ValueCodec';
export { fromPlain, toPlain } from './convert';
export type { PlainValue, ToPlainOptions } from './convert';
export { compareBytes, fromHex, toHex, utf8, utf8Text } from './helpers';
