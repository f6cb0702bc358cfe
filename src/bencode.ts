import { BencodeCodec, DecodeOptions } from './BencodeCodec';
import type { DecodeResult } from './DecodeError';
import type { DecodedNode } from './codecs/DecodedNode';
import type { Value } from './Value';

const defaultCodec = new BencodeCodec();

function codecFor(options?: DecodeOptions): BencodeCodec {
  return options?.maxDepth === undefined ? defaultCodec : new BencodeCodec(options);
}

/** Decode one complete value. Malformed input yields `{ ok: false, error }`. */
export function decode(input: Uint8Array | string, options?: DecodeOptions): DecodeResult<Value> {
  return codecFor(options).decode(input);
}

/** Decode one complete value, throwing a DecodeError on malformed input. */
export function decodeOrThrow(input: Uint8Array | string, options?: DecodeOptions): Value {
  return codecFor(options).decodeOrThrow(input);
}

export function decodeWithMetadata(
  input: Uint8Array | string,
  options?: DecodeOptions,
): DecodeResult<DecodedNode> {
  return codecFor(options).decodeWithMetadata(input);
}

/** Canonical encoding of a value. Dictionary keys are always emitted in ascending byte order. */
export function encode(value: Value): Uint8Array {
  return defaultCodec.encode(value);
}
