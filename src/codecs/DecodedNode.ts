import type { ByteCursor } from '../ByteCursor';

/** Metadata attached to every decoded node. */
export interface NodeMeta {
  /** Start byte position in the source buffer. */
  offset: number;
  /** Number of bytes consumed by this value's encoding. */
  length: number;
  /** Copy of this value's exact encoding, extracted from the source buffer. */
  rawBytes: Uint8Array;
}

export interface DecodedByteString {
  kind: 'byteString';
  value: Uint8Array;
  meta: NodeMeta;
}

export interface DecodedInteger {
  kind: 'integer';
  value: bigint;
  meta: NodeMeta;
}

export interface DecodedList {
  kind: 'list';
  value: DecodedNode[];
  meta: NodeMeta;
}

export interface DecodedDictionaryEntry {
  key: DecodedByteString;
  value: DecodedNode;
}

export interface DecodedDictionary {
  kind: 'dictionary';
  /** Entries in wire order, which for well-formed input is ascending key order. */
  value: DecodedDictionaryEntry[];
  meta: NodeMeta;
}

/** A decoded value wrapped with encoding metadata. */
export type DecodedNode = DecodedByteString | DecodedInteger | DecodedList | DecodedDictionary;

/** Metadata for the bytes consumed since `offset`. */
export function captureMeta(cursor: ByteCursor, offset: number): NodeMeta {
  return {
    offset,
    length: cursor.offset - offset,
    rawBytes: cursor.extract(offset, cursor.offset),
  };
}
