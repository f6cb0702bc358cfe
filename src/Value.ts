import { bytesEqual, toHex, utf8, utf8Text } from './helpers';

/** Opaque raw bytes. Not necessarily printable text. */
export interface ByteStringValue {
  readonly kind: 'byteString';
  readonly bytes: Uint8Array;
}

/** Signed whole number of arbitrary magnitude. */
export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: bigint;
}

/** Ordered sequence of values. */
export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface DictionaryEntry {
  readonly key: Uint8Array;
  readonly value: Value;
}

/**
 * Byte-string keyed mapping. Entries are kept in the order they were
 * supplied; the encoder sorts them, so that order never reaches the wire.
 */
export interface DictionaryValue {
  readonly kind: 'dictionary';
  readonly entries: readonly DictionaryEntry[];
}

/** A bencode value tree. */
export type Value = ByteStringValue | IntegerValue | ListValue | DictionaryValue;

export type ValueKind = Value['kind'];

/** Build a byte string. String content is UTF-8 encoded; byte content is copied. */
export function byteString(content: Uint8Array | string): ByteStringValue {
  const bytes = typeof content === 'string' ? utf8(content) : new Uint8Array(content);
  return { kind: 'byteString', bytes };
}

/**
 * Build an integer.
 * @throws RangeError when a number is not a safe integer
 */
export function integer(value: number | bigint): IntegerValue {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`Integer: ${value} is not a safe integer; pass a bigint instead`);
    }
    return { kind: 'integer', value: BigInt(value) };
  }
  return { kind: 'integer', value };
}

export function list(items: Iterable<Value>): ListValue {
  return { kind: 'list', items: Array.from(items) };
}

export type DictionaryInput =
  | Iterable<readonly [Uint8Array | string, Value]>
  | { readonly [key: string]: Value };

function isEntryIterable(
  input: DictionaryInput,
): input is Iterable<readonly [Uint8Array | string, Value]> {
  return Symbol.iterator in input;
}

/**
 * Build a dictionary from `[key, value]` pairs or a record of string keys.
 * @throws Error on a duplicate key
 */
export function dictionary(input: DictionaryInput): DictionaryValue {
  const pairs = isEntryIterable(input) ? Array.from(input) : Object.entries(input);
  const entries: DictionaryEntry[] = [];
  const seen = new Set<string>();
  for (const [rawKey, value] of pairs) {
    const key = typeof rawKey === 'string' ? utf8(rawKey) : new Uint8Array(rawKey);
    const id = toHex(key);
    if (seen.has(id)) {
      throw new Error(`Dictionary: duplicate key '${utf8Text(key)}'`);
    }
    seen.add(id);
    entries.push({ key, value });
  }
  return { kind: 'dictionary', entries };
}

/** Value stored under `key` in a dictionary, or undefined. */
export function lookup(dict: DictionaryValue, key: Uint8Array | string): Value | undefined {
  const needle = typeof key === 'string' ? utf8(key) : key;
  return dict.entries.find(entry => bytesEqual(entry.key, needle))?.value;
}

/**
 * Structural equality. Dictionaries compare as mappings, so entry order
 * does not matter.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'byteString':
      return b.kind === 'byteString' && bytesEqual(a.bytes, b.bytes);
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'list':
      return (
        b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valueEquals(item, b.items[i]))
      );
    case 'dictionary': {
      if (b.kind !== 'dictionary' || a.entries.length !== b.entries.length) return false;
      return a.entries.every(entry => {
        const other = lookup(b, entry.key);
        return other !== undefined && valueEquals(entry.value, other);
      });
    }
  }
}
