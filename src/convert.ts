import { utf8Text } from './helpers';
import { byteString, dictionary, integer, list, Value } from './Value';

/** JS values that map onto bencode values. */
export type PlainValue =
  | string
  | number
  | bigint
  | Uint8Array
  | PlainValue[]
  | Map<string | Uint8Array, PlainValue>
  | { [key: string]: PlainValue | undefined };

/**
 * Build a value tree from plain JS data.
 *
 * Strings become UTF-8 byte strings, numbers must be safe integers,
 * arrays become lists, and Maps or plain objects become dictionaries.
 * Object properties holding `undefined` are skipped.
 *
 * @throws Error for anything without a bencode counterpart
 */
export function fromPlain(input: PlainValue): Value {
  if (typeof input === 'string' || input instanceof Uint8Array) return byteString(input);
  if (typeof input === 'number' || typeof input === 'bigint') return integer(input);
  if (Array.isArray(input)) return list(input.map(item => fromPlain(item)));
  if (input instanceof Map) {
    return dictionary(Array.from(input, ([key, value]) => [key, fromPlain(value)] as const));
  }
  if (isPlainObject(input)) {
    const entries: [string, Value][] = [];
    for (const [key, value] of Object.entries(input)) {
      if (value !== undefined) entries.push([key, fromPlain(value)]);
    }
    return dictionary(entries);
  }
  throw new Error(`fromPlain: cannot encode ${describePlain(input)}`);
}

export interface ToPlainOptions {
  /**
   * How byte strings come out: `'bytes'` (default) keeps every one as a
   * Uint8Array, `'utf8'` returns text for valid UTF-8 and a Uint8Array otherwise.
   */
  strings?: 'bytes' | 'utf8';
}

/**
 * Convert a value tree to plain JS data. Integers in the safe range come
 * out as numbers, larger ones as bigint. Dictionary keys are decoded as
 * UTF-8; keys that decode to the same text keep the last value.
 */
export function toPlain(value: Value, options?: ToPlainOptions): PlainValue {
  const strings = options?.strings ?? 'bytes';
  switch (value.kind) {
    case 'byteString':
      return strings === 'utf8' ? (utf8Text(value.bytes, true) ?? value.bytes) : value.bytes;
    case 'integer': {
      const n = Number(value.value);
      return Number.isSafeInteger(n) ? n : value.value;
    }
    case 'list':
      return value.items.map(item => toPlain(item, options));
    case 'dictionary':
      return Object.fromEntries(
        value.entries.map(entry => [utf8Text(entry.key), toPlain(entry.value, options)]),
      );
  }
}

function isPlainObject(input: unknown): input is { [key: string]: PlainValue | undefined } {
  if (typeof input !== 'object' || input === null) return false;
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

function describePlain(input: unknown): string {
  if (input === null) return 'null';
  if (typeof input === 'object') {
    const ctor: unknown = Reflect.get(input, 'constructor');
    return typeof ctor === 'function' && ctor.name !== '' ? `object of type ${ctor.name}` : 'object';
  }
  return typeof input;
}
