import type { ByteCursor } from './ByteCursor';
import { DecodeError } from './DecodeError';

/** Marker and delimiter bytes of the bencode grammar. */
export const BYTE_COLON = 0x3a; // ':'
export const BYTE_MINUS = 0x2d; // '-'
export const BYTE_ZERO = 0x30; // '0'
export const BYTE_NINE = 0x39; // '9'
export const BYTE_END = 0x65; // 'e'
export const BYTE_INTEGER = 0x69; // 'i'
export const BYTE_LIST = 0x6c; // 'l'
export const BYTE_DICTIONARY = 0x64; // 'd'

const textEncoder = new TextEncoder();

/** Render a byte for error messages: printable ASCII quoted, anything else as hex. */
export function describeByte(byte: number): string {
  if (byte >= 0x20 && byte < 0x7f) return `'${String.fromCharCode(byte)}'`;
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

/**
 * Consume a construct's leading marker byte.
 * A different byte means the caller asked for the wrong production.
 */
export function expectMarker(cursor: ByteCursor, marker: number, what: string): number {
  const offset = cursor.offset;
  const byte = cursor.readByte(what);
  if (byte !== marker) {
    throw new DecodeError(
      'InvalidTypePrefix',
      offset,
      `expected ${describeByte(marker)} to start ${what}, found ${describeByte(byte)}`,
    );
  }
  return offset;
}

/**
 * At an element boundary inside a list or dictionary: consume the closing
 * 'e' and return true, or return false when another element follows.
 *
 * Running out of input right after the opening marker is a truncated value
 * (UnexpectedEof); running out after one or more complete elements means
 * only the terminator is missing (UnterminatedContainer).
 */
export function readContainerEnd(
  cursor: ByteCursor,
  containerOffset: number,
  elementCount: number,
  what: string,
): boolean {
  const next = cursor.peek();
  if (next === undefined) {
    if (elementCount === 0) {
      throw new DecodeError(
        'UnexpectedEof',
        cursor.offset,
        `input ended inside the ${what} opened at byte ${containerOffset}`,
      );
    }
    throw new DecodeError(
      'UnterminatedContainer',
      cursor.offset,
      `${what} opened at byte ${containerOffset} has no closing 'e'`,
    );
  }
  if (next !== BYTE_END) return false;
  cursor.readByte(what);
  return true;
}

/** True when the byte is an ASCII decimal digit. */
export function isDigit(byte: number): boolean {
  return byte >= BYTE_ZERO && byte <= BYTE_NINE;
}

/**
 * Lexicographic comparison of two byte arrays (unsigned, byte by byte;
 * a proper prefix sorts first). Returns a negative number, zero, or a
 * positive number.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}

/** Encode a JS string as UTF-8 bytes. */
export function utf8(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Decode UTF-8 bytes to a string.
 * With `fatal`, returns undefined for invalid UTF-8 instead of substituting U+FFFD.
 */
export function utf8Text(bytes: Uint8Array): string;
export function utf8Text(bytes: Uint8Array, fatal: true): string | undefined;
export function utf8Text(bytes: Uint8Array, fatal = false): string | undefined {
  if (!fatal) return new TextDecoder('utf-8').decode(bytes);
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) return undefined;
    throw e;
  }
}

/** Format bytes as a lowercase hex string. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

/** Parse a hex string (whitespace ignored) into bytes. */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0) {
    throw new Error(`Invalid hex string: odd length ${clean.length}`);
  }
  if (!/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error('Invalid hex string: non-hex character');
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Normalize decoder input: strings are UTF-8 encoded. */
export function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input === 'string' ? utf8(input) : input;
}
