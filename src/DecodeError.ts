/** Every way a decode can fail. */
export type DecodeErrorKind =
  | 'UnexpectedEof'
  | 'InvalidLength'
  | 'InvalidInteger'
  | 'InvalidTypePrefix'
  | 'UnterminatedContainer'
  | 'NonStringDictKey'
  | 'UnsortedOrDuplicateKey'
  | 'TrailingData'
  | 'NestingTooDeep';

/**
 * Raised by the codecs when input is not well-formed bencode.
 * `offset` is the byte position at which the problem was detected.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  readonly offset: number;

  constructor(kind: DecodeErrorKind, offset: number, message: string) {
    super(`${kind} at byte ${offset}: ${message}`);
    this.name = 'DecodeError';
    this.kind = kind;
    this.offset = offset;
  }
}

/** Outcome of a decode: the value, or the first error encountered. */
export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

/** Type guard: checks if a value is a DecodeError instance. */
export function isDecodeError(value: unknown): value is DecodeError {
  return value instanceof DecodeError;
}

/**
 * Run a throwing decode step and capture a DecodeError as a failed result.
 * Errors of any other type are programming errors and propagate.
 */
export function captureDecode<T>(run: () => T): DecodeResult<T> {
  try {
    return { ok: true, value: run() };
  } catch (e) {
    if (isDecodeError(e)) return { ok: false, error: e };
    throw e;
  }
}
