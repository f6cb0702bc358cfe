/**
 * Mutation strategies for byte-level fuzzing.
 *
 * Takes a well-formed bencode input and applies random mutations
 * to produce inputs that exercise decoder error handling and edge cases.
 */

import { Rng } from './bencode-generator';

/** A mutation function that transforms an input buffer. */
export type Mutator = (input: Uint8Array, rng: Rng) => Uint8Array;

function splice(input: Uint8Array, start: number, deleteCount: number, insert: ArrayLike<number> = []): Uint8Array {
  const out = new Uint8Array(input.length - deleteCount + insert.length);
  out.set(input.subarray(0, start), 0);
  out.set(insert, start);
  out.set(input.subarray(start + deleteCount), start + insert.length);
  return out;
}

function ascii(text: string): number[] {
  return Array.from(text, ch => ch.charCodeAt(0));
}

// -- Byte-level mutations --

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = new Uint8Array(input);
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Insert a random byte at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, rng.int(0, input.length), 0, [rng.int(0, 255)]);
}

/** Delete a random byte. */
export function byteDelete(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, rng.int(0, input.length - 1), 1);
}

/** Replace a random byte with another. */
export function byteReplace(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, rng.int(0, input.length - 1), 1, [rng.int(0, 255)]);
}

/** Truncate the input at a random position. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** Append a copy of a random tail, producing trailing data. */
export function appendTail(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, input.length, 0, input.subarray(rng.int(0, input.length - 1)));
}

// -- Grammar-level mutations --

const MARKERS = ascii('ilde:-0');

/** Insert a grammar marker byte (i, l, d, e, :, -, 0). */
export function insertMarker(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, rng.int(0, input.length), 0, [rng.pick(MARKERS)]);
}

/** Remove a random 'e' terminator. */
export function removeTerminator(input: Uint8Array, rng: Rng): Uint8Array {
  const positions: number[] = [];
  input.forEach((byte, i) => {
    if (byte === 0x65) positions.push(i);
  });
  if (positions.length === 0) return input;
  return splice(input, rng.pick(positions), 1);
}

/** Wrap the whole input in a number of list or dictionary openers. */
export function nestDeeper(input: Uint8Array, rng: Rng): Uint8Array {
  const opener = rng.pick(ascii('ld'));
  return splice(input, 0, 0, new Array<number>(rng.int(1, 50)).fill(opener));
}

const BOUNDARY_NUMBERS = [
  '0', '00', '01', '-0', '-1', '1', '9', '10', '255', '256', '65536',
  '2147483648', '9007199254740991', '9007199254740993', '99999999999999999999',
];

/** Replace a run of digits with a boundary number. */
export function numberBoundary(input: Uint8Array, rng: Rng): Uint8Array {
  const runs: [number, number][] = [];
  let i = 0;
  while (i < input.length) {
    if (input[i] >= 0x30 && input[i] <= 0x39) {
      const start = i;
      while (i < input.length && input[i] >= 0x30 && input[i] <= 0x39) i++;
      runs.push([start, i - start]);
    } else {
      i++;
    }
  }
  if (runs.length === 0) return input;
  const [start, length] = rng.pick(runs);
  return splice(input, start, length, ascii(rng.pick(BOUNDARY_NUMBERS)));
}

/** Swap two random non-overlapping byte ranges of equal length. */
export function swapRanges(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length < 4) return input;
  const len = rng.int(1, Math.floor(input.length / 2));
  const a = rng.int(0, input.length - 2 * len);
  const b = rng.int(a + len, input.length - len);
  const out = new Uint8Array(input);
  out.set(input.subarray(b, b + len), a);
  out.set(input.subarray(a, a + len), b);
  return out;
}

// -- Composite mutations --

/** All available mutators. */
export const MUTATORS: Mutator[] = [
  bitFlip,
  byteInsert,
  byteDelete,
  byteReplace,
  truncate,
  appendTail,
  insertMarker,
  removeTerminator,
  nestDeeper,
  numberBoundary,
  swapRanges,
];

/**
 * Apply 1-N random mutations to an input buffer.
 * @param input - The seed input
 * @param rng - Random number generator
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutate(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    const mutator = rng.pick(MUTATORS);
    result = mutator(result, rng);
  }
  return result;
}
