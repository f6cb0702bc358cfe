/**
 * Fuzz tests for the decoder.
 *
 * Every input must either decode to a value whose canonical encoding is
 * the input itself, or fail with a DecodeError pointing inside the input.
 * Nothing may throw, hang, or exhaust the stack.
 */

import { decode, encode } from '../src/bencode';
import { DecodeError, DecodeErrorKind } from '../src/DecodeError';
import { valueEquals } from '../src/Value';
import { BencodeGenerator, generateEncoded, Rng } from './generators/bencode-generator';
import { mutate, MUTATORS } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

const FUZZ_ITERATIONS = Number(process.env.FUZZ_ITERATIONS) || 500;

const ERROR_KINDS: DecodeErrorKind[] = [
  'UnexpectedEof',
  'InvalidLength',
  'InvalidInteger',
  'InvalidTypePrefix',
  'UnterminatedContainer',
  'NonStringDictKey',
  'UnsortedOrDuplicateKey',
  'TrailingData',
  'NestingTooDeep',
];

/** Decode and check the outcome; returns true when the input was accepted. */
function checkDecode(input: Uint8Array): boolean {
  const result = decode(input);
  if (result.ok) {
    // accepted input is canonical, so it re-encodes byte for byte
    expect(encode(result.value)).toEqual(input);
    return true;
  }
  expect(result.error).toBeInstanceOf(DecodeError);
  expect(ERROR_KINDS).toContain(result.error.kind);
  expect(result.error.offset).toBeGreaterThanOrEqual(0);
  expect(result.error.offset).toBeLessThanOrEqual(input.length);
  return false;
}

describe('Decoder fuzzing: generated values', () => {
  it('round-trips generated value trees', () => {
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const value = new BencodeGenerator(i + 1).generateValue();
      const result = decode(encode(value));
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(valueEquals(result.value, value)).toBe(true);
      }
    }
  });

  it('accepts every generated encoding as canonical', () => {
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      expect(checkDecode(generateEncoded(i + 1, { maxDepth: 6 }))).toBe(true);
    }
  });
});

describe('Decoder fuzzing: mutation-based', () => {
  it('should handle mutated seed inputs without crashing', () => {
    let accepted = 0;
    let rejected = 0;

    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const seed = ALL_SEEDS[i % ALL_SEEDS.length];
      const rng = new Rng(i + 1);
      if (checkDecode(mutate(seed, rng))) {
        accepted++;
      } else {
        rejected++;
      }
    }

    expect(rejected).toBeGreaterThan(0);
    console.log(`Mutation fuzzing: ${accepted} accepted, ${rejected} rejected out of ${FUZZ_ITERATIONS}`);
  });

  it('should handle heavily mutated generated inputs (3-5 mutations)', () => {
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const rng = new Rng(i + 100000);
      checkDecode(mutate(generateEncoded(i + 1), rng, rng.int(3, 5)));
    }
  });
});

describe('Decoder fuzzing: targeted mutation strategies', () => {
  for (const mutator of MUTATORS) {
    it(`should handle ${mutator.name} mutations without crashing`, () => {
      for (let i = 0; i < Math.min(50, FUZZ_ITERATIONS); i++) {
        const seed = ALL_SEEDS[i % ALL_SEEDS.length];
        const rng = new Rng(i + 200000);
        checkDecode(mutator(seed, rng));
      }
    });
  }
});

describe('Decoder fuzzing: edge case inputs', () => {
  const edgeCases = [
    '',
    ' ',
    'e',
    ':',
    '-',
    'i',
    'ie',
    'i-e',
    'i--1e',
    'i1',
    '0',
    '00:',
    '1:',
    ':abc',
    'l',
    'd',
    'le e',
    'd1:ae',
    'di0e1:ae',
    'dle1:ae',
    '9007199254740992:x',
    '1'.repeat(400) + ':',
    'i' + '9'.repeat(10000) + 'e',
    'l'.repeat(10000),
    'd'.repeat(10000),
    'ld'.repeat(5000),
    'le'.repeat(100),
    '\0'.repeat(100),
  ];

  it('should handle edge case inputs without crashing', () => {
    for (const input of edgeCases) {
      checkDecode(new TextEncoder().encode(input));
    }
  });
});

describe('Decoder fuzzing: deep nesting', () => {
  it('rejects deep nesting with NestingTooDeep instead of overflowing the stack', () => {
    for (const depth of [513, 1000, 100000, 1000000]) {
      const result = decode('l'.repeat(depth) + 'e'.repeat(depth));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('NestingTooDeep');
        expect(result.error.offset).toBe(512);
      }
    }
  });

  it('accepts nesting up to the limit', () => {
    const lists = 'l'.repeat(512) + 'e'.repeat(512);
    const dictionaries = 'd1:a'.repeat(511) + 'de' + 'e'.repeat(511);
    for (const input of [lists, dictionaries]) {
      expect(checkDecode(new TextEncoder().encode(input))).toBe(true);
    }
  });
});
