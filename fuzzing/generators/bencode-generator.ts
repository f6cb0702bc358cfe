/**
 * Random bencode value generator.
 *
 * Produces well-formed value trees (unique keys, bounded depth) whose
 * encodings serve as round-trip inputs and as mutation seeds.
 */

import { encode } from '../../src/bencode';
import { byteString, dictionary, integer, list, Value } from '../../src/Value';
import { toHex } from '../../src/helpers';

/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift32 never leaves the all-zero state
    this.state = (seed >>> 0) || 0x9e3779b9;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >>> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }
}

export interface GeneratorOptions {
  /** Maximum container nesting (default: 4). */
  maxDepth?: number;
  /** Maximum items per list or entries per dictionary (default: 6). */
  maxItems?: number;
  /** Maximum byte string length (default: 24). */
  maxStringLength?: number;
  /** Probability that a byte string holds arbitrary bytes rather than ASCII (default: 0.2). */
  binaryProbability?: number;
  /** Probability that an integer is wider than 64 bits (default: 0.1). */
  bigIntegerProbability?: number;
}

const DEFAULTS: Required<GeneratorOptions> = {
  maxDepth: 4,
  maxItems: 6,
  maxStringLength: 24,
  binaryProbability: 0.2,
  bigIntegerProbability: 0.1,
};

const KEY_WORDS = [
  'announce', 'comment', 'created by', 'creation date', 'encoding', 'files',
  'info', 'length', 'name', 'path', 'piece length', 'pieces', 'private', 'url-list',
];

const BOUNDARY_INTEGERS = [
  0n, 1n, -1n, 9n, 10n, -10n, 127n, 128n, 255n, 256n,
  2n ** 31n - 1n, -(2n ** 31n), 2n ** 53n - 1n, 2n ** 53n, 2n ** 63n - 1n, -(2n ** 63n),
];

export class BencodeGenerator {
  private rng: Rng;
  private opts: Required<GeneratorOptions>;

  constructor(seed: number, options?: GeneratorOptions) {
    this.rng = new Rng(seed);
    this.opts = { ...DEFAULTS, ...options };
  }

  /** Generate a random value tree. */
  generateValue(depth = 0): Value {
    // Weight leaves more heavily at deeper nesting
    const leafWeight = Math.min(0.9, 0.4 + depth * 0.15);
    if (depth >= this.opts.maxDepth || this.rng.chance(leafWeight)) {
      return this.rng.chance(0.5) ? this.generateByteString() : this.generateInteger();
    }
    return this.rng.chance(0.5) ? this.generateList(depth) : this.generateDictionary(depth);
  }

  private generateByteString(): Value {
    return byteString(this.randomBytes(this.rng.int(0, this.opts.maxStringLength)));
  }

  private generateInteger(): Value {
    if (this.rng.chance(0.3)) return integer(this.rng.pick(BOUNDARY_INTEGERS));
    if (this.rng.chance(this.opts.bigIntegerProbability)) {
      const magnitude = 2n ** BigInt(this.rng.int(64, 200)) + BigInt(this.rng.int(0, 1_000_000));
      return integer(this.rng.chance(0.5) ? -magnitude : magnitude);
    }
    return integer(this.rng.int(-1_000_000, 1_000_000));
  }

  private generateList(depth: number): Value {
    const count = this.rng.int(0, this.opts.maxItems);
    return list(Array.from({ length: count }, () => this.generateValue(depth + 1)));
  }

  private generateDictionary(depth: number): Value {
    const count = this.rng.int(0, this.opts.maxItems);
    const entries: [Uint8Array, Value][] = [];
    const seen = new Set<string>();
    for (let i = 0; i < count; i++) {
      const key = this.generateKey();
      const id = toHex(key);
      if (seen.has(id)) continue;
      seen.add(id);
      entries.push([key, this.generateValue(depth + 1)]);
    }
    return dictionary(entries);
  }

  private generateKey(): Uint8Array {
    if (this.rng.chance(0.6)) return new TextEncoder().encode(this.rng.pick(KEY_WORDS));
    return this.randomBytes(this.rng.int(0, 8));
  }

  private randomBytes(length: number): Uint8Array {
    const binary = this.rng.chance(this.opts.binaryProbability);
    const bytes = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      bytes[i] = binary ? this.rng.int(0, 255) : this.rng.int(0x20, 0x7e);
    }
    return bytes;
  }
}

/** Convenience: generate a value from a seed. */
export function generateValue(seed: number, options?: GeneratorOptions): Value {
  return new BencodeGenerator(seed, options).generateValue();
}

/** Convenience: generate the canonical encoding of a random value. */
export function generateEncoded(seed: number, options?: GeneratorOptions): Uint8Array {
  return encode(generateValue(seed, options));
}
