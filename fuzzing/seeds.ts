/**
 * Seed corpus of well-formed bencode inputs for mutation-based fuzzing.
 * Each seed exercises a different grammar feature.
 */

/** Every primitive on its own. */
export const SEED_PRIMITIVES = [
  '4:spam',
  '0:',
  'i0e',
  'i-10e',
  'i123456789012345678901234567890e',
];

/** Lists, flat and nested. */
export const SEED_LISTS = [
  'le',
  'l4:spam4:eggse',
  'll5:helloei-10ee',
  'llllleeeee',
];

/** Dictionaries, including prefix-ordered keys. */
export const SEED_DICTIONARIES = [
  'de',
  'd3:cow3:moo4:spam4:eggse',
  'd1:a1:x2:aa1:ye',
  'd4:spaml1:a1:bee',
  'd4:key16:value14:key26:value22:okll5:helloei-10eee',
];

/** A metainfo-shaped document. */
export const SEED_METAINFO =
  'd8:announce22:http://tracker.test/an4:infod6:lengthi2048e4:name8:file.bin' +
  '12:piece lengthi1024e6:pieces10:0123456789ee';

/** All seeds as byte arrays for iteration. */
export const ALL_SEEDS: Uint8Array[] = [
  ...SEED_PRIMITIVES,
  ...SEED_LISTS,
  ...SEED_DICTIONARIES,
  SEED_METAINFO,
].map(seed => new TextEncoder().encode(seed));
