/**
 * Standalone continuous fuzzer for the decoder.
 *
 * Alternates generated round trips and mutation-based inputs, reporting
 * any input that throws, re-encodes differently, or takes too long.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { decode, encode } from '../src/bencode';
import { bytesEqual, toHex } from '../src/helpers';
import { generateEncoded, Rng } from './generators/bencode-generator';
import { mutate } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

const TIMEOUT_MS = 2000;

interface FuzzResult {
  seed: number;
  strategy: string;
  input: Uint8Array;
  problem?: string;
  accepted: boolean;
}

function fuzzOne(input: Uint8Array, seed: number, strategy: string): FuzzResult {
  const result: FuzzResult = { seed, strategy, input, accepted: false };
  const start = Date.now();

  try {
    const decoded = decode(input);
    if (decoded.ok) {
      result.accepted = true;
      if (!bytesEqual(encode(decoded.value), input)) {
        result.problem = 'accepted input is not canonical';
      }
    }
  } catch (e) {
    result.problem = `threw ${e instanceof Error ? e.message : String(e)}`;
  }

  if (result.problem === undefined && Date.now() - start > TIMEOUT_MS) {
    result.problem = 'timed out';
  }
  return result;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log('Bencode Decoder Fuzzer');
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let generated = 0;
  let mutated = 0;
  let accepted = 0;
  const issues: FuzzResult[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    let result: FuzzResult;

    if (iteration % 2 === 0) {
      // Generated round trip
      result = fuzzOne(generateEncoded(iteration + 1), iteration, 'generation');
      generated++;
      if (!result.accepted && result.problem === undefined) {
        result.problem = 'generated input was rejected';
      }
    } else {
      // Mutation-based
      const rng = new Rng(iteration);
      const seed = rng.chance(0.5) ? ALL_SEEDS[iteration % ALL_SEEDS.length] : generateEncoded(iteration);
      result = fuzzOne(mutate(seed, rng, rng.int(1, 5)), iteration, 'mutation');
      mutated++;
    }

    if (result.accepted) accepted++;
    if (result.problem !== undefined) {
      issues.push(result);
      console.error(`\n[!] ${result.problem} at iteration ${iteration} (${result.strategy}):`);
      console.error(`    Input: ${toHex(result.input.slice(0, 100))}...`);
    }

    iteration++;

    // Progress report every 10000 iterations
    if (iteration % 10000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `generated=${generated} mutated=${mutated} accepted=${accepted} issues=${issues.length}`
      );
    }
  }

  // Final report
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Generated: ${generated}`);
  console.log(`Mutated: ${mutated}`);
  console.log(`Accepted: ${accepted}`);

  if (issues.length > 0) {
    console.log('');
    console.log(`=== ${issues.length} issue(s) found ===`);
    for (const issue of issues) {
      console.log(`  Seed: ${issue.seed}, Strategy: ${issue.strategy}, Problem: ${issue.problem}`);
      console.log(`  Input: ${toHex(issue.input.slice(0, 150))}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
