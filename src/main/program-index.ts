/**
 * Program Index
 *
 * An immutable snapshot of entries plus the order used for the empty-query
 * view. A rebuild produces a new ProgramIndex; nothing mutates a published
 * one.
 */

import * as crypto from 'crypto';
import { compareByName, type ProgramEntry } from './program-entry';
import type { InitialSort } from './launcher-config';

export interface ProgramIndexOptions {
  initialSort: InitialSort;
  /** Seed for the random display order; drawn once per build when omitted */
  seed?: number;
}

/**
 * mulberry32: small, fast, good enough for shuffling a list.
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function shuffled<T>(items: readonly T[], seed: number): T[] {
  const result = [...items];
  const random = createRandom(seed);
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export class ProgramIndex {
  /** Entries in display order */
  readonly entries: readonly ProgramEntry[];
  readonly initialSort: InitialSort;
  readonly seed: number;
  readonly builtAt: number;

  private constructor(entries: readonly ProgramEntry[], initialSort: InitialSort, seed: number) {
    this.entries = Object.freeze([...entries]);
    this.initialSort = initialSort;
    this.seed = seed;
    this.builtAt = Date.now();
  }

  static build(entries: readonly ProgramEntry[], options: ProgramIndexOptions): ProgramIndex {
    const seed = options.seed ?? crypto.randomInt(0, 2 ** 32);
    // Shuffle from a canonical order so the permutation depends only on the seed.
    const alphabetical = [...entries].sort(compareByName);
    const ordered = options.initialSort === 'random' ? shuffled(alphabetical, seed) : alphabetical;
    return new ProgramIndex(ordered, options.initialSort, seed);
  }

  static empty(): ProgramIndex {
    return new ProgramIndex([], 'alphabetical', 0);
  }

  get size(): number {
    return this.entries.length;
  }
}
