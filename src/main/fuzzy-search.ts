/**
 * Fuzzy Search
 *
 * Subsequence matching over normalized names with a weighted score:
 *
 *   prefix bonus  >  contiguity  >  start-menu bonus  >  length penalty
 *
 * One step of a term outweighs everything below it combined: a contiguous
 * pair is worth more than the origin bonus plus the largest possible
 * difference in length penalty. A prefix match already has every pair the
 * query allows, so its bonus only has to clear origin and length.
 *
 * Ranking always covers the whole index before truncating.
 */

import { normalizeName, type IconRef, type ProgramEntry } from './program-entry';
import type { ProgramIndex } from './program-index';

export const SCORE_WEIGHTS = {
  prefix: 1000,
  contiguousPair: 80,
  startMenu: 40,
  lengthPerChar: 0.5,
  maxLengthPenalty: 30,
} as const;

export interface SearchResult {
  displayName: string;
  launchTarget: string;
  icon: IconRef;
  score: number;
  entry: ProgramEntry;
}

function isSubsequence(query: string, name: string): boolean {
  let queryIdx = 0;
  for (let nameIdx = 0; nameIdx < name.length && queryIdx < query.length; nameIdx++) {
    if (name[nameIdx] === query[queryIdx]) queryIdx++;
  }
  return queryIdx === query.length;
}

/**
 * Alignment with the most adjacent pairs. `pairs[i][j]` is the best count
 * with query[i] placed at name[j], or -1 when no alignment puts it there.
 */
function bestAlignment(query: string, name: string): number[] {
  const pairs: number[][] = [];
  const from: number[][] = [];

  for (let i = 0; i < query.length; i++) {
    const row = new Array<number>(name.length).fill(-1);
    const back = new Array<number>(name.length).fill(-1);
    const prev = i > 0 ? pairs[i - 1] : null;
    // best of prev[0..j-2], i.e. placements that leave a gap
    let gapBest = -1;
    let gapAt = -1;

    for (let j = 0; j < name.length; j++) {
      if (prev && j >= 2 && prev[j - 2] > gapBest) {
        gapBest = prev[j - 2];
        gapAt = j - 2;
      }
      if (name[j] !== query[i]) continue;
      if (!prev) {
        row[j] = 0;
      } else if (j >= 1 && prev[j - 1] >= 0 && prev[j - 1] + 1 >= gapBest) {
        row[j] = prev[j - 1] + 1;
        back[j] = j - 1;
      } else if (gapBest >= 0) {
        row[j] = gapBest;
        back[j] = gapAt;
      }
    }
    pairs.push(row);
    from.push(back);
  }

  const last = pairs[query.length - 1];
  let end = -1;
  for (let j = 0; j < name.length; j++) {
    if (last[j] >= 0 && (end < 0 || last[j] > last[end])) end = j;
  }

  const positions = new Array<number>(query.length);
  for (let i = query.length - 1; i >= 0; i--) {
    positions[i] = end;
    end = from[i][end];
  }
  return positions;
}

/**
 * Indices of `query` characters inside `name`, or null when `query` is not
 * a subsequence. Among all alignments the one with the most adjacent pairs
 * is returned; a whole-query occurrence short-circuits the search.
 */
export function matchPositions(query: string, name: string): number[] | null {
  if (!query) return [];
  if (!isSubsequence(query, name)) return null;

  const substringAt = name.indexOf(query);
  if (substringAt >= 0) {
    return Array.from({ length: query.length }, (_, i) => substringAt + i);
  }
  return bestAlignment(query, name);
}

function adjacentPairs(positions: number[]): number {
  let pairs = 0;
  for (let i = 1; i < positions.length; i++) {
    if (positions[i] === positions[i - 1] + 1) pairs++;
  }
  return pairs;
}

/**
 * Score for an already-normalized query, or null when the entry does not
 * match.
 */
export function scoreEntry(entry: ProgramEntry, normalizedQuery: string): number | null {
  const name = entry.normalizedName;
  const positions = matchPositions(normalizedQuery, name);
  if (!positions) return null;

  let score = adjacentPairs(positions) * SCORE_WEIGHTS.contiguousPair;
  if (name.startsWith(normalizedQuery)) score += SCORE_WEIGHTS.prefix;
  if (entry.origin === 'start-menu') score += SCORE_WEIGHTS.startMenu;
  score -= Math.min(name.length * SCORE_WEIGHTS.lengthPerChar, SCORE_WEIGHTS.maxLengthPenalty);
  return score;
}

function toResult(entry: ProgramEntry, score: number): SearchResult {
  return {
    displayName: entry.name,
    launchTarget: entry.launchTarget,
    icon: entry.icon,
    score,
    entry,
  };
}

function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  const left = a.entry.normalizedName;
  const right = b.entry.normalizedName;
  if (left !== right) return left < right ? -1 : 1;
  if (a.launchTarget === b.launchTarget) return 0;
  return a.launchTarget < b.launchTarget ? -1 : 1;
}

/**
 * The index in its display order, truncated. Scores are 0.
 */
export function listIndex(index: ProgramIndex, maxResults: number): SearchResult[] {
  return index.entries.slice(0, Math.max(0, maxResults)).map((entry) => toResult(entry, 0));
}

export function searchIndex(index: ProgramIndex, query: string, maxResults: number): SearchResult[] {
  const normalizedQuery = normalizeName(query);
  if (!normalizedQuery) return listIndex(index, maxResults);

  const results: SearchResult[] = [];
  for (const entry of index.entries) {
    const score = scoreEntry(entry, normalizedQuery);
    if (score !== null) results.push(toResult(entry, score));
  }

  results.sort(compareResults);
  return results.slice(0, Math.max(0, maxResults));
}
