import { describe, expect, it } from 'vitest';
import { matchPositions, scoreEntry, searchIndex, SCORE_WEIGHTS } from '../fuzzy-search';
import { placeholderIcon } from '../icon-resolver';
import { createEntry, normalizeName, type EntryOrigin, type ProgramEntry } from '../program-entry';
import { ProgramIndex } from '../program-index';

function entry(name: string, launchTarget: string, origin: EntryOrigin = 'program-files'): ProgramEntry {
  return createEntry(name, launchTarget, origin, placeholderIcon(name));
}

function indexOf(entries: ProgramEntry[]): ProgramIndex {
  return ProgramIndex.build(entries, { initialSort: 'alphabetical' });
}

function isSubsequence(query: string, name: string): boolean {
  let i = 0;
  for (const ch of name) {
    if (ch === query[i]) i++;
  }
  return i === query.length;
}

const sample = [
  entry('Notepad', 'C:\\Windows\\notepad.exe', 'start-menu'),
  entry('NotificationCenter', 'C:\\Tools\\nc.exe'),
  entry('Visual Studio Code', 'C:\\Code\\Code.exe', 'start-menu'),
  entry('Visual C++ Redistributable', 'C:\\Redist\\vcredist.exe'),
  entry('Calculator', 'C:\\Windows\\calc.exe', 'start-menu'),
  entry('Paint', 'C:\\Windows\\mspaint.exe', 'start-menu'),
  entry('Node', 'C:\\nodejs\\node.exe'),
];

describe('matchPositions', () => {
  it('prefers a contiguous occurrence over the left-most alignment', () => {
    expect(matchPositions('code', 'cxx code')).toEqual([4, 5, 6, 7]);
  });

  it('falls back to the greedy alignment', () => {
    expect(matchPositions('vsc', 'visual studio code')).toEqual([0, 2, 14]);
  });

  it('finds the alignment with the longest runs', () => {
    expect(matchPositions('abcd', 'ab x abcxd')).toEqual([5, 6, 7, 9]);
    expect(matchPositions('abc', 'a b bc')).toEqual([0, 4, 5]);
  });

  it('returns null when the query is not a subsequence', () => {
    expect(matchPositions('xyz', 'notepad')).toBeNull();
    expect(matchPositions('dapeton', 'notepad')).toBeNull();
  });
});

describe('scoreEntry', () => {
  it('adds the prefix bonus, contiguity and the length penalty', () => {
    expect(scoreEntry(entry('Notepad', '/n', 'start-menu'), 'not')).toBe(1000 + 2 * 80 + 40 - 3.5);
    expect(scoreEntry(entry('NotificationCenter', '/nc'), 'not')).toBe(1000 + 2 * 80 - 9);
  });

  it('counts the pairs of the best alignment', () => {
    expect(scoreEntry(entry('ab x abcxd', '/a'), 'abcd')).toBe(2 * 80 - 5);
  });

  it('caps the length penalty', () => {
    const longName = 'a'.repeat(200);
    expect(scoreEntry(entry(longName, '/a'), 'a')).toBe(SCORE_WEIGHTS.prefix - SCORE_WEIGHTS.maxLengthPenalty);
  });
});

describe('searchIndex', () => {
  it('returns exactly the entries whose name contains the query as a subsequence', () => {
    const index = indexOf(sample);
    for (const query of ['no', 'not', 'ote', 'vsc', 'c', 'ai', 'de', 'xyz', 'visual c']) {
      const expected = sample
        .filter((item) => isSubsequence(normalizeName(query), item.normalizedName))
        .map((item) => item.launchTarget)
        .sort();
      const actual = searchIndex(index, query, 100)
        .map((result) => result.launchTarget)
        .sort();
      expect(actual).toEqual(expected);
    }
  });

  it('ranks prefix matches above everything else', () => {
    const results = searchIndex(indexOf(sample), 'not', 10);
    expect(results.map((r) => r.displayName)).toEqual(['Notepad', 'NotificationCenter']);
    expect(results.map((r) => r.score)).toEqual([1196.5, 1151]);
  });

  it('ranks Visual Studio Code first for "visual"', () => {
    const results = searchIndex(indexOf(sample), 'visual', 10);
    expect(results.map((r) => r.displayName)).toEqual(['Visual Studio Code', 'Visual C++ Redistributable']);
    expect(results.map((r) => r.score)).toEqual([1431, 1387]);
  });

  it('ranks Visual Studio Code first for the acronym "vsc"', () => {
    const results = searchIndex(indexOf(sample), 'vsc', 10);
    expect(results.map((r) => r.displayName)).toEqual(['Visual Studio Code', 'Visual C++ Redistributable']);
    expect(results.map((r) => r.score)).toEqual([31, -13]);
  });

  it('returns nothing when no name matches', () => {
    expect(searchIndex(indexOf(sample), 'xyz', 10)).toEqual([]);
  });

  it('ranks one contiguous pair above the origin bonus and a shorter name', () => {
    const contiguous = entry(`x ab ${'y'.repeat(70)}`, '/long', 'program-files');
    const scattered = entry('xaxb', '/short', 'start-menu');
    const results = searchIndex(indexOf([scattered, contiguous]), 'ab', 10);
    expect(results.map((r) => [r.launchTarget, r.score])).toEqual([
      ['/long', 50],
      ['/short', 38],
    ]);
  });

  it('breaks equal names by origin, start menu first', () => {
    const index = indexOf([
      entry('Terminal', '/opt/term/terminal', 'program-files'),
      entry('Terminal', '/usr/share/terminal', 'start-menu'),
    ]);
    const results = searchIndex(index, 'term', 10);
    expect(results.map((r) => r.launchTarget)).toEqual(['/usr/share/terminal', '/opt/term/terminal']);
    expect(results[0].score - results[1].score).toBe(SCORE_WEIGHTS.startMenu);
  });

  it('breaks score ties by name and then launch target', () => {
    const index = indexOf([
      entry('abd', '/2'),
      entry('abc', '/9'),
      entry('abc', '/1'),
    ]);
    const results = searchIndex(index, 'ab', 10);
    expect(results.map((r) => [r.displayName, r.launchTarget])).toEqual([
      ['abc', '/1'],
      ['abc', '/9'],
      ['abd', '/2'],
    ]);
    expect(new Set(results.map((r) => r.score))).toEqual(new Set([1078.5]));
  });

  it('never returns more than maxResults and keeps the best ones', () => {
    const entries = Array.from({ length: 15 }, (_, i) => entry(`app ${i + 1}`, `/apps/${i + 1}`));
    entries.push(entry('App', '/apps/plain', 'start-menu'));
    const results = searchIndex(indexOf(entries), 'app', 5);
    expect(results).toHaveLength(5);
    expect(results[0].launchTarget).toBe('/apps/plain');
  });

  it('returns the same ranking for the same query', () => {
    const index = indexOf(sample);
    const first = searchIndex(index, 'a', 10).map((r) => r.launchTarget);
    const second = searchIndex(index, 'a', 10).map((r) => r.launchTarget);
    expect(second).toEqual(first);
  });

  it('normalizes case and whitespace in the query', () => {
    const index = indexOf(sample);
    expect(searchIndex(index, '  VISUAL   studio ', 10).map((r) => r.displayName)).toEqual(['Visual Studio Code']);
  });

  it('lists the index in display order for an empty or blank query', () => {
    const index = indexOf(sample);
    const expected = index.entries.slice(0, 3).map((e) => e.name);
    expect(searchIndex(index, '', 3).map((r) => r.displayName)).toEqual(expected);
    expect(searchIndex(index, '   ', 3).map((r) => r.displayName)).toEqual(expected);
    expect(searchIndex(index, '', 3).every((r) => r.score === 0)).toBe(true);
  });

  it('carries the entry icon onto the result', () => {
    const [result] = searchIndex(indexOf(sample), 'paint', 1);
    expect(result.icon).toEqual(placeholderIcon('Paint'));
    expect(result.entry.name).toBe('Paint');
  });
});
