/**
 * Program Entry
 *
 * The canonical record for one launchable program. Entries are created by
 * discovery or decoded from the index cache and are never mutated after
 * they land in a ProgramIndex.
 */

export type EntryOrigin = 'start-menu' | 'program-files' | 'extra-path';

export const ENTRY_ORIGINS: readonly EntryOrigin[] = ['start-menu', 'program-files', 'extra-path'];

/** Lower value wins when two discoveries collapse into one entry. */
export const ORIGIN_PRIORITY: Record<EntryOrigin, number> = {
  'start-menu': 0,
  'program-files': 1,
  'extra-path': 2,
};

export interface BitmapIcon {
  kind: 'bitmap';
  /** PNG on disk, owned by the icon cache */
  file: string;
}

export interface PlaceholderIcon {
  kind: 'placeholder';
  letter: string;
  color: string;
}

export type IconRef = BitmapIcon | PlaceholderIcon;

export interface ProgramEntry {
  readonly name: string;
  readonly normalizedName: string;
  readonly launchTarget: string;
  readonly origin: EntryOrigin;
  readonly icon: IconRef;
}

/** The identity-bearing fields discovery produces before icons are resolved. */
export type ProgramRecord = Pick<ProgramEntry, 'name' | 'launchTarget' | 'origin'>;

export function isEntryOrigin(value: unknown): value is EntryOrigin {
  return ENTRY_ORIGINS.some((origin) => origin === value);
}

/**
 * Lowercases and collapses whitespace. Used for both names and queries so
 * the two always agree.
 */
export function normalizeName(value: string): string {
  return String(value || '').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Identity key for a launch target. Windows paths compare case-insensitively.
 */
export function entryIdentity(launchTarget: string, caseInsensitive: boolean): string {
  return caseInsensitive ? launchTarget.toLowerCase() : launchTarget;
}

export function createEntry(
  name: string,
  launchTarget: string,
  origin: EntryOrigin,
  icon: IconRef
): ProgramEntry {
  return Object.freeze({
    name,
    normalizedName: normalizeName(name),
    launchTarget,
    origin,
    icon: Object.freeze({ ...icon }),
  });
}

/**
 * Case-insensitive comparison by display name with the launch target as the
 * final tie-break, giving a total order.
 */
export function compareByName(a: ProgramRecord, b: ProgramRecord): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  if (a.launchTarget === b.launchTarget) return 0;
  return a.launchTarget < b.launchTarget ? -1 : 1;
}

/**
 * Picks the entry to keep when two discoveries share an identity.
 */
export function preferEntry<T extends ProgramRecord>(current: T, candidate: T): T {
  const currentRank = ORIGIN_PRIORITY[current.origin];
  const candidateRank = ORIGIN_PRIORITY[candidate.origin];
  if (candidateRank !== currentRank) return candidateRank < currentRank ? candidate : current;
  return compareByName(candidate, current) < 0 ? candidate : current;
}
