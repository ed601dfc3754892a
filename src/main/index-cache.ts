/**
 * Index Cache
 *
 * Persists the discovered entry set as a single MessagePack record so warm
 * startups skip discovery. The record is trusted only when its version and
 * fingerprint match what the current scan plan produces; anything else
 * (missing file, decode error, malformed entry, stale fingerprint) is a
 * miss and the caller rebuilds.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { encode, decode } from '@msgpack/msgpack';
import { createEntry, isEntryOrigin, type EntryOrigin, type ProgramEntry } from './program-entry';
import type { IconResolver } from './icon-resolver';
import type { ScanRoot } from './platform';

/** Record format version; bump to invalidate every cache */
export const CACHE_VERSION = 1;

const INDEX_FILE_NAME = 'program-index.mp';

export interface ScanPlan {
  roots: ScanRoot[];
  excludePaths: string[];
}

export interface SerializedEntry {
  name: string;
  launchTarget: string;
  origin: EntryOrigin;
  /** Extracted bitmap; placeholders are never stored */
  iconFile?: string;
}

export interface IndexCacheRecord {
  version: number;
  fingerprint: string;
  savedAt: number;
  entries: SerializedEntry[];
}

export interface LoadedIndex {
  fingerprint: string;
  savedAt: number;
  entries: ProgramEntry[];
}

// ─── Fingerprint ────────────────────────────────────────────────────

interface DirectoryStamp {
  mtimeMs: number;
  children: Array<[string, number]>;
}

/**
 * Modification time of a root and of its immediate subdirectories. Installs
 * usually add a vendor folder one level down, which bumps the root's mtime;
 * updates inside an existing vendor folder bump that folder's.
 */
async function stampDirectory(dir: string): Promise<DirectoryStamp | null> {
  let mtimeMs: number;
  let entries: fs.Dirent[];
  try {
    mtimeMs = (await fs.promises.stat(dir)).mtimeMs;
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }

  const children: Array<[string, number]> = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    try {
      const stat = await fs.promises.stat(path.join(dir, entry.name));
      children.push([entry.name, stat.mtimeMs]);
    } catch {
      children.push([entry.name, -1]);
    }
  }
  children.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  return { mtimeMs, children };
}

export async function computeFingerprint(plan: ScanPlan): Promise<string> {
  const roots: Array<{ path: string; origin: EntryOrigin; stamp: DirectoryStamp | null }> = [];
  for (const root of plan.roots) {
    const resolved = path.resolve(root.path);
    roots.push({ path: resolved, origin: root.origin, stamp: await stampDirectory(resolved) });
  }
  const canonical = JSON.stringify({
    version: CACHE_VERSION,
    roots,
    exclude: [...plan.excludePaths].map((p) => path.resolve(p)).sort(),
  });
  return crypto.createHash('sha1').update(canonical).digest('hex');
}

// ─── Record validation ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSerializedEntry(value: unknown): SerializedEntry | null {
  if (!isRecord(value)) return null;
  const { name, launchTarget, origin, iconFile } = value;
  if (typeof name !== 'string' || !name) return null;
  if (typeof launchTarget !== 'string' || !launchTarget) return null;
  if (!isEntryOrigin(origin)) return null;
  if (iconFile !== undefined && iconFile !== null && typeof iconFile !== 'string') return null;
  return {
    name,
    launchTarget,
    origin,
    ...(typeof iconFile === 'string' && iconFile ? { iconFile } : {}),
  };
}

/**
 * Validates a decoded payload. One bad entry rejects the whole record.
 */
export function parseIndexCacheRecord(raw: unknown): IndexCacheRecord | null {
  if (!isRecord(raw)) return null;
  if (raw.version !== CACHE_VERSION) return null;
  if (typeof raw.fingerprint !== 'string' || !raw.fingerprint) return null;
  if (!Array.isArray(raw.entries)) return null;

  const entries: SerializedEntry[] = [];
  for (const item of raw.entries) {
    const entry = parseSerializedEntry(item);
    if (!entry) return null;
    entries.push(entry);
  }

  return {
    version: CACHE_VERSION,
    fingerprint: raw.fingerprint,
    savedAt: typeof raw.savedAt === 'number' ? raw.savedAt : 0,
    entries,
  };
}

// ─── Store ──────────────────────────────────────────────────────────

export class IndexCache {
  readonly filePath: string;

  constructor(
    private readonly cacheDir: string,
    private readonly icons: Pick<IconResolver, 'restore'>
  ) {
    this.filePath = path.join(cacheDir, INDEX_FILE_NAME);
  }

  /**
   * Returns the cached entries when the record is intact and matches the
   * plan's current fingerprint, otherwise null.
   */
  async load(plan: ScanPlan): Promise<LoadedIndex | null> {
    let record: IndexCacheRecord | null;
    try {
      const data = await fs.promises.readFile(this.filePath);
      record = parseIndexCacheRecord(decode(data));
    } catch {
      return null;
    }
    if (!record) {
      console.warn('[IndexCache] Ignoring unreadable or outdated cache record');
      return null;
    }

    const fingerprint = await computeFingerprint(plan);
    if (record.fingerprint !== fingerprint) {
      console.log('[IndexCache] Scan roots changed since the cache was written');
      return null;
    }

    return {
      fingerprint,
      savedAt: record.savedAt,
      entries: record.entries.map((entry) =>
        createEntry(entry.name, entry.launchTarget, entry.origin, this.icons.restore(entry.name, entry.iconFile))
      ),
    };
  }

  /**
   * Atomically replaces the record: the payload goes to a temp file in the
   * same directory and is renamed over the old one.
   */
  async save(entries: readonly ProgramEntry[], fingerprint: string): Promise<boolean> {
    const record: IndexCacheRecord = {
      version: CACHE_VERSION,
      fingerprint,
      savedAt: Date.now(),
      entries: entries.map((entry) => ({
        name: entry.name,
        launchTarget: entry.launchTarget,
        origin: entry.origin,
        ...(entry.icon.kind === 'bitmap' ? { iconFile: entry.icon.file } : {}),
      })),
    };

    const tmpFile = `${this.filePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
    try {
      await fs.promises.mkdir(this.cacheDir, { recursive: true });
      await fs.promises.writeFile(tmpFile, encode(record));
      await fs.promises.rename(tmpFile, this.filePath);
      return true;
    } catch (error) {
      console.error('[IndexCache] Failed to write cache:', error);
      try {
        await fs.promises.rm(tmpFile, { force: true });
      } catch (cleanupError) {
        console.warn('[IndexCache] Failed to remove temp file:', cleanupError);
      }
      return false;
    }
  }

  async clear(): Promise<void> {
    await fs.promises.rm(this.filePath, { force: true });
  }
}
