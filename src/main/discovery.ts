/**
 * Program Discovery
 *
 * Walks the configured scan roots and turns shortcut and executable files
 * into ProgramRecords. The walk is breadth-first with no depth limit;
 * cycles are broken by remembering each directory's real path.
 *
 * Nothing in here throws for filesystem trouble: unreadable directories,
 * undecodable shortcuts and broken targets become warnings and the scan
 * carries on.
 */

import * as fs from 'fs';
import * as path from 'path';
import { entryIdentity, preferEntry, compareByName, type ProgramRecord } from './program-entry';
import type { ScanRoot, ShortcutResolver } from './platform';

export type DiscoveryWarningKind =
  | 'missing-root'
  | 'unreadable-directory'
  | 'symlink-cycle'
  | 'unresolved-shortcut'
  | 'broken-shortcut';

export interface DiscoveryWarning {
  kind: DiscoveryWarningKind;
  path: string;
  detail?: string;
}

export interface DiscoveryOptions {
  roots: ScanRoot[];
  excludePaths: string[];
  shortcutExtensions: readonly string[];
  executableExtensions: readonly string[];
  resolver: ShortcutResolver;
  caseInsensitivePaths: boolean;
}

export interface DiscoveryReport {
  programs: ProgramRecord[];
  warnings: DiscoveryWarning[];
  /** Shortcut and executable files looked at, before dedup */
  candidateCount: number;
  durationMs: number;
}

// Uninstallers, updaters and installers are never what the user is after.
const SKIP_NAME_RE = /uninstall|uninst|update|setup/i;

function errorCode(error: unknown): string {
  if (error && typeof error === 'object' && 'code' in error) {
    return String(error.code);
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * True when `targetPath` equals one of `roots` or lies beneath it. Matching
 * happens on whole path segments, so /opt/app does not exclude /opt/apple.
 */
export function isPathInsideRoots(targetPath: string, roots: string[], caseInsensitive = false): boolean {
  const fold = (value: string) => (caseInsensitive ? value.toLowerCase() : value);
  const resolvedTarget = fold(path.resolve(targetPath));
  for (const root of roots) {
    const resolvedRoot = fold(path.resolve(root));
    if (resolvedTarget === resolvedRoot) return true;
    const prefix = resolvedRoot.endsWith(path.sep) ? resolvedRoot : `${resolvedRoot}${path.sep}`;
    if (resolvedTarget.startsWith(prefix)) return true;
  }
  return false;
}

export function displayNameFromFile(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return (ext ? base.slice(0, -ext.length) : base).trim();
}

type FileKind = 'shortcut' | 'executable';

interface WalkContext {
  options: DiscoveryOptions;
  shortcutExts: Set<string>;
  executableExts: Set<string>;
  warnings: DiscoveryWarning[];
  hits: ProgramRecord[];
  candidateCount: number;
}

function classify(filePath: string, ctx: WalkContext): FileKind | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ctx.shortcutExts.has(ext)) return 'shortcut';
  if (ctx.executableExts.has(ext)) return 'executable';
  return null;
}

async function resolveTarget(filePath: string, kind: FileKind, ctx: WalkContext): Promise<string | null> {
  let target: string | null = filePath;
  if (kind === 'shortcut') {
    try {
      target = await ctx.options.resolver.resolve(filePath);
    } catch (error) {
      ctx.warnings.push({ kind: 'unresolved-shortcut', path: filePath, detail: errorCode(error) });
      return null;
    }
    if (!target) {
      ctx.warnings.push({ kind: 'unresolved-shortcut', path: filePath });
      return null;
    }
  }

  try {
    const stat = await fs.promises.stat(target);
    if (!stat.isFile()) throw new Error('not a file');
    return await fs.promises.realpath(target);
  } catch {
    if (kind === 'shortcut') {
      ctx.warnings.push({ kind: 'broken-shortcut', path: filePath, detail: target ?? undefined });
    }
    return null;
  }
}

async function visitFile(filePath: string, origin: ScanRoot['origin'], ctx: WalkContext): Promise<void> {
  const kind = classify(filePath, ctx);
  if (!kind) return;

  const name = displayNameFromFile(filePath);
  if (!name || SKIP_NAME_RE.test(name)) return;
  ctx.candidateCount++;

  const launchTarget = await resolveTarget(filePath, kind, ctx);
  if (!launchTarget) return;
  ctx.hits.push({ name, launchTarget, origin });
}

async function walkRoot(root: ScanRoot, ctx: WalkContext): Promise<void> {
  const { excludePaths, caseInsensitivePaths } = ctx.options;
  const rootPath = path.resolve(root.path);
  if (isPathInsideRoots(rootPath, excludePaths, caseInsensitivePaths)) return;

  try {
    const stat = await fs.promises.stat(rootPath);
    if (!stat.isDirectory()) throw new Error('not a directory');
  } catch (error) {
    ctx.warnings.push({ kind: 'missing-root', path: rootPath, detail: errorCode(error) });
    return;
  }

  const queue: string[] = [rootPath];
  const visited = new Set<string>();

  for (let dir = queue.shift(); dir !== undefined; dir = queue.shift()) {
    let entries: fs.Dirent[];
    let realDir: string;
    try {
      realDir = await fs.promises.realpath(dir);
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      ctx.warnings.push({ kind: 'unreadable-directory', path: dir, detail: errorCode(error) });
      continue;
    }

    const visitKey = caseInsensitivePaths ? realDir.toLowerCase() : realDir;
    if (visited.has(visitKey)) {
      ctx.warnings.push({ kind: 'symlink-cycle', path: dir, detail: realDir });
      continue;
    }
    visited.add(visitKey);

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (isPathInsideRoots(fullPath, excludePaths, caseInsensitivePaths)) continue;

      let isDir = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        try {
          const stat = await fs.promises.stat(fullPath);
          isDir = stat.isDirectory();
          isFile = stat.isFile();
        } catch {
          // dangling link
          continue;
        }
      }

      if (isDir) queue.push(fullPath);
      else if (isFile) files.push(fullPath);
    }

    await Promise.all(files.map((file) => visitFile(file, root.origin, ctx)));
  }
}

/**
 * Collapses hits sharing a launch target. Runs once after every root has
 * been walked so the outcome does not depend on walk order.
 */
export function dedupeByTarget(hits: ProgramRecord[], caseInsensitive: boolean): ProgramRecord[] {
  const byIdentity = new Map<string, ProgramRecord>();
  for (const hit of hits) {
    const key = entryIdentity(hit.launchTarget, caseInsensitive);
    const current = byIdentity.get(key);
    byIdentity.set(key, current ? preferEntry(current, hit) : hit);
  }
  return Array.from(byIdentity.values()).sort(compareByName);
}

export async function discoverPrograms(options: DiscoveryOptions): Promise<DiscoveryReport> {
  const t0 = Date.now();
  const ctx: WalkContext = {
    options,
    shortcutExts: new Set(options.shortcutExtensions.map((ext) => ext.toLowerCase())),
    executableExts: new Set(options.executableExtensions.map((ext) => ext.toLowerCase())),
    warnings: [],
    hits: [],
    candidateCount: 0,
  };

  for (const root of options.roots) {
    await walkRoot(root, ctx);
  }

  return {
    programs: dedupeByTarget(ctx.hits, options.caseInsensitivePaths),
    warnings: ctx.warnings,
    candidateCount: ctx.candidateCount,
    durationMs: Date.now() - t0,
  };
}
