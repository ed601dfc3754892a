/**
 * platform/interface.ts
 *
 * Contract every platform implementation must satisfy.
 * The catalog imports from platform/index.ts, not from windows.ts or
 * posix.ts directly.
 */

import type { EntryOrigin } from '../program-entry';

// ── Shared types ─────────────────────────────────────────────────────────────

export interface ScanRoot {
  path: string;
  origin: EntryOrigin;
}

/**
 * Turns a shortcut file into the absolute path it points at, or null when it
 * cannot be decoded. Rejects when the file cannot be read. Whether the
 * target still exists is checked by the caller.
 */
export interface ShortcutResolver {
  resolve(shortcutPath: string): Promise<string | null>;
}

// ── Platform interface ────────────────────────────────────────────────────────

export interface LauncherPlatform {
  readonly name: 'windows' | 'posix';

  /** Whether two paths differing only in case name the same file. */
  readonly caseInsensitivePaths: boolean;

  /** Lowercase, dot-prefixed extensions of shortcut files. */
  readonly shortcutExtensions: readonly string[];

  /** Lowercase, dot-prefixed extensions of directly launchable files. */
  readonly executableExtensions: readonly string[];

  /** Resolver for this platform's shortcuts; `env` supplies PATH lookups. */
  createShortcutResolver(env: NodeJS.ProcessEnv): ShortcutResolver;

  /**
   * Built-in scan roots, Start Menu first. Roots that do not exist are
   * still returned; discovery reports them as missing.
   */
  defaultScanRoots(env: NodeJS.ProcessEnv): ScanRoot[];

  /**
   * Batch-extract PNG icons for launch targets. Targets without an icon are
   * simply absent from the map; this never rejects.
   */
  extractIcons(targets: string[], size: number): Promise<Map<string, Buffer>>;
}
