/**
 * platform/posix.ts
 *
 * Linux/BSD implementation of LauncherPlatform. XDG `applications`
 * directories play the role of the Start Menu, /opt that of Program Files.
 * There is no native icon extraction; every entry gets a placeholder.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseDesktopEntry, parseDesktopExec } from '../shortcut-file';
import type { LauncherPlatform, ScanRoot, ShortcutResolver } from './interface';

// ── Helpers ───────────────────────────────────────────────────────────────────

function xdgApplicationDirs(env: NodeJS.ProcessEnv): string[] {
  const dataHome = env.XDG_DATA_HOME || path.join(env.HOME || os.homedir(), '.local', 'share');
  const dataDirs = (env.XDG_DATA_DIRS || '/usr/local/share:/usr/share')
    .split(':')
    .map((dir) => dir.trim())
    .filter(Boolean);
  const dirs = [dataHome, ...dataDirs].map((dir) => path.join(dir, 'applications'));
  return Array.from(new Set(dirs));
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) return false;
    await fs.promises.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Looks a bare command up on PATH the way a shell would.
 */
export async function findOnPath(command: string, pathValue: string | undefined): Promise<string | null> {
  for (const dir of String(pathValue || '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (await isExecutableFile(candidate)) return candidate;
  }
  return null;
}

/**
 * An Exec line with arguments (`flatpak run org.gimp.GIMP`, `sh -c ...`)
 * names a wrapper shared by many entries, so the entry file itself is the
 * launch target. A bare program resolves to its executable.
 */
function desktopEntryResolver(env: NodeJS.ProcessEnv): ShortcutResolver {
  return {
    async resolve(shortcutPath: string): Promise<string | null> {
      const text = await fs.promises.readFile(shortcutPath, 'utf-8');
      const entry = parseDesktopEntry(text);
      if (!entry || entry.hidden || entry.type !== 'Application') return null;

      const exec = parseDesktopExec(entry.exec);
      if (!exec) return null;
      if (exec.args.length > 0) return path.resolve(shortcutPath);
      if (path.isAbsolute(exec.program)) return exec.program;
      return findOnPath(exec.program, env.PATH);
    },
  };
}

// ── Implementation ────────────────────────────────────────────────────────────

export const posix: LauncherPlatform = {
  name: 'posix',
  caseInsensitivePaths: false,
  shortcutExtensions: ['.desktop'],
  executableExtensions: ['.appimage'],
  createShortcutResolver: desktopEntryResolver,

  defaultScanRoots(env: NodeJS.ProcessEnv): ScanRoot[] {
    return [
      ...xdgApplicationDirs(env).map((dir): ScanRoot => ({ path: dir, origin: 'start-menu' })),
      { path: '/opt', origin: 'program-files' },
    ];
  },

  async extractIcons(_targets: string[], _size: number): Promise<Map<string, Buffer>> {
    return new Map();
  },
};
