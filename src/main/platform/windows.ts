/**
 * platform/windows.ts
 *
 * Windows implementation of LauncherPlatform: Start Menu and Program Files
 * roots, .lnk decoding, and icon extraction via PowerShell + System.Drawing.
 */

import { exec } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { parseShellLink } from '../shortcut-file';
import type { LauncherPlatform, ScanRoot, ShortcutResolver } from './interface';

const execAsync = promisify(exec);

// ── Helpers ───────────────────────────────────────────────────────────────────

function startMenuRoots(env: NodeJS.ProcessEnv): string[] {
  const roots: string[] = [];
  const programData = env.ProgramData || env.PROGRAMDATA || 'C:\\ProgramData';
  roots.push(path.win32.join(programData, 'Microsoft', 'Windows', 'Start Menu', 'Programs'));
  if (env.APPDATA) {
    roots.push(path.win32.join(env.APPDATA, 'Microsoft', 'Windows', 'Start Menu', 'Programs'));
  }
  return roots;
}

function programFilesRoots(env: NodeJS.ProcessEnv): string[] {
  const candidates = [
    env.ProgramFiles || env.PROGRAMFILES || 'C:\\Program Files',
    env['ProgramFiles(x86)'] || env['PROGRAMFILES(X86)'] || 'C:\\Program Files (x86)',
  ];
  // 32-bit hosts report the same folder for both
  const seen = new Set<string>();
  return candidates.filter((root) => {
    const key = root.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Single-quote a path for PowerShell; embedded quotes are doubled. */
function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

const lnkResolver: ShortcutResolver = {
  async resolve(shortcutPath: string): Promise<string | null> {
    const data = await fs.promises.readFile(shortcutPath);
    return parseShellLink(data, shortcutPath);
  },
};

// cmd.exe rejects longer command lines
const MAX_COMMAND_LENGTH = 8191;

function iconScript(targets: string[], size: number): string {
  return `Add-Type -AssemblyName System.Drawing
$paths=@(${targets.map(quotePowerShell).join(',')})
$r=[ordered]@{}
foreach($p in $paths){
  try{
    $ic=[System.Drawing.Icon]::ExtractAssociatedIcon($p)
    $bm=New-Object System.Drawing.Bitmap($ic.ToBitmap(),${size},${size})
    $ms=New-Object System.IO.MemoryStream
    $bm.Save($ms,[System.Drawing.Imaging.ImageFormat]::Png)
    $r[$p]=[Convert]::ToBase64String($ms.ToArray())
    $ic.Dispose();$bm.Dispose();$ms.Dispose()
  }catch{$r[$p]=''}
}
$r|ConvertTo-Json -Compress`;
}

function iconCommand(targets: string[], size: number): string {
  const encoded = Buffer.from(iconScript(targets, size), 'utf16le').toString('base64');
  return `powershell -NoProfile -NonInteractive -EncodedCommand ${encoded}`;
}

/**
 * Splits targets so every encoded command fits on one command line. A
 * single target too long on its own still gets its own command.
 */
function chunkByCommandLength(targets: string[], size: number): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [];
  for (const target of targets) {
    const next = [...current, target];
    if (current.length > 0 && iconCommand(next, size).length > MAX_COMMAND_LENGTH) {
      chunks.push(current);
      current = [target];
    } else {
      current = next;
    }
  }
  if (current.length > 0) chunks.push(current);
  return chunks;
}

async function runIconScript(targets: string[], size: number): Promise<Map<string, Buffer>> {
  const result = new Map<string, Buffer>();
  try {
    const { stdout } = await execAsync(iconCommand(targets, size), { timeout: 60_000 });
    const raw = String(stdout).trim();
    if (raw) {
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object') {
        for (const [target, b64] of Object.entries(parsed)) {
          if (typeof b64 === 'string' && b64) {
            result.set(target, Buffer.from(b64, 'base64'));
          }
        }
      }
    }
  } catch (e) {
    console.warn('[Win] Icon batch extraction failed:', e);
  }
  return result;
}

// ── Implementation ────────────────────────────────────────────────────────────

export const windows: LauncherPlatform = {
  name: 'windows',
  caseInsensitivePaths: true,
  shortcutExtensions: ['.lnk'],
  executableExtensions: ['.exe'],
  createShortcutResolver: () => lnkResolver,

  defaultScanRoots(env: NodeJS.ProcessEnv): ScanRoot[] {
    return [
      ...startMenuRoots(env).map((root): ScanRoot => ({ path: root, origin: 'start-menu' })),
      ...programFilesRoots(env).map((root): ScanRoot => ({ path: root, origin: 'program-files' })),
    ];
  },

  async extractIcons(targets: string[], size: number): Promise<Map<string, Buffer>> {
    const result = new Map<string, Buffer>();
    for (const chunk of chunkByCommandLength(targets, size)) {
      for (const [target, png] of await runIconScript(chunk, size)) {
        result.set(target, png);
      }
    }
    return result;
  },
};
