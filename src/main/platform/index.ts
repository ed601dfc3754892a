/**
 * platform/index.ts
 *
 * Exports the correct LauncherPlatform implementation for the current OS.
 * Import from here rather than from windows.ts or posix.ts.
 *
 *   import { platform } from './platform';
 *   const roots = platform.defaultScanRoots(process.env);
 */

export type { LauncherPlatform, ScanRoot, ShortcutResolver } from './interface';

import { posix } from './posix';
import { windows } from './windows';

export const platform =
  process.platform === 'win32' ? windows : posix;
