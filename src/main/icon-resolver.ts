/**
 * Icon Resolver
 *
 * Gives every entry an icon:
 * 1. Extracted PNG from the persistent disk cache (keyed by launch target)
 * 2. Batch extraction through the platform, written back to the disk cache
 * 3. A placeholder letter on a colour derived from the name
 *
 * Placeholders are pure values and are never written to disk.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import {
  createEntry,
  entryIdentity,
  type IconRef,
  type PlaceholderIcon,
  type ProgramEntry,
  type ProgramRecord,
} from './program-entry';
import type { LauncherPlatform } from './platform';

export const PLACEHOLDER_PALETTE = [
  '#E5484D',
  '#F76B15',
  '#FFC53D',
  '#46A758',
  '#12A594',
  '#00A2C7',
  '#0090FF',
  '#3E63DD',
  '#6E56CF',
  '#8E4EC6',
  '#D6409F',
  '#8D8D86',
] as const;

const ICON_SIZE = 48;
const EXTRACT_BATCH = 20;

// ─── Placeholders ───────────────────────────────────────────────────

export function placeholderIcon(name: string): PlaceholderIcon {
  const match = /[\p{L}\p{N}]/u.exec(String(name || ''));
  const letter = match ? match[0].toUpperCase() : '?';
  const digest = crypto.createHash('md5').update(String(name || '')).digest();
  const color = PLACEHOLDER_PALETTE[digest.readUInt32BE(0) % PLACEHOLDER_PALETTE.length];
  return { kind: 'placeholder', letter, color };
}

// ─── Icon Disk Cache ────────────────────────────────────────────────

function iconCacheKey(identity: string): string {
  // bump the prefix to invalidate every extracted icon
  return 'v1-' + crypto.createHash('md5').update(identity).digest('hex');
}

export interface IconResolverOptions {
  /** Directory icons live in; created on first write */
  iconDir: string;
  platform: Pick<LauncherPlatform, 'extractIcons' | 'caseInsensitivePaths'>;
  iconSize?: number;
}

export class IconResolver {
  private readonly iconDir: string;
  private readonly platform: IconResolverOptions['platform'];
  private readonly iconSize: number;

  constructor(options: IconResolverOptions) {
    this.iconDir = options.iconDir;
    this.platform = options.platform;
    this.iconSize = options.iconSize ?? ICON_SIZE;
  }

  iconFileFor(launchTarget: string): string {
    const identity = entryIdentity(launchTarget, this.platform.caseInsensitivePaths);
    return path.join(this.iconDir, `${iconCacheKey(identity)}.png`);
  }

  /**
   * Icon for an entry decoded from the index cache: the stored bitmap if it
   * is still on disk, otherwise a placeholder.
   */
  restore(name: string, iconFile: string | undefined): IconRef {
    if (iconFile && fs.existsSync(iconFile)) {
      return { kind: 'bitmap', file: iconFile };
    }
    return placeholderIcon(name);
  }

  /**
   * Resolves icons for freshly discovered programs. Never rejects.
   */
  async resolveAll(records: ProgramRecord[]): Promise<ProgramEntry[]> {
    const icons = new Map<string, IconRef>();
    const pending = new Set<string>();

    for (const record of records) {
      const file = this.iconFileFor(record.launchTarget);
      if (fs.existsSync(file)) {
        icons.set(record.launchTarget, { kind: 'bitmap', file });
      } else {
        pending.add(record.launchTarget);
      }
    }

    const needsExtraction = Array.from(pending);
    if (needsExtraction.length > 0) {
      console.log(`[Icons] Extracting ${needsExtraction.length} icons…`);
      for (let i = 0; i < needsExtraction.length; i += EXTRACT_BATCH) {
        const batch = needsExtraction.slice(i, i + EXTRACT_BATCH);
        const extracted = await this.extractBatch(batch);
        for (const [target, file] of extracted) {
          icons.set(target, { kind: 'bitmap', file });
        }
      }
    }

    return records.map((record) =>
      createEntry(
        record.name,
        record.launchTarget,
        record.origin,
        icons.get(record.launchTarget) ?? placeholderIcon(record.name)
      )
    );
  }

  private async extractBatch(targets: string[]): Promise<Map<string, string>> {
    const written = new Map<string, string>();
    let pngs: Map<string, Buffer>;
    try {
      pngs = await this.platform.extractIcons(targets, this.iconSize);
    } catch (error) {
      console.warn('[Icons] Batch extraction failed:', error);
      return written;
    }

    for (const target of targets) {
      const png = pngs.get(target);
      if (!png || png.length === 0) continue;
      const file = this.iconFileFor(target);
      try {
        await fs.promises.mkdir(this.iconDir, { recursive: true });
        const tmp = `${file}.${process.pid}.tmp`;
        await fs.promises.writeFile(tmp, png);
        await fs.promises.rename(tmp, file);
        written.set(target, file);
      } catch (error) {
        console.warn(`[Icons] Failed to store icon for ${target}:`, error);
      }
    }
    return written;
  }
}
