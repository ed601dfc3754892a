/**
 * Launcher Config
 *
 * What this file is:
 * - The configuration object the index and search engine consume.
 *
 * What it does:
 * - Normalizes untrusted JSON (snake_case keys as written by users) into a
 *   typed LauncherConfig, falling back to defaults field by field.
 *
 * The core never writes configuration; hosts own the file.
 */

import * as fs from 'fs';

export type InitialSort = 'alphabetical' | 'random';

export interface LauncherConfig {
  /** UI-only, passed through untouched */
  searchIconSize: number;
  /** Pixel size icons are extracted at */
  programIconSize: number;
  maxResults: number;
  extraIndexPaths: string[];
  excludePaths: string[];
  initialSort: InitialSort;
  enableCache: boolean;
}

export const DEFAULT_CONFIG: LauncherConfig = {
  searchIconSize: 18,
  programIconSize: 42,
  maxResults: 10,
  extraIndexPaths: [],
  excludePaths: [],
  initialSort: 'alphabetical',
  enableCache: true,
};

function defaults(): LauncherConfig {
  return { ...DEFAULT_CONFIG, extraIndexPaths: [], excludePaths: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.floor(n);
}

/**
 * Keeps only non-empty trimmed strings, dropping duplicates in order.
 */
function sanitizePathList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') continue;
    const trimmed = item.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}

function normalizeInitialSort(value: unknown): InitialSort {
  const raw = String(value ?? '').trim().toLowerCase();
  if (raw === 'random' || raw === 'shuffle') return 'random';
  return 'alphabetical';
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

function pick(parsed: Record<string, unknown>, snakeKey: string, camelKey: string): unknown {
  return parsed[snakeKey] !== undefined ? parsed[snakeKey] : parsed[camelKey];
}

/**
 * Builds a normalized config from parsed JSON. Accepts both the documented
 * snake_case keys and camelCase.
 */
export function normalizeLauncherConfig(parsed: unknown): LauncherConfig {
  if (!isRecord(parsed)) return defaults();

  return {
    searchIconSize: normalizePositiveInt(
      pick(parsed, 'search_icon_size', 'searchIconSize'),
      DEFAULT_CONFIG.searchIconSize
    ),
    programIconSize: normalizePositiveInt(
      pick(parsed, 'program_icon_size', 'programIconSize'),
      DEFAULT_CONFIG.programIconSize
    ),
    maxResults: normalizePositiveInt(pick(parsed, 'max_results', 'maxResults'), DEFAULT_CONFIG.maxResults),
    extraIndexPaths: sanitizePathList(pick(parsed, 'extra_index_paths', 'extraIndexPaths')),
    excludePaths: sanitizePathList(pick(parsed, 'exclude_paths', 'excludePaths')),
    initialSort: normalizeInitialSort(pick(parsed, 'initial_sort', 'initialSort')),
    enableCache: normalizeBoolean(pick(parsed, 'enable_cache', 'enableCache'), DEFAULT_CONFIG.enableCache),
  };
}

/**
 * Reads a JSON config file. A missing or malformed file yields defaults.
 */
export function loadLauncherConfig(filePath: string): LauncherConfig {
  try {
    const raw = fs.readFileSync(filePath, 'utf-8');
    return normalizeLauncherConfig(JSON.parse(raw));
  } catch (error) {
    if (fs.existsSync(filePath)) {
      console.warn(`[Config] Failed to read ${filePath}, using defaults:`, error);
    }
    return defaults();
  }
}
