import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadLauncherConfig, normalizeLauncherConfig } from '../launcher-config';

let tempDir = '';

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-config-test-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('normalizeLauncherConfig', () => {
  it('reads the documented snake_case keys', () => {
    expect(
      normalizeLauncherConfig({
        search_icon_size: 24,
        program_icon_size: 64,
        max_results: 25,
        extra_index_paths: ['D:\\Portable'],
        exclude_paths: ['C:\\Program Files\\WindowsApps'],
        initial_sort: 'random',
        enable_cache: false,
      })
    ).toEqual({
      searchIconSize: 24,
      programIconSize: 64,
      maxResults: 25,
      extraIndexPaths: ['D:\\Portable'],
      excludePaths: ['C:\\Program Files\\WindowsApps'],
      initialSort: 'random',
      enableCache: false,
    });
  });

  it('also accepts camelCase keys', () => {
    const config = normalizeLauncherConfig({ maxResults: 3, initialSort: 'shuffle', enableCache: 'false' });
    expect(config.maxResults).toBe(3);
    expect(config.initialSort).toBe('random');
    expect(config.enableCache).toBe(false);
  });

  it('falls back per field on invalid values', () => {
    const config = normalizeLauncherConfig({
      max_results: 0,
      search_icon_size: 'big',
      program_icon_size: -4,
      initial_sort: 'by-usage',
      enable_cache: 'maybe',
      extra_index_paths: 'D:\\Portable',
    });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('floors fractional sizes', () => {
    expect(normalizeLauncherConfig({ max_results: 7.9 }).maxResults).toBe(7);
  });

  it('trims path lists and drops blanks, duplicates and non-strings', () => {
    const config = normalizeLauncherConfig({
      extra_index_paths: [' /opt/tools ', '', '/opt/tools', 42, null, '/srv/apps'],
    });
    expect(config.extraIndexPaths).toEqual(['/opt/tools', '/srv/apps']);
  });

  it('returns defaults for non-object input', () => {
    expect(normalizeLauncherConfig(null)).toEqual(DEFAULT_CONFIG);
    expect(normalizeLauncherConfig([1, 2])).toEqual(DEFAULT_CONFIG);
    expect(normalizeLauncherConfig('max_results=5')).toEqual(DEFAULT_CONFIG);
  });

  it('does not hand out the default path arrays', () => {
    const config = normalizeLauncherConfig(undefined);
    config.excludePaths.push('/tmp');
    expect(DEFAULT_CONFIG.excludePaths).toEqual([]);
  });
});

describe('loadLauncherConfig', () => {
  it('loads and normalizes a JSON file', () => {
    const file = path.join(tempDir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ max_results: 4, exclude_paths: ['/opt/games'] }));
    const config = loadLauncherConfig(file);
    expect(config.maxResults).toBe(4);
    expect(config.excludePaths).toEqual(['/opt/games']);
    expect(config.initialSort).toBe('alphabetical');
  });

  it('returns defaults when the file is missing', () => {
    expect(loadLauncherConfig(path.join(tempDir, 'absent.json'))).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults when the file is malformed', () => {
    const file = path.join(tempDir, 'config.json');
    fs.writeFileSync(file, '{ "max_results": ');
    expect(loadLauncherConfig(file)).toEqual(DEFAULT_CONFIG);
  });
});
