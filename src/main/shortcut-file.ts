/**
 * Shortcut File Decoding
 *
 * Pure decoders for the two shortcut formats discovery understands:
 * - Windows Shell Link (.lnk) binaries
 * - freedesktop Desktop Entry (.desktop) files
 *
 * Both return null on malformed input instead of throwing.
 */

import * as path from 'path';

// ─── Shell Link (.lnk) ──────────────────────────────────────────────

const SHELL_LINK_HEADER_SIZE = 0x4c;
// 00021401-0000-0000-C000-000000000046 in on-disk byte order
const SHELL_LINK_CLSID_HEX = '0114020000000000c000000000000046';

const HAS_LINK_TARGET_ID_LIST = 0x1;
const HAS_LINK_INFO = 0x2;
const HAS_NAME = 0x4;
const HAS_RELATIVE_PATH = 0x8;
const IS_UNICODE = 0x80;

const VOLUME_ID_AND_LOCAL_BASE_PATH = 0x1;
const LINK_INFO_UNICODE_HEADER_SIZE = 0x24;

function readCString(data: Buffer, offset: number, limit: number): string | null {
  if (offset <= 0 || offset >= limit) return null;
  const end = data.indexOf(0, offset);
  if (end < 0 || end >= limit) return null;
  return data.toString('latin1', offset, end);
}

function readUtf16String(data: Buffer, offset: number, limit: number): string | null {
  if (offset <= 0 || offset >= limit) return null;
  let end = offset;
  while (end + 1 < limit) {
    if (data[end] === 0 && data[end + 1] === 0) {
      return data.toString('utf16le', offset, end);
    }
    end += 2;
  }
  return null;
}

function joinWindowsPath(base: string, suffix: string): string {
  if (!suffix) return base;
  return base.endsWith('\\') ? `${base}${suffix}` : `${base}\\${suffix}`;
}

interface LinkInfoResult {
  size: number;
  target: string | null;
}

function readLinkInfo(data: Buffer, start: number): LinkInfoResult | null {
  if (start + 28 > data.length) return null;
  const size = data.readUInt32LE(start);
  const headerSize = data.readUInt32LE(start + 4);
  const infoFlags = data.readUInt32LE(start + 8);
  if (size < 28 || start + size > data.length) return null;
  if (!(infoFlags & VOLUME_ID_AND_LOCAL_BASE_PATH)) return { size, target: null };

  const limit = start + size;
  let base: string | null = null;
  let suffix: string | null = null;

  if (headerSize >= LINK_INFO_UNICODE_HEADER_SIZE && start + 36 <= limit) {
    const baseOffset = data.readUInt32LE(start + 28);
    const suffixOffset = data.readUInt32LE(start + 32);
    if (baseOffset) base = readUtf16String(data, start + baseOffset, limit);
    if (suffixOffset) suffix = readUtf16String(data, start + suffixOffset, limit);
  }

  const ansiBaseOffset = data.readUInt32LE(start + 16);
  const ansiSuffixOffset = data.readUInt32LE(start + 24);
  if (base === null && ansiBaseOffset) {
    base = readCString(data, start + ansiBaseOffset, limit);
  }
  if (suffix === null && ansiSuffixOffset) {
    suffix = readCString(data, start + ansiSuffixOffset, limit);
  }
  if (!base) return { size, target: null };

  return { size, target: joinWindowsPath(base, suffix ?? '') };
}

function readCountedString(
  data: Buffer,
  offset: number,
  unicode: boolean
): { value: string; next: number } | null {
  if (offset + 2 > data.length) return null;
  const count = data.readUInt16LE(offset);
  const byteLength = unicode ? count * 2 : count;
  const start = offset + 2;
  if (start + byteLength > data.length) return null;
  const value = data.toString(unicode ? 'utf16le' : 'latin1', start, start + byteLength);
  return { value, next: start + byteLength };
}

/**
 * Decodes the absolute target of a .lnk file. When the link carries no
 * LinkInfo local path, the relative path string is resolved against the
 * shortcut's own directory (requires `shortcutPath`).
 */
export function parseShellLink(data: Buffer, shortcutPath?: string): string | null {
  if (data.length < SHELL_LINK_HEADER_SIZE) return null;
  if (data.readUInt32LE(0) !== SHELL_LINK_HEADER_SIZE) return null;
  if (data.subarray(4, 20).toString('hex') !== SHELL_LINK_CLSID_HEX) return null;

  const flags = data.readUInt32LE(20);
  let offset = SHELL_LINK_HEADER_SIZE;

  if (flags & HAS_LINK_TARGET_ID_LIST) {
    if (offset + 2 > data.length) return null;
    offset += 2 + data.readUInt16LE(offset);
    if (offset > data.length) return null;
  }

  if (flags & HAS_LINK_INFO) {
    const info = readLinkInfo(data, offset);
    if (!info) return null;
    if (info.target) return info.target;
    offset += info.size;
  }

  if (!(flags & HAS_RELATIVE_PATH) || !shortcutPath) return null;

  const unicode = Boolean(flags & IS_UNICODE);
  if (flags & HAS_NAME) {
    const name = readCountedString(data, offset, unicode);
    if (!name) return null;
    offset = name.next;
  }
  const relative = readCountedString(data, offset, unicode);
  if (!relative || !relative.value.trim()) return null;

  const segments = relative.value.split(/[\\/]+/).filter(Boolean);
  return path.resolve(path.dirname(shortcutPath), ...segments);
}

// ─── Desktop Entry (.desktop) ───────────────────────────────────────

export interface DesktopEntry {
  type: string;
  name: string;
  exec: string;
  hidden: boolean;
}

/**
 * Reads the [Desktop Entry] group. Localized keys (Name[de]=…) are ignored.
 */
export function parseDesktopEntry(text: string): DesktopEntry | null {
  const values = new Map<string, string>();
  let inMainGroup = false;
  let sawMainGroup = false;

  for (const rawLine of String(text || '').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('[') && line.endsWith(']')) {
      inMainGroup = line === '[Desktop Entry]';
      if (inMainGroup) sawMainGroup = true;
      continue;
    }
    if (!inMainGroup) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    if (!values.has(key)) values.set(key, line.slice(eq + 1).trim());
  }

  if (!sawMainGroup) return null;

  return {
    type: values.get('Type') ?? '',
    name: values.get('Name') ?? '',
    exec: values.get('Exec') ?? '',
    hidden: values.get('Hidden') === 'true' || values.get('NoDisplay') === 'true',
  };
}

/**
 * Splits an Exec value into arguments, honouring double quotes and
 * backslash escapes, and drops %-field codes.
 */
export function tokenizeExec(exec: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quoted = false;
  let hasToken = false;

  for (let i = 0; i < exec.length; i++) {
    const ch = exec[i];
    if (ch === '\\' && i + 1 < exec.length) {
      current += exec[++i];
      hasToken = true;
    } else if (ch === '"') {
      quoted = !quoted;
      hasToken = true;
    } else if (!quoted && /\s/.test(ch)) {
      if (hasToken) tokens.push(current);
      current = '';
      hasToken = false;
    } else {
      current += ch;
      hasToken = true;
    }
  }
  if (hasToken) tokens.push(current);

  return tokens.filter((token) => !/^%[a-zA-Z]$/.test(token));
}

export interface DesktopExec {
  program: string;
  args: string[];
}

/**
 * The program an Exec line launches and its arguments, skipping an
 * `env VAR=value` prefix. Field codes are already dropped from `args`.
 */
export function parseDesktopExec(exec: string): DesktopExec | null {
  const tokens = tokenizeExec(exec);
  let index = 0;
  if (tokens[index] !== undefined && path.posix.basename(tokens[index]) === 'env') {
    index++;
    while (index < tokens.length && /^[A-Za-z_][A-Za-z0-9_]*=/.test(tokens[index])) index++;
  }
  const program = tokens[index];
  if (!program) return null;
  return { program, args: tokens.slice(index + 1) };
}
