import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { parseDesktopEntry, parseDesktopExec, parseShellLink, tokenizeExec } from '../shortcut-file';
import {
  LINK_FLAGS,
  ansiLinkInfo,
  buildShellLink,
  countedString,
  idList,
  shellLinkHeader,
  unicodeLinkInfo,
} from './helpers/shell-link';

describe('parseShellLink', () => {
  it('reads the ANSI local base path from LinkInfo', () => {
    expect(parseShellLink(buildShellLink('C:\\Program Files\\Editor\\editor.exe'))).toBe(
      'C:\\Program Files\\Editor\\editor.exe'
    );
  });

  it('skips the target ID list', () => {
    const data = Buffer.concat([
      shellLinkHeader(LINK_FLAGS.hasLinkTargetIdList | LINK_FLAGS.hasLinkInfo),
      idList(Buffer.alloc(6, 0xaa)),
      ansiLinkInfo('D:\\Games\\game.exe'),
    ]);
    expect(parseShellLink(data)).toBe('D:\\Games\\game.exe');
  });

  it('appends the common path suffix', () => {
    const data = Buffer.concat([shellLinkHeader(LINK_FLAGS.hasLinkInfo), ansiLinkInfo('C:\\Tools', 'bin\\run.exe')]);
    expect(parseShellLink(data)).toBe('C:\\Tools\\bin\\run.exe');
  });

  it('prefers the Unicode local base path', () => {
    const data = Buffer.concat([
      shellLinkHeader(LINK_FLAGS.hasLinkInfo),
      unicodeLinkInfo('C:\\Programme\\Größe\\app.exe'),
    ]);
    expect(parseShellLink(data)).toBe('C:\\Programme\\Größe\\app.exe');
  });

  it('resolves the relative path against the shortcut directory', () => {
    const data = Buffer.concat([
      shellLinkHeader(LINK_FLAGS.hasRelativePath | LINK_FLAGS.isUnicode),
      countedString('..\\Apps\\tool.exe', true),
    ]);
    expect(parseShellLink(data, '/links/sub/Tool.lnk')).toBe(path.resolve('/links/sub', '..', 'Apps', 'tool.exe'));
  });

  it('skips the name string before the relative path', () => {
    const data = Buffer.concat([
      shellLinkHeader(LINK_FLAGS.hasName | LINK_FLAGS.hasRelativePath),
      countedString('My Tool', false),
      countedString('.\\tool.exe', false),
    ]);
    expect(parseShellLink(data, '/links/Tool.lnk')).toBe(path.resolve('/links', '.', 'tool.exe'));
  });

  it('falls through to the relative path when LinkInfo has no local path', () => {
    const info = Buffer.alloc(28);
    info.writeUInt32LE(28, 0);
    info.writeUInt32LE(0x1c, 4);
    const data = Buffer.concat([
      shellLinkHeader(LINK_FLAGS.hasLinkInfo | LINK_FLAGS.hasRelativePath | LINK_FLAGS.isUnicode),
      info,
      countedString('tool.exe', true),
    ]);
    expect(parseShellLink(data, '/links/Tool.lnk')).toBe(path.resolve('/links', 'tool.exe'));
  });

  it('needs the shortcut path to resolve a relative target', () => {
    const data = Buffer.concat([shellLinkHeader(LINK_FLAGS.hasRelativePath), countedString('tool.exe', false)]);
    expect(parseShellLink(data)).toBeNull();
  });

  it('returns null for malformed data', () => {
    expect(parseShellLink(Buffer.alloc(10))).toBeNull();
    expect(parseShellLink(Buffer.from('not a shortcut at all, just some text that is long enough'.repeat(2)))).toBeNull();

    const wrongClsid = shellLinkHeader(LINK_FLAGS.hasLinkInfo);
    wrongClsid[4] = 0xff;
    expect(parseShellLink(Buffer.concat([wrongClsid, ansiLinkInfo('C:\\a.exe')]))).toBeNull();

    const truncated = Buffer.concat([shellLinkHeader(LINK_FLAGS.hasLinkInfo), ansiLinkInfo('C:\\a.exe')]);
    expect(parseShellLink(truncated.subarray(0, truncated.length - 4))).toBeNull();

    expect(parseShellLink(shellLinkHeader(0))).toBeNull();
  });
});

describe('parseDesktopEntry', () => {
  it('reads the main group and ignores actions and localized keys', () => {
    const text = [
      '# generated by the packager',
      '[Desktop Entry]',
      'Type=Application',
      'Name=Text Editor',
      'Name[de]=Texteditor',
      'Exec=gedit %U',
      'NoDisplay=false',
      '',
      '[Desktop Action new-window]',
      'Exec=gedit --new-window',
    ].join('\n');
    expect(parseDesktopEntry(text)).toEqual({
      type: 'Application',
      name: 'Text Editor',
      exec: 'gedit %U',
      hidden: false,
    });
  });

  it('marks hidden entries', () => {
    expect(parseDesktopEntry('[Desktop Entry]\nType=Application\nHidden=true\n')?.hidden).toBe(true);
    expect(parseDesktopEntry('[Desktop Entry]\r\nNoDisplay=true\r\n')?.hidden).toBe(true);
  });

  it('returns null without a Desktop Entry group', () => {
    expect(parseDesktopEntry('Type=Application\nExec=foo')).toBeNull();
    expect(parseDesktopEntry('')).toBeNull();
  });
});

describe('tokenizeExec', () => {
  it('honours quotes and drops field codes', () => {
    expect(tokenizeExec('"/opt/My App/run" --flag %U')).toEqual(['/opt/My App/run', '--flag']);
  });

  it('unescapes backslashes', () => {
    expect(tokenizeExec('/usr/bin/app\\ name --x')).toEqual(['/usr/bin/app name', '--x']);
  });
});

describe('parseDesktopExec', () => {
  it('skips an env prefix', () => {
    expect(parseDesktopExec('env FOO=1 BAR=2 firefox %u')).toEqual({ program: 'firefox', args: [] });
    expect(parseDesktopExec('/usr/bin/env GDK_BACKEND=x11 /opt/app/bin/app')).toEqual({
      program: '/opt/app/bin/app',
      args: [],
    });
  });

  it('keeps the arguments after the program', () => {
    expect(parseDesktopExec('flatpak run org.gimp.GIMP %U')).toEqual({
      program: 'flatpak',
      args: ['run', 'org.gimp.GIMP'],
    });
  });

  it('returns null for an empty Exec', () => {
    expect(parseDesktopExec('')).toBeNull();
    expect(parseDesktopExec('%U')).toBeNull();
  });
});
