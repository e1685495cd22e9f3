import { describe, test, expect } from 'vitest';
import {
  ConstructionError,
  defaultCharset,
  libraryFileName,
  parseDictionaryCharset,
  resolveCharset,
  resolveEnvironment,
  resolveLibraryPath,
  type CommandRunner
} from '@mecab-lattice/core';

const DICTIONARY_INFO = ['filename:\t/usr/lib/mecab/dic/ipadic/sys.dic', 'version:\t102', 'charset:\tUTF8', 'type:\t0'].join('\n');

function runner(outputs: Record<string, string>): CommandRunner {
  return (command) => {
    const output = outputs[command];
    if (output === undefined) throw new Error(`${command}: command not found`);
    return output;
  };
}

describe('resolveLibraryPath', () => {
  test('MECAB_PATH wins and is made absolute', () => {
    const path = resolveLibraryPath({ env: { MECAB_PATH: '/opt/mecab/lib/libmecab.so' }, run: runner({}) });
    expect(path).toBe('/opt/mecab/lib/libmecab.so');
  });

  test('asks mecab-config for the library directory', () => {
    const seen: string[] = [];
    const path = resolveLibraryPath({
      env: {},
      platform: 'linux',
      run: runner({ 'mecab-config': '/usr/local/lib\n' }),
      fileExists: (file) => {
        seen.push(file);
        return true;
      }
    });
    expect(path).toBe('/usr/local/lib/libmecab.so');
    expect(seen).toEqual(['/usr/local/lib/libmecab.so']);
  });

  test('uses the platform library name', () => {
    const path = resolveLibraryPath({
      env: {},
      platform: 'darwin',
      run: runner({ 'mecab-config': '/opt/homebrew/lib' }),
      fileExists: () => true
    });
    expect(path).toBe('/opt/homebrew/lib/libmecab.dylib');
  });

  test('fails when mecab-config is missing', () => {
    expect(() => resolveLibraryPath({ env: {}, platform: 'linux', run: runner({}) })).toThrow(
      'libmecab.so could not be found, please use MECAB_PATH'
    );
  });

  test('fails when the library file does not exist', () => {
    expect(() =>
      resolveLibraryPath({
        env: {},
        platform: 'linux',
        run: runner({ 'mecab-config': '/nowhere' }),
        fileExists: () => false
      })
    ).toThrow(ConstructionError);
  });

  test('fails on empty mecab-config output', () => {
    expect(() =>
      resolveLibraryPath({ env: {}, platform: 'linux', run: runner({ 'mecab-config': '  \n' }), fileExists: () => true })
    ).toThrow('mecab-config could not locate libmecab.so, please use MECAB_PATH');
  });
});

describe('resolveCharset', () => {
  test('MECAB_CHARSET wins', () => {
    expect(resolveCharset({ env: { MECAB_CHARSET: 'euc-jp' }, run: runner({ mecab: DICTIONARY_INFO }) })).toEqual({
      charset: 'euc-jp',
      charsetSource: 'env'
    });
  });

  test('reads the charset from mecab -D', () => {
    expect(resolveCharset({ env: {}, run: runner({ mecab: DICTIONARY_INFO }) })).toEqual({
      charset: 'utf8',
      charsetSource: 'mecab'
    });
  });

  test('falls back to the platform default when mecab cannot run', () => {
    expect(resolveCharset({ env: {}, platform: 'linux', run: runner({}) })).toEqual({
      charset: 'euc-jp',
      charsetSource: 'default'
    });
    expect(resolveCharset({ env: {}, platform: 'win32', run: runner({}) }).charset).toBe('shift_jis');
  });

  test('fails when mecab -D is not recognized', () => {
    expect(() => resolveCharset({ env: {}, run: runner({ mecab: 'unrecognized option -D' }) })).toThrow(
      'mecab -D command not recognized'
    );
  });

  test('fails when mecab -D reports no charset', () => {
    expect(() => resolveCharset({ env: {}, run: runner({ mecab: 'version:\t102' }) })).toThrow(ConstructionError);
  });
});

describe('resolveEnvironment', () => {
  test('combines library path and charset', () => {
    expect(
      resolveEnvironment({
        env: {},
        platform: 'linux',
        run: runner({ 'mecab-config': '/usr/lib', mecab: DICTIONARY_INFO }),
        fileExists: () => true
      })
    ).toEqual({ libraryPath: '/usr/lib/libmecab.so', charset: 'utf8', charsetSource: 'mecab' });
  });
});

describe('platform defaults', () => {
  test('library names and charsets', () => {
    expect(libraryFileName('win32')).toBe('libmecab.dll');
    expect(libraryFileName('freebsd')).toBe('libmecab.so');
    expect(defaultCharset('darwin')).toBe('utf8');
  });

  test('parseDictionaryCharset', () => {
    expect(parseDictionaryCharset('charset: SHIFT-JIS\n')).toBe('shift-jis');
    expect(parseDictionaryCharset('filename: sys.dic')).toBeNull();
  });
});
