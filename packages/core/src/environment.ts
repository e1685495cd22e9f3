// mecab-lattice/environment - Locate libmecab and the dictionary charset
//
// MECAB_PATH and MECAB_CHARSET take precedence; otherwise the mecab-config
// and mecab executables are asked.

import { execFileSync } from 'child_process';
import { existsSync } from 'fs';
import path from 'path';
import { ConstructionError, errorMessage } from './errors.js';
import { dp } from './debug.js';

export const MECAB_PATH = 'MECAB_PATH';
export const MECAB_CHARSET = 'MECAB_CHARSET';

export type CharsetSource = 'env' | 'mecab' | 'default';

export interface MecabEnvironment {
  libraryPath: string;
  charset: string;
  charsetSource: CharsetSource;
}

/**
 * Run an executable and return its stdout; throws when it cannot be run.
 */
export type CommandRunner = (command: string, args: string[]) => string;

export interface EnvironmentOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  fileExists?: (file: string) => boolean;
}

export const defaultRunner: CommandRunner = (command, args) =>
  execFileSync(command, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] });

export function libraryFileName(platform: NodeJS.Platform): string {
  if (platform === 'darwin') return 'libmecab.dylib';
  if (platform === 'win32') return 'libmecab.dll';
  return 'libmecab.so';
}

export function defaultCharset(platform: NodeJS.Platform): string {
  if (platform === 'win32') return 'shift_jis';
  if (platform === 'darwin') return 'utf8';
  return 'euc-jp';
}

/**
 * Pull the charset out of `mecab -D` output ("charset:\tutf8").
 */
export function parseDictionaryCharset(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const match = /^charset:?\s+(\S+)/.exec(line.trim());
    if (match) return match[1].toLowerCase();
  }
  return null;
}

export function resolveCharset(options: EnvironmentOptions = {}): { charset: string; charsetSource: CharsetSource } {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const run = options.run ?? defaultRunner;

  const fromEnv = env[MECAB_CHARSET]?.trim();
  if (fromEnv) {
    dp(`MeCab charset from ${MECAB_CHARSET}: ${fromEnv}`);
    return { charset: fromEnv, charsetSource: 'env' };
  }

  let output: string;
  try {
    output = run('mecab', ['-D']);
  } catch (error) {
    const charset = defaultCharset(platform);
    dp(`mecab -D failed (${errorMessage(error)}), defaulting MeCab charset to ${charset}`);
    return { charset, charsetSource: 'default' };
  }

  if (output.startsWith('unrecognized')) {
    throw new ConstructionError('mecab -D command not recognized');
  }
  const charset = parseDictionaryCharset(output);
  if (!charset) {
    throw new ConstructionError('MeCab dictionary charset not found in mecab -D output');
  }
  dp(`MeCab charset from mecab -D: ${charset}`);
  return { charset, charsetSource: 'mecab' };
}

export function resolveLibraryPath(options: EnvironmentOptions = {}): string {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const run = options.run ?? defaultRunner;
  const fileExists = options.fileExists ?? existsSync;

  const fromEnv = env[MECAB_PATH]?.trim();
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  const lib = libraryFileName(platform);
  let libDir: string;
  try {
    libDir = run('mecab-config', ['--libs-only-L']).trim();
  } catch (error) {
    throw new ConstructionError(`${lib} could not be found, please use ${MECAB_PATH}`, { cause: error });
  }
  if (!libDir || libDir.startsWith('unrecognized')) {
    throw new ConstructionError(`mecab-config could not locate ${lib}, please use ${MECAB_PATH}`);
  }

  const candidate = path.resolve(libDir, lib);
  if (!fileExists(candidate)) {
    throw new ConstructionError(`${candidate} could not be found, please use ${MECAB_PATH}`);
  }
  dp(`MeCab library from mecab-config: ${candidate}`);
  return candidate;
}

export function resolveEnvironment(options: EnvironmentOptions = {}): MecabEnvironment {
  const libraryPath = resolveLibraryPath(options);
  const { charset, charsetSource } = resolveCharset(options);
  return { libraryPath, charset, charsetSource };
}
