// mecab-lattice/options - MeCab option grammar
//
// Options arrive as a MeCab-style command line ("-N2 --node-format=%m\n") or
// as an object, and leave as the long-form flag string mecab_model_new2 takes.

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { ConstraintError } from './errors.js';
import { dp } from './debug.js';

export interface MecabOptions {
  dicdir?: string;
  userdic?: string;
  /** Deprecated by MeCab; use marginal or nbest */
  latticeLevel?: number;
  outputFormatType?: string;
  allMorphs?: boolean;
  nbest?: number;
  partial?: boolean;
  marginal?: boolean;
  maxGroupingSize?: number;
  nodeFormat?: string;
  unkFormat?: string;
  bosFormat?: string;
  eosFormat?: string;
  eonFormat?: string;
  unkFeature?: string;
  inputBufferSize?: number;
  allocateSentence?: boolean;
  theta?: number;
  costFactor?: number;
}

type KeysOf<T> = {
  [K in keyof MecabOptions]-?: NonNullable<MecabOptions[K]> extends T ? K : never;
}[keyof MecabOptions];

export type OptionSpec =
  | { short: string; long: string; key: KeysOf<string>; kind: 'string'; value: string; help: string }
  | { short: string; long: string; key: KeysOf<number>; kind: 'int' | 'float'; value: string; help: string }
  | { short: string; long: string; key: KeysOf<boolean>; kind: 'flag'; help: string };

export const NBEST_MAX = 512;

export const OPTION_SPECS: readonly OptionSpec[] = [
  { short: 'd', long: 'dicdir', key: 'dicdir', kind: 'string', value: 'dir', help: 'set DIR as a system dicdir' },
  { short: 'u', long: 'userdic', key: 'userdic', kind: 'string', value: 'file', help: 'use FILE as a user dictionary' },
  { short: 'l', long: 'lattice-level', key: 'latticeLevel', kind: 'int', value: 'int', help: 'lattice information level (DEPRECATED)' },
  { short: 'O', long: 'output-format-type', key: 'outputFormatType', kind: 'string', value: 'type', help: 'set output format type (wakati, none,...)' },
  { short: 'a', long: 'all-morphs', key: 'allMorphs', kind: 'flag', help: 'output all morphs (default false)' },
  { short: 'N', long: 'nbest', key: 'nbest', kind: 'int', value: 'int', help: 'output N best results (default 1)' },
  { short: 'p', long: 'partial', key: 'partial', kind: 'flag', help: 'partial parsing mode (default false)' },
  { short: 'm', long: 'marginal', key: 'marginal', kind: 'flag', help: 'output marginal probability (default false)' },
  { short: 'M', long: 'max-grouping-size', key: 'maxGroupingSize', kind: 'int', value: 'int', help: 'maximum grouping size for unknown words (default 24)' },
  { short: 'F', long: 'node-format', key: 'nodeFormat', kind: 'string', value: 'str', help: 'use STR as the user-defined node format' },
  { short: 'U', long: 'unk-format', key: 'unkFormat', kind: 'string', value: 'str', help: 'use STR as the user-defined unknown node format' },
  { short: 'B', long: 'bos-format', key: 'bosFormat', kind: 'string', value: 'str', help: 'use STR as the user-defined beginning-of-sentence format' },
  { short: 'E', long: 'eos-format', key: 'eosFormat', kind: 'string', value: 'str', help: 'use STR as the user-defined end-of-sentence format' },
  { short: 'S', long: 'eon-format', key: 'eonFormat', kind: 'string', value: 'str', help: 'use STR as the user-defined end-of-NBest format' },
  { short: 'x', long: 'unk-feature', key: 'unkFeature', kind: 'string', value: 'str', help: 'use STR as the feature for unknown word' },
  { short: 'b', long: 'input-buffer-size', key: 'inputBufferSize', kind: 'int', value: 'int', help: 'set input buffer size (default 8192)' },
  { short: 'C', long: 'allocate-sentence', key: 'allocateSentence', kind: 'flag', help: 'allocate new memory for input sentence' },
  { short: 't', long: 'theta', key: 'theta', kind: 'float', value: 'float', help: 'set temperature parameter theta (default 0.75)' },
  { short: 'c', long: 'cost-factor', key: 'costFactor', kind: 'int', value: 'int', help: 'set cost factor (default 700)' }
];

export const WARN_LATTICE_LEVEL = 'lattice-level is DEPRECATED, please use marginal or nbest';

export function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

export function parseFloatValue(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Build a commander Option for a MeCab option. The CLI package reuses these.
 */
export function toCommanderOption(spec: OptionSpec): Option {
  if (spec.kind === 'flag') {
    return new Option(`-${spec.short}, --${spec.long}`, spec.help);
  }
  const option = new Option(`-${spec.short}, --${spec.long} <${spec.value}>`, spec.help);
  if (spec.kind === 'int') return option.argParser(parseInteger);
  if (spec.kind === 'float') return option.argParser(parseFloatValue);
  return option;
}

/**
 * Split an option string on white space, keeping quoted runs together.
 * Backslashes are left alone: MeCab expands escapes in format strings itself.
 */
export function splitOptionString(input: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let pending = false;

  for (const ch of input) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      pending = true;
    } else if (/\s/.test(ch)) {
      if (pending) {
        args.push(current);
        current = '';
        pending = false;
      }
    } else {
      current += ch;
      pending = true;
    }
  }

  if (quote) {
    throw new ConstraintError(`Unterminated ${quote} quote in MeCab options: ${input}`);
  }
  if (pending) {
    args.push(current);
  }
  return args;
}

function parseOptionString(input: string): Record<string, unknown> {
  const program = new Command()
    .name('mecab')
    .exitOverride()
    .helpOption(false)
    .allowUnknownOption(false)
    .allowExcessArguments(false)
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });

  for (const spec of OPTION_SPECS) {
    program.addOption(toCommanderOption(spec));
  }

  try {
    program.parse(splitOptionString(input), { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ConstraintError(`Invalid MeCab options "${input}": ${error.message.replace(/^error: /, '')}`, { cause: error });
    }
    throw error;
  }

  if (program.args.length > 0) {
    throw new ConstraintError(`Invalid MeCab options "${input}": unexpected argument '${program.args[0]}'`);
  }
  return program.opts();
}

const EXPECTED: Record<OptionSpec['kind'], string> = {
  string: 'a string',
  int: 'an integer',
  float: 'a number',
  flag: 'a boolean'
};

function checkValue(spec: OptionSpec, value: unknown): string | number | boolean | undefined {
  if (value === undefined || value === null) return undefined;

  switch (spec.kind) {
    case 'string':
      if (typeof value !== 'string') break;
      if (/\s/.test(value)) {
        throw new ConstraintError(`--${spec.long} cannot contain white space (use \\s in MeCab formats)`);
      }
      return value === '' ? undefined : value;
    case 'int':
      if (typeof value !== 'number' || !Number.isInteger(value)) break;
      return value;
    case 'float':
      if (typeof value !== 'number' || !Number.isFinite(value)) break;
      return value;
    case 'flag':
      if (typeof value !== 'boolean') break;
      return value ? true : undefined;
  }
  throw new ConstraintError(`--${spec.long} expects ${EXPECTED[spec.kind]}, got ${JSON.stringify(value)}`);
}

/**
 * Parse MeCab options from a MeCab-style string or an options object into a
 * validated MecabOptions. Unset, false and empty values are dropped.
 */
export function parseOptions(input?: string | MecabOptions | null): MecabOptions {
  if (input === undefined || input === null) return {};

  if (typeof input === 'string') {
    return optionsFromValues(parseOptionString(input));
  }
  if (typeof input !== 'object') {
    throw new ConstraintError(`MeCab options must be a string or an object, got ${typeof input}`);
  }

  const known = new Set<string>(OPTION_SPECS.map((spec) => spec.key));
  for (const key of Object.keys(input)) {
    if (!known.has(key)) dp(`Ignoring unsupported MeCab option "${key}"`);
  }
  return optionsFromValues({ ...input });
}

/**
 * Validate loosely typed option values keyed like MecabOptions, such as
 * commander's opts(). Keys outside OPTION_SPECS are ignored.
 */
export function optionsFromValues(values: Record<string, unknown>): MecabOptions {
  const options: MecabOptions = {};
  for (const spec of OPTION_SPECS) {
    const value = checkValue(spec, values[spec.key]);
    if (value === undefined) continue;

    if (spec.kind === 'string' && typeof value === 'string') {
      options[spec.key] = value;
    } else if ((spec.kind === 'int' || spec.kind === 'float') && typeof value === 'number') {
      options[spec.key] = value;
    } else if (spec.kind === 'flag' && value === true) {
      options[spec.key] = value;
    }
  }

  if (options.nbest !== undefined && (options.nbest < 1 || options.nbest > NBEST_MAX)) {
    throw new ConstraintError(`Invalid --nbest value ${options.nbest}: must be between 1 and ${NBEST_MAX}`);
  }

  if (options.latticeLevel !== undefined) {
    console.warn(`WARNING: ${WARN_LATTICE_LEVEL}`);
  }

  return options;
}

/**
 * Join options into the long-form flag string for mecab_model_new2, in
 * OPTION_SPECS order. Flags appear only when true.
 */
export function buildOptionsString(options: MecabOptions): string {
  const parts: string[] = [];
  for (const spec of OPTION_SPECS) {
    const value = options[spec.key];
    if (value === undefined) continue;
    if (spec.kind === 'flag') {
      if (value === true) parts.push(`--${spec.long}`);
    } else {
      parts.push(`--${spec.long}=${value}`);
    }
  }
  return parts.join(' ');
}
