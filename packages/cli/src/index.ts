#!/usr/bin/env node

/**
 * Command line interface for mecab-lattice
 *
 * Takes every MeCab option, plus boundary and feature constraints applied
 * to each input line before it is parsed.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { config } from 'dotenv';
import {
  ConstraintError,
  ConstructionError,
  EncodingError,
  OPTION_SPECS,
  ParseError,
  Tagger,
  envFlag,
  errorMessage,
  optionsFromValues,
  setDebug,
  toCommanderOption,
  type FeaturePair,
  type MecabOptions,
  type ParseRequest
} from '@mecab-lattice/core';

// Parse environment variables
config();

export interface CliOptions {
  /** MeCab options for the tagger */
  mecab?: MecabOptions;
  /** Pattern whose matches become single tokens */
  boundary?: string;
  /** Keep text between boundary matches in one token */
  insideDefault?: boolean;
  /** morpheme=feature pairs, earlier ones first */
  features?: string[];
  /** Print node descriptors as JSON lines */
  json?: boolean;
}

export interface CliDependencies {
  /** Tagger to use; left open */
  tagger?: Tagger;
  /** Opens the tagger when none is given; it is closed afterwards */
  open?: (options: MecabOptions) => Tagger;
}

type CliFlags = {
  boundary?: string;
  insideDefault?: boolean;
  feature: string[];
  json?: boolean;
};

/**
 * Split "morpheme=feature" at the first "=".
 */
export function parseFeature(value: string): FeaturePair {
  const index = value.indexOf('=');
  if (index <= 0 || index === value.length - 1) {
    throw new ConstraintError(`--feature expects morpheme=feature, got "${value}"`);
  }
  return [value.slice(0, index), value.slice(index + 1)];
}

/**
 * Exit status for an error: 1 for bad input, 2 for parse failures,
 * 3 when MeCab could not be set up.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConstraintError || error instanceof EncodingError) return 1;
  if (error instanceof ConstructionError) return 3;
  return 2;
}

function toRequest(options: CliOptions): ParseRequest {
  const request: ParseRequest = {};
  if (options.boundary !== undefined) {
    request.boundaryConstraints = { pattern: options.boundary, anyBoundary: !options.insideDefault };
  }
  if (options.features && options.features.length > 0) {
    request.featureConstraints = options.features.map(parseFeature);
  }
  return request;
}

function parseLine(tagger: Tagger, line: string, request: ParseRequest, json: boolean): string {
  if (!json) {
    return tagger.parse(line, { ...request, asNodes: false });
  }
  const lines: string[] = [];
  for (const node of tagger.parse(line, { ...request, asNodes: true })) {
    lines.push(JSON.stringify(node));
  }
  return lines.join('\n');
}

function openTagger(options: MecabOptions): Tagger {
  return Tagger.open(options);
}

/**
 * Programmatic interface for CLI operations
 * Parses each non-empty line of input and returns what would be printed to stdout
 */
export async function runCli(input: string, options: CliOptions = {}, deps: CliDependencies = {}): Promise<string> {
  const request = toRequest(options);
  const lines = input.split(/\r?\n/).filter((line) => line.length > 0);

  const tagger = deps.tagger ?? (deps.open ?? openTagger)(options.mecab ?? {});
  try {
    const outputs = lines.map((line) => parseLine(tagger, line, request, options.json ?? false));
    return outputs.join('\n').trim();
  } finally {
    if (!deps.tagger) tagger.close();
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('mecab-lattice')
    .description('Parse Japanese text with MeCab, optionally under boundary or feature constraints')
    .usage('[options] [text...]')
    .version('0.1.0', '-v, --version')
    .argument('[text...]', 'text to parse; read from stdin when omitted');

  for (const spec of OPTION_SPECS) {
    program.addOption(toCommanderOption(spec));
  }

  program
    .option('--boundary <regex>', 'parse each match of REGEX as exactly one token')
    .option('--inside-default', 'keep text between boundary matches in one token')
    .option('--feature <morpheme=feature>', 'force FEATURE onto every MORPHEME (repeatable)', collect, [])
    .option('--json', 'print nodes as JSON lines')
    .helpOption('-h, --help', 'print this help text');

  return program;
}

async function main(): Promise<void> {
  const program = buildProgram();
  program.parse(process.argv);
  const flags = program.opts<CliFlags>();

  if (envFlag(process.env.MECAB_LATTICE_DEBUG)) {
    setDebug(true);
  }

  try {
    const input = program.args.length > 0 ? program.args.join(' ') : readFileSync(0, 'utf-8');
    const output = await runCli(input, {
      mecab: optionsFromValues(program.opts()),
      boundary: flags.boundary,
      insideDefault: flags.insideDefault,
      features: flags.feature,
      json: flags.json
    });
    if (output) {
      process.stdout.write(output);
      process.stdout.write('\n');
    }
  } catch (error) {
    console.error(`ERROR: ${errorMessage(error)}`);
    if (!(error instanceof ConstraintError || error instanceof ParseError) && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exitCode = exitCodeFor(error);
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${errorMessage(error)}`);
    process.exit(2);
  });
}
