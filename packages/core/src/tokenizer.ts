// mecab-lattice/tokenizer - Split text against boundary patterns or feature pairs
//
// Byte lengths are measured in the session charset: the native constraint API
// is indexed by byte offset, not by character.

import { LRUCache } from 'lru-cache';
import type { StringCodec } from './codec.js';
import { ConstraintError, errorMessage } from './errors.js';

export interface PatternToken {
  chunk: string;
  matched: boolean;
  byteLength: number;
}

export interface FeatureToken {
  chunk: string;
  /** Feature to force on this span, or null for text left to the analyzer */
  feature: string | null;
  byteLength: number;
}

export type FeaturePair = readonly [morpheme: string, feature: string];

export type BoundaryPattern = string | RegExp;

const patternCache: LRUCache<string, RegExp> = new LRUCache({ max: 256 });
let patternCacheHits = 0;
let patternCacheMisses = 0;

/**
 * Clear the compiled pattern cache and its statistics.
 */
export function clearPatternCache(): void {
  patternCache.clear();
  patternCacheHits = 0;
  patternCacheMisses = 0;
}

export function getPatternCacheStats(): { hits: number; misses: number; size: number } {
  return { hits: patternCacheHits, misses: patternCacheMisses, size: patternCache.size };
}

function escapeLiteral(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Unicode mode first; patterns only valid without it (identity escapes such
// as \-) fall back to plain mode
function compileUnicodeFirst(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, `${flags}gu`);
  } catch (unicodeError) {
    try {
      return new RegExp(source, `${flags}g`);
    } catch {
      throw new ConstraintError(`Invalid boundary pattern /${source}/: ${errorMessage(unicodeError)}`, {
        cause: unicodeError
      });
    }
  }
}

function cachedRegExp(key: string, source: string): RegExp {
  let regex = patternCache.get(key);
  if (!regex) {
    regex = compileUnicodeFirst(source, '');
    patternCache.set(key, regex);
    patternCacheMisses++;
  } else {
    patternCacheHits++;
  }
  // Fresh instance: lastIndex is per scan
  return new RegExp(regex);
}

function compilePattern(pattern: BoundaryPattern): RegExp {
  if (pattern instanceof RegExp) {
    return compileUnicodeFirst(pattern.source, pattern.flags.replace(/[guy]/g, ''));
  }
  if (typeof pattern !== 'string') {
    throw new ConstraintError(`Boundary pattern must be a string or RegExp, got ${typeof pattern}`);
  }
  return cachedRegExp(`p:${pattern}`, pattern);
}

/** True when index falls between the two halves of a surrogate pair */
function splitsPair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

function scan(text: string, regex: RegExp): Array<{ chunk: string; matched: boolean }> {
  const spans: Array<{ chunk: string; matched: boolean }> = [];
  let mark = 0;
  let match: RegExpExecArray | null;

  regex.lastIndex = 0;
  while ((match = regex.exec(text)) !== null) {
    let start = match.index;
    let end = start + match[0].length;

    if (start === end) {
      const code = text.codePointAt(start) ?? 0;
      regex.lastIndex = start + (code > 0xffff ? 2 : 1);
      continue;
    }
    // Without the u flag a match can end on half a character; widen it
    if (splitsPair(text, start)) start--;
    if (splitsPair(text, end)) end++;
    regex.lastIndex = Math.max(regex.lastIndex, end);

    if (mark < start) {
      spans.push({ chunk: text.slice(mark, start), matched: false });
    }
    spans.push({ chunk: text.slice(start, end), matched: true });
    mark = end;
  }
  if (mark < text.length) {
    spans.push({ chunk: text.slice(mark), matched: false });
  }
  return spans;
}

function requireText(text: unknown): string {
  if (typeof text !== 'string') {
    throw new ConstraintError(`Text to split must be a string, got ${typeof text}`);
  }
  return text;
}

/**
 * Split text into matched and unmatched chunks, scanning left to right for
 * non-overlapping matches of the pattern. Empty matches are skipped.
 */
export function splitByPattern(text: string, pattern: BoundaryPattern, codec: StringCodec): PatternToken[] {
  const source = requireText(text);
  const regex = compilePattern(pattern);
  if (!source) return [];

  return scan(source, regex).map(({ chunk, matched }) => ({
    chunk,
    matched,
    byteLength: codec.byteLength(chunk)
  }));
}

function validatePairs(pairs: unknown): FeaturePair[] {
  if (!Array.isArray(pairs)) {
    throw new ConstraintError('Feature constraints must be an array of [morpheme, feature] pairs');
  }
  return pairs.map((pair: unknown, index): FeaturePair => {
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new ConstraintError(`Feature constraint #${index} is not a [morpheme, feature] pair`);
    }
    const [morpheme, feature]: unknown[] = pair;
    if (typeof morpheme !== 'string' || typeof feature !== 'string') {
      throw new ConstraintError(`Feature constraint #${index} must hold two strings`);
    }
    if (!morpheme || !feature) {
      throw new ConstraintError(`Feature constraint #${index} has an empty morpheme or feature`);
    }
    return [morpheme, feature];
  });
}

/**
 * Split text by literal morphemes, each carrying the feature to force on it.
 *
 * Pairs are applied in order and only subdivide spans no earlier pair has
 * claimed, so the first pair to match a span wins.
 */
export function splitByFeatures(text: string, pairs: readonly FeaturePair[], codec: StringCodec): FeatureToken[] {
  const source = requireText(text);
  const validated = validatePairs(pairs);
  if (!source) return [];

  let spans: Array<{ chunk: string; feature: string | null }> = [{ chunk: source, feature: null }];

  for (const [morpheme, feature] of validated) {
    const regex = cachedRegExp(`l:${morpheme}`, escapeLiteral(morpheme));
    const next: Array<{ chunk: string; feature: string | null }> = [];

    for (const span of spans) {
      if (span.feature !== null) {
        next.push(span);
        continue;
      }
      for (const part of scan(span.chunk, regex)) {
        next.push({ chunk: part.chunk, feature: part.matched ? feature : null });
      }
    }
    spans = next;
  }

  return spans.map(({ chunk, feature }) => ({
    chunk,
    feature,
    byteLength: codec.byteLength(chunk)
  }));
}

export function totalByteLength(tokens: ReadonlyArray<{ byteLength: number }>): number {
  return tokens.reduce((sum, token) => sum + token.byteLength, 0);
}
