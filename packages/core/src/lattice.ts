// mecab-lattice/lattice - Constrained lattice parsing session
//
// A LatticeSession owns one mecab_lattice_t. It moves through
//   created -> sentence-set -> (constrained) -> parsed -> closed
// and every constraint offset it sends to MeCab is a byte offset into the
// encoded sentence.

import type { StringCodec } from './codec.js';
import { ConstraintError, ConstructionError, MecabError, ParseError } from './errors.js';
import { dp } from './debug.js';
import { BoundaryConstraint, NodeStatus, RequestType, type MecabNative, type NativePointer, type RawNode } from './native.js';
import { MecabNode } from './node.js';
import { NBEST_MAX } from './options.js';
import {
  splitByFeatures,
  splitByPattern,
  totalByteLength,
  type BoundaryPattern,
  type FeaturePair,
  type FeatureToken,
  type PatternToken
} from './tokenizer.js';

export type LatticeState = 'created' | 'sentence-set' | 'constrained' | 'parsed' | 'closed';

export interface FeatureConstraint {
  begin: number;
  end: number;
  feature: string;
}

export interface LatticeSessionOptions {
  /** Request type bits; ONE_BEST when omitted */
  requestType?: number;
  nbest?: number;
  theta?: number;
  /** Format node features with mecab_format_node instead of the raw feature */
  formatFeatures?: boolean;
  /** Called once, after the native lattice is destroyed */
  onClose?: (session: LatticeSession) => void;
}

function validateNbest(nbest: number): number {
  if (!Number.isInteger(nbest) || nbest < 1 || nbest > NBEST_MAX) {
    throw new ConstraintError(`nbest must be an integer between 1 and ${NBEST_MAX}, got ${nbest}`);
  }
  return nbest;
}

function validateTheta(theta: number): number {
  if (!Number.isFinite(theta) || theta <= 0) {
    throw new ConstraintError(`theta must be a positive number, got ${theta}`);
  }
  return theta;
}

function validateRequestType(requestType: number): number {
  if (!Number.isInteger(requestType) || requestType < 0) {
    throw new ConstraintError(`Request type must be a non-negative integer, got ${requestType}`);
  }
  return requestType;
}

function isBoundaryConstraint(value: unknown): value is BoundaryConstraint {
  return (
    value === BoundaryConstraint.AnyBoundary ||
    value === BoundaryConstraint.TokenBoundary ||
    value === BoundaryConstraint.InsideToken
  );
}

/**
 * One native lattice. Not safe to share between workers; a session belongs
 * to the code that created it until close().
 */
export class LatticeSession {
  private handle: NativePointer | null;
  private currentState: LatticeState = 'created';
  private text: string | null = null;
  private sentence: Buffer | null = null;
  private currentRequestType = 0;
  private currentNbest = 1;
  private generation = 0;
  private lastBoundaryOffset = -1;
  private readonly boundaries = new Map<number, BoundaryConstraint>();
  private readonly features: FeatureConstraint[] = [];
  private readonly formatFeatures: boolean;
  private readonly onClose: ((session: LatticeSession) => void) | undefined;

  constructor(
    private readonly native: MecabNative,
    model: NativePointer,
    private readonly tagger: NativePointer,
    readonly codec: StringCodec,
    options: LatticeSessionOptions = {}
  ) {
    const requestType = validateRequestType(options.requestType ?? RequestType.ONE_BEST);
    const nbest = validateNbest(options.nbest ?? 1);
    const theta = options.theta === undefined ? undefined : validateTheta(options.theta);

    const handle = native.modelNewLattice(model);
    if (!handle) {
      throw new ConstructionError('Could not create MeCab lattice');
    }
    this.handle = handle;
    this.formatFeatures = options.formatFeatures ?? false;
    this.onClose = options.onClose;

    this.currentNbest = nbest;
    this.setRequestType(requestType);
    if (theta !== undefined) {
      native.latticeSetTheta(handle, theta);
    }
  }

  get state(): LatticeState {
    return this.currentState;
  }

  get closed(): boolean {
    return this.handle === null;
  }

  get requestType(): number {
    return this.currentRequestType;
  }

  get nbest(): number {
    return this.currentNbest;
  }

  /** Encoded length of the current sentence, in bytes */
  get byteLength(): number {
    return this.sentence?.length ?? 0;
  }

  get boundaryConstraints(): ReadonlyMap<number, BoundaryConstraint> {
    return this.boundaries;
  }

  get featureConstraints(): readonly FeatureConstraint[] {
    return this.features;
  }

  /**
   * Replace the request type. ALLOCATE_SENTENCE is always kept so MeCab owns a
   * copy of the sentence, and NBEST is kept while nbest > 1.
   */
  setRequestType(requestType: number): this {
    const handle = this.requireHandle();
    let flags = validateRequestType(requestType) | RequestType.ALLOCATE_SENTENCE;
    if (this.currentNbest > 1) {
      flags |= RequestType.NBEST;
    }
    this.native.latticeSetRequestType(handle, flags);
    this.currentRequestType = this.native.latticeGetRequestType(handle);
    return this;
  }

  addRequestType(requestType: number): this {
    return this.setRequestType(this.currentRequestType | validateRequestType(requestType));
  }

  hasRequestType(requestType: number): boolean {
    return (this.currentRequestType & requestType) === requestType;
  }

  setNbest(nbest: number): this {
    this.requireHandle();
    this.currentNbest = validateNbest(nbest);
    return this.setRequestType(this.currentRequestType);
  }

  setTheta(theta: number): this {
    this.native.latticeSetTheta(this.requireHandle(), validateTheta(theta));
    return this;
  }

  /**
   * Encode and set the sentence to parse. Clears any constraints set for a
   * previous sentence.
   */
  setSentence(text: string): this {
    const handle = this.requireHandle();
    if (typeof text !== 'string') {
      throw new ConstraintError(`Sentence must be a string, got ${typeof text}`);
    }
    if (text.length === 0) {
      throw new ConstraintError('Sentence to parse cannot be empty');
    }

    const bytes = this.codec.encode(text);
    this.native.latticeSetSentence(handle, bytes);
    this.resetConstraints();
    this.generation++;

    const stored = this.native.latticeGetSize(handle);
    if (stored !== bytes.length) {
      this.text = null;
      this.sentence = null;
      this.currentState = 'created';
      throw new ParseError(`MeCab kept ${stored} of ${bytes.length} sentence bytes`, this.nativeError(handle));
    }

    this.text = text;
    this.sentence = bytes;
    this.currentState = 'sentence-set';
    dp(`Lattice sentence set: ${text.length} chars, ${bytes.length} bytes`);
    return this;
  }

  /**
   * Set a single boundary constraint. Offsets are bytes into the encoded
   * sentence and must not decrease from one call to the next.
   */
  setBoundaryConstraint(offset: number, constraint: BoundaryConstraint): this {
    const handle = this.requireHandle();
    const sentence = this.requireSentence();

    if (!Number.isInteger(offset) || offset < 0 || offset > sentence.length) {
      throw new ConstraintError(`Boundary offset ${offset} is outside the ${sentence.length}-byte sentence`);
    }
    if (offset < this.lastBoundaryOffset) {
      throw new ConstraintError(`Boundary offset ${offset} comes before previous offset ${this.lastBoundaryOffset}`);
    }
    if (!isBoundaryConstraint(constraint)) {
      throw new ConstraintError(`Unknown boundary constraint ${String(constraint)}`);
    }

    this.native.latticeSetBoundaryConstraint(handle, offset, constraint);
    this.boundaries.set(offset, constraint);
    this.lastBoundaryOffset = offset;
    this.currentState = 'constrained';
    return this;
  }

  /**
   * Constrain token boundaries with a pattern: each match becomes exactly one
   * token, and text between matches may split anywhere (anyBoundary) or not
   * at all.
   */
  applyBoundaryConstraints(pattern: BoundaryPattern, anyBoundary = true): PatternToken[] {
    this.requireHandle();
    const sentence = this.requireSentence();
    this.requireUnconstrained();

    const tokens = splitByPattern(this.text ?? '', pattern, this.codec);
    this.checkCoverage(tokens, sentence);

    const gapConstraint = anyBoundary ? BoundaryConstraint.AnyBoundary : BoundaryConstraint.InsideToken;
    let cursor = 0;
    this.setBoundaryConstraint(cursor, BoundaryConstraint.TokenBoundary);

    for (const token of tokens) {
      const interior = token.matched ? BoundaryConstraint.InsideToken : gapConstraint;
      for (let offset = cursor + 1; offset < cursor + token.byteLength; offset++) {
        this.setBoundaryConstraint(offset, interior);
      }
      cursor += token.byteLength;
      this.setBoundaryConstraint(cursor, BoundaryConstraint.TokenBoundary);
    }

    dp(`Applied ${this.boundaries.size} boundary constraints over ${tokens.length} tokens`);
    return tokens;
  }

  /**
   * Force features onto spans: every occurrence of a pair's morpheme becomes
   * one token carrying that feature. Earlier pairs take precedence.
   */
  applyFeatureConstraints(pairs: readonly FeaturePair[]): FeatureToken[] {
    const handle = this.requireHandle();
    const sentence = this.requireSentence();
    this.requireUnconstrained();

    const tokens = splitByFeatures(this.text ?? '', pairs, this.codec);
    this.checkCoverage(tokens, sentence);

    // Encode everything first so a bad feature leaves the lattice untouched
    const pending: Array<FeatureConstraint & { bytes: Buffer }> = [];
    let cursor = 0;
    for (const token of tokens) {
      const begin = cursor;
      cursor += token.byteLength;
      if (token.feature !== null) {
        pending.push({ begin, end: cursor, feature: token.feature, bytes: this.codec.encode(token.feature) });
      }
    }

    for (const { begin, end, feature, bytes } of pending) {
      this.native.latticeSetFeatureConstraint(handle, begin, end, bytes);
      this.features.push({ begin, end, feature });
    }
    if (pending.length > 0) {
      this.currentState = 'constrained';
    }

    dp(`Applied ${pending.length} feature constraints over ${tokens.length} tokens`);
    return tokens;
  }

  /**
   * Run the analyzer over the sentence and its constraints.
   */
  parse(): this {
    const handle = this.requireHandle();
    this.requireSentence();

    // Nodes from an earlier parse point into buffers MeCab is about to reuse
    this.generation++;
    this.currentState = this.boundaries.size > 0 || this.features.length > 0 ? 'constrained' : 'sentence-set';
    if (!this.native.parseLattice(this.tagger, handle)) {
      throw new ParseError('MeCab could not parse the sentence', this.nativeError(handle));
    }
    this.currentState = 'parsed';
    return this;
  }

  /**
   * MeCab's formatted output for the parsed sentence; with nbest > 1, the
   * n best paths one after another.
   */
  getString(nbest?: number): string {
    const handle = this.requireParsed();
    const n = nbest === undefined ? this.currentNbest : validateNbest(nbest);

    let bytes: Uint8Array | null;
    if (n > 1) {
      if (!this.hasRequestType(RequestType.NBEST)) {
        throw new ConstraintError('n-best output needs setNbest() before parse()');
      }
      bytes = this.native.latticeNbestToString(handle, n);
    } else {
      bytes = this.native.latticeToString(handle);
    }

    if (bytes === null) {
      throw new ParseError('MeCab could not format the lattice', this.nativeError(handle));
    }
    return this.codec.decode(bytes);
  }

  /**
   * Walk the parsed nodes, BOS nodes left out and EOS nodes kept. With
   * nbest > 1 the walk covers up to nbest paths. The iterator is single-pass
   * and fails if the lattice is re-parsed, cleared or closed under it.
   */
  nodes(): IterableIterator<MecabNode> {
    const handle = this.requireParsed();
    return this.walk(handle, this.generation);
  }

  /**
   * Drop the sentence, constraints and parse result.
   */
  clear(): this {
    this.native.latticeClear(this.requireHandle());
    this.text = null;
    this.sentence = null;
    this.resetConstraints();
    this.generation++;
    this.currentState = 'created';
    return this;
  }

  /**
   * Destroy the native lattice. Safe to call more than once.
   */
  close(): void {
    const handle = this.handle;
    if (handle === null) return;

    this.handle = null;
    this.text = null;
    this.sentence = null;
    this.generation++;
    this.currentState = 'closed';
    try {
      this.native.latticeDestroy(handle);
    } finally {
      this.onClose?.(this);
    }
  }

  private *walk(handle: NativePointer, generation: number): Generator<MecabNode, void, undefined> {
    const paths = this.hasRequestType(RequestType.NBEST) ? this.currentNbest : 1;

    for (let path = 0; path < paths; path++) {
      this.checkGeneration(generation);
      if (path > 0 && !this.native.latticeNext(handle)) {
        return;
      }

      let ptr = this.native.latticeBosNode(handle);
      if (ptr === null) {
        throw new ParseError('MeCab lattice has no BOS node', this.nativeError(handle));
      }

      let cursor = 0;
      while (ptr !== null) {
        this.checkGeneration(generation);
        const raw = this.native.readNode(ptr);

        if (raw.stat !== NodeStatus.BeginningOfSentence) {
          const begin = cursor + Math.max(0, raw.rlength - raw.length);
          cursor = begin + raw.length;
          yield MecabNode.fromRaw(raw, this.codec.decode(raw.surface), this.readFeature(ptr, raw), begin, path);
        }
        ptr = raw.next;
      }
    }
  }

  private readFeature(ptr: NativePointer, raw: RawNode): string {
    if (this.formatFeatures) {
      const formatted = this.native.formatNode(this.tagger, ptr);
      if (formatted !== null) {
        return this.codec.decode(formatted).replace(/\r?\n$/, '');
      }
    }
    return this.codec.decode(raw.feature);
  }

  private checkGeneration(generation: number): void {
    if (this.handle === null) {
      throw new ParseError('Lattice was closed while its nodes were being read');
    }
    if (generation !== this.generation) {
      throw new ParseError('Lattice was re-parsed or cleared while its nodes were being read');
    }
  }

  private checkCoverage(tokens: ReadonlyArray<{ byteLength: number }>, sentence: Buffer): void {
    const covered = totalByteLength(tokens);
    if (covered !== sentence.length) {
      throw new MecabError(`Constraint tokens cover ${covered} bytes of a ${sentence.length}-byte sentence`);
    }
  }

  private nativeError(handle: NativePointer): string | null {
    const latticeMessage = this.codec.decodeLenient(this.native.latticeStrerror(handle)).trim();
    if (latticeMessage) return latticeMessage;
    const taggerMessage = this.codec.decodeLenient(this.native.strerror(this.tagger)).trim();
    return taggerMessage || null;
  }

  private resetConstraints(): void {
    this.boundaries.clear();
    this.features.length = 0;
    this.lastBoundaryOffset = -1;
  }

  private requireHandle(): NativePointer {
    if (this.handle === null) {
      throw new ConstructionError('Lattice has been closed');
    }
    return this.handle;
  }

  private requireSentence(): Buffer {
    if (this.sentence === null) {
      throw new ConstraintError('Set a sentence before constraining or parsing the lattice');
    }
    return this.sentence;
  }

  private requireUnconstrained(): void {
    if (this.boundaries.size > 0 || this.features.length > 0) {
      throw new ConstraintError('Lattice is already constrained; set the sentence again to start over');
    }
  }

  private requireParsed(): NativePointer {
    const handle = this.requireHandle();
    if (this.currentState !== 'parsed') {
      throw new ConstraintError(`Lattice has not been parsed (state: ${this.currentState})`);
    }
    return handle;
  }
}

/**
 * Run fn with a fresh lattice, destroying it on every exit path.
 */
export function withLattice<T>(source: { newLattice(): LatticeSession }, fn: (lattice: LatticeSession) => T): T {
  const lattice = source.newLattice();
  try {
    return fn(lattice);
  } finally {
    lattice.close();
  }
}
