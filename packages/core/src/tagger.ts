// mecab-lattice/tagger - Model and tagger handles, and the one-call parse API

import { loadMecab } from './binding.js';
import { StringCodec } from './codec.js';
import { dp } from './debug.js';
import { DictionaryInfo, readDictionaries } from './dictionary.js';
import { resolveEnvironment, type EnvironmentOptions, type MecabEnvironment } from './environment.js';
import { ConstraintError, ConstructionError, EncodingError } from './errors.js';
import { LatticeSession, withLattice } from './lattice.js';
import { RequestType, type MecabNative, type NativePointer } from './native.js';
import type { MecabNode } from './node.js';
import { buildOptionsString, parseOptions, type MecabOptions } from './options.js';
import type { BoundaryPattern, FeaturePair } from './tokenizer.js';

export interface TaggerDependencies {
  /** Already-resolved library path and charset; skips discovery */
  environment?: MecabEnvironment;
  /** Settings for discovery when `environment` is not given */
  discovery?: EnvironmentOptions;
  load?: (libraryPath: string) => MecabNative;
}

export interface BoundaryRequest {
  pattern: BoundaryPattern;
  /** Let text between matches split anywhere (default true) */
  anyBoundary?: boolean;
}

export interface ParseRequest {
  boundaryConstraints?: BoundaryRequest;
  featureConstraints?: readonly FeaturePair[];
  asNodes?: boolean;
}

export type StringParseRequest = ParseRequest & { asNodes?: false };
export type NodeParseRequest = ParseRequest & { asNodes: true };

function toCodec(charset: string): StringCodec {
  try {
    return new StringCodec(charset);
  } catch (error) {
    if (error instanceof EncodingError) {
      throw new ConstructionError(`MeCab charset ${charset} is not supported`, { cause: error });
    }
    throw error;
  }
}

function sameCharset(a: string, b: string): boolean {
  const normalize = (name: string) => name.toLowerCase().replace(/[^a-z0-9]/g, '');
  return normalize(a) === normalize(b);
}

/**
 * Request type bits implied by the tagger options; lattice-level maps the
 * way MeCab itself maps it.
 */
export function requestTypeFor(options: MecabOptions): number {
  let requestType: number = RequestType.ONE_BEST;
  if (options.allMorphs) requestType |= RequestType.ALL_MORPHS;
  if (options.partial) requestType |= RequestType.PARTIAL;
  if (options.marginal) requestType |= RequestType.MARGINAL_PROB;
  if (options.nbest !== undefined && options.nbest > 1) requestType |= RequestType.NBEST;
  if (options.latticeLevel === 1) requestType |= RequestType.NBEST;
  if (options.latticeLevel !== undefined && options.latticeLevel >= 2) requestType |= RequestType.MARGINAL_PROB;
  return requestType;
}

/**
 * A MeCab model plus tagger. Lattices made by newLattice() belong to the
 * tagger and are closed with it.
 */
export class Tagger {
  private isClosed = false;
  private readonly lattices = new Set<LatticeSession>();

  private constructor(
    private readonly native: MecabNative,
    private readonly model: NativePointer,
    private readonly handle: NativePointer,
    readonly codec: StringCodec,
    readonly options: Readonly<MecabOptions>,
    readonly optionsString: string,
    readonly version: string,
    readonly dictionaries: readonly DictionaryInfo[]
  ) {}

  /**
   * Load libmecab and create a model and tagger for the given options.
   */
  static open(options?: string | MecabOptions | null, deps: TaggerDependencies = {}): Tagger {
    const parsed = parseOptions(options);
    const optionsString = buildOptionsString(parsed);

    const environment = deps.environment ?? resolveEnvironment(deps.discovery);
    let codec = toCodec(environment.charset);
    const native = (deps.load ?? loadMecab)(environment.libraryPath);

    const model = native.modelNew(codec.encode(optionsString));
    if (!model) {
      const reason = codec.decodeLenient(native.strerror(null)).trim();
      throw new ConstructionError(
        `Could not initialize MeCab with options "${optionsString}"${reason ? `: ${reason}` : ''}`
      );
    }

    const tagger = native.modelNewTagger(model);
    if (!tagger) {
      native.modelDestroy(model);
      throw new ConstructionError(`Could not create MeCab tagger with options "${optionsString}"`);
    }

    try {
      const dictionaries = readDictionaries(native, model, codec);
      const systemCharset = dictionaries[0]?.charset;
      if (environment.charsetSource !== 'env' && systemCharset && !sameCharset(systemCharset, codec.charset)) {
        dp(`Dictionary charset ${systemCharset} overrides ${codec.charset}`);
        codec = toCodec(systemCharset);
      }
      const version = codec.decode(native.version());
      dp(`MeCab ${version} ready, charset ${codec.charset}, options "${optionsString}"`);
      return new Tagger(native, model, tagger, codec, Object.freeze({ ...parsed }), optionsString, version, dictionaries);
    } catch (error) {
      native.taggerDestroy(tagger);
      native.modelDestroy(model);
      throw error;
    }
  }

  get charset(): string {
    return this.codec.charset;
  }

  get libraryPath(): string {
    return this.native.libraryPath;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of lattices created by this tagger and not yet closed */
  get openLattices(): number {
    return this.lattices.size;
  }

  /**
   * A fresh lattice configured from the tagger options.
   */
  newLattice(): LatticeSession {
    this.requireOpen();
    const lattice = new LatticeSession(this.native, this.model, this.handle, this.codec, {
      requestType: requestTypeFor(this.options),
      nbest: this.options.nbest,
      theta: this.options.theta,
      formatFeatures: this.options.outputFormatType !== undefined || this.options.nodeFormat !== undefined,
      onClose: (session) => this.lattices.delete(session)
    });
    this.lattices.add(lattice);
    return lattice;
  }

  /**
   * Parse text into MeCab's formatted output, or into nodes when
   * `asNodes` is set. Node output is lazy: the lattice is created on the
   * first pull and destroyed when iteration ends.
   */
  parse(text: string, request?: StringParseRequest): string;
  parse(text: string, request: NodeParseRequest): IterableIterator<MecabNode>;
  parse(text: string, request: ParseRequest = {}): string | IterableIterator<MecabNode> {
    this.requireOpen();
    if (typeof text !== 'string') {
      throw new ConstraintError(`Text to parse must be a string, got ${typeof text}`);
    }
    if (text.length === 0) {
      throw new ConstraintError('Text to parse cannot be empty');
    }
    if (request.boundaryConstraints && request.featureConstraints) {
      throw new ConstraintError('Boundary and feature constraints cannot be used together');
    }

    if (request.asNodes) {
      return this.parseToNodes(text, request);
    }
    return withLattice(this, (lattice) => {
      this.prepare(lattice, text, request);
      lattice.parse();
      return lattice.getString().trimEnd();
    });
  }

  /**
   * Destroy the tagger and model, closing any lattice still open. Safe to
   * call more than once.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const lattice of [...this.lattices]) {
      lattice.close();
    }
    try {
      this.native.taggerDestroy(this.handle);
    } finally {
      this.native.modelDestroy(this.model);
    }
    dp('MeCab tagger closed');
  }

  private *parseToNodes(text: string, request: ParseRequest): Generator<MecabNode, void, undefined> {
    const lattice = this.newLattice();
    try {
      this.prepare(lattice, text, request);
      lattice.parse();
      yield* lattice.nodes();
    } finally {
      lattice.close();
    }
  }

  private prepare(lattice: LatticeSession, text: string, request: ParseRequest): void {
    lattice.setSentence(text);
    if (request.boundaryConstraints) {
      const { pattern, anyBoundary = true } = request.boundaryConstraints;
      lattice.applyBoundaryConstraints(pattern, anyBoundary);
    } else if (request.featureConstraints) {
      lattice.applyFeatureConstraints(request.featureConstraints);
    }
  }

  private requireOpen(): void {
    if (this.isClosed) {
      throw new ConstructionError('Tagger has been closed');
    }
  }
}

/**
 * Open a tagger, run fn, and close the tagger however fn finishes.
 */
export async function withTagger<T>(
  options: string | MecabOptions | null | undefined,
  fn: (tagger: Tagger) => T | Promise<T>,
  deps: TaggerDependencies = {}
): Promise<T> {
  const tagger = Tagger.open(options, deps);
  try {
    return await fn(tagger);
  } finally {
    tagger.close();
  }
}
