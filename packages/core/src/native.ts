// mecab-lattice/native - The libmecab C API surface consumed by the binding
//
// Strings cross this interface as bytes only; callers decode them through a
// StringCodec. Handles are opaque objects, null standing for a NULL pointer.

export type NativePointer = object;

/** Node status, `stat` in mecab_node_t */
export enum NodeStatus {
  Normal = 0,
  Unknown = 1,
  BeginningOfSentence = 2,
  EndOfSentence = 3,
  EndOfNbest = 4
}

/** Boundary constraint kinds for mecab_lattice_set_boundary_constraint */
export enum BoundaryConstraint {
  AnyBoundary = 0,
  TokenBoundary = 1,
  InsideToken = 2
}

/** Request type bits for mecab_lattice_set_request_type */
export const RequestType = {
  ONE_BEST: 1,
  NBEST: 2,
  PARTIAL: 4,
  MARGINAL_PROB: 8,
  ALTERNATIVE: 16,
  ALL_MORPHS: 32,
  ALLOCATE_SENTENCE: 64
} as const;

/** Dictionary type, `type` in mecab_dictionary_info_t */
export enum DictionaryType {
  System = 0,
  User = 1,
  Unknown = 2
}

/**
 * Fields copied out of a mecab_node_t. `surface` is already cut to `length`
 * bytes; the native surface pointer runs on to the end of the sentence.
 */
export interface RawNode {
  next: NativePointer | null;
  surface: Uint8Array;
  feature: Uint8Array;
  id: number;
  length: number;
  rlength: number;
  rcAttr: number;
  lcAttr: number;
  posid: number;
  charType: number;
  stat: number;
  isbest: number;
  alpha: number;
  beta: number;
  prob: number;
  wcost: number;
  cost: number;
}

/** Fields copied out of a mecab_dictionary_info_t */
export interface RawDictionaryInfo {
  filename: Uint8Array;
  charset: Uint8Array;
  size: number;
  type: number;
  lsize: number;
  rsize: number;
  version: number;
  next: NativePointer | null;
}

export interface MecabNative {
  /** Path the library was loaded from */
  readonly libraryPath: string;

  version(): Uint8Array;
  strerror(tagger: NativePointer | null): Uint8Array;

  modelNew(flags: Uint8Array): NativePointer | null;
  modelDestroy(model: NativePointer): void;
  modelNewTagger(model: NativePointer): NativePointer | null;
  modelNewLattice(model: NativePointer): NativePointer | null;
  modelDictionaryInfo(model: NativePointer): NativePointer | null;
  readDictionaryInfo(info: NativePointer): RawDictionaryInfo;

  taggerDestroy(tagger: NativePointer): void;
  parseLattice(tagger: NativePointer, lattice: NativePointer): boolean;
  formatNode(tagger: NativePointer, node: NativePointer): Uint8Array | null;

  latticeDestroy(lattice: NativePointer): void;
  latticeClear(lattice: NativePointer): void;
  latticeSetSentence(lattice: NativePointer, sentence: Uint8Array): void;
  latticeGetSize(lattice: NativePointer): number;
  latticeSetRequestType(lattice: NativePointer, requestType: number): void;
  latticeGetRequestType(lattice: NativePointer): number;
  latticeSetTheta(lattice: NativePointer, theta: number): void;
  latticeSetBoundaryConstraint(lattice: NativePointer, position: number, constraint: BoundaryConstraint): void;
  latticeSetFeatureConstraint(lattice: NativePointer, begin: number, end: number, feature: Uint8Array): void;
  latticeToString(lattice: NativePointer): Uint8Array | null;
  latticeNbestToString(lattice: NativePointer, n: number): Uint8Array | null;
  latticeNext(lattice: NativePointer): boolean;
  latticeBosNode(lattice: NativePointer): NativePointer | null;
  latticeStrerror(lattice: NativePointer): Uint8Array;
  readNode(node: NativePointer): RawNode;
}
