// @mecab-lattice/core - MeCab binding: codec, constraint tokenizer, lattice sessions and taggers

// Tagger and lattice sessions
export {
  Tagger,
  withTagger,
  requestTypeFor,
  type TaggerDependencies,
  type BoundaryRequest,
  type ParseRequest,
  type StringParseRequest,
  type NodeParseRequest
} from './tagger.js';
export {
  LatticeSession,
  withLattice,
  type LatticeState,
  type LatticeSessionOptions,
  type FeatureConstraint
} from './lattice.js';

// Nodes and dictionaries
export { MecabNode, toStatus, type MecabNodeJson } from './node.js';
export { DictionaryInfo, readDictionaries } from './dictionary.js';

// Native layer
export {
  NodeStatus,
  BoundaryConstraint,
  RequestType,
  DictionaryType,
  type NativePointer,
  type RawNode,
  type RawDictionaryInfo,
  type MecabNative
} from './native.js';
export { loadMecab } from './binding.js';
export {
  resolveEnvironment,
  resolveCharset,
  resolveLibraryPath,
  parseDictionaryCharset,
  libraryFileName,
  defaultCharset,
  defaultRunner,
  MECAB_PATH,
  MECAB_CHARSET,
  type MecabEnvironment,
  type EnvironmentOptions,
  type CharsetSource,
  type CommandRunner
} from './environment.js';

// Strings and constraints
export { StringCodec, encode, decode } from './codec.js';
export {
  splitByPattern,
  splitByFeatures,
  totalByteLength,
  clearPatternCache,
  getPatternCacheStats,
  type PatternToken,
  type FeatureToken,
  type FeaturePair,
  type BoundaryPattern
} from './tokenizer.js';

// Options
export {
  parseOptions,
  optionsFromValues,
  buildOptionsString,
  splitOptionString,
  toCommanderOption,
  parseInteger,
  parseFloatValue,
  WARN_LATTICE_LEVEL,
  OPTION_SPECS,
  NBEST_MAX,
  type MecabOptions,
  type OptionSpec
} from './options.js';

// Errors and debug output
export {
  MecabError,
  EncodingError,
  ConstructionError,
  ParseError,
  ConstraintError,
  errorMessage,
  type MecabErrorOptions
} from './errors.js';
export { setDebug, dp, DEBUG, envFlag } from './debug.js';
