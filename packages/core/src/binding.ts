// mecab-lattice/binding - libmecab loaded through koffi

import koffi from 'koffi';
import { ConstructionError, MecabError, errorMessage } from './errors.js';
import { dp } from './debug.js';
import type { BoundaryConstraint, MecabNative, NativePointer, RawDictionaryInfo, RawNode } from './native.js';

type Struct = Record<string, unknown>;

type KoffiType = ReturnType<typeof koffi.opaque>;
type KoffiLib = ReturnType<typeof koffi.load>;

interface BindingTypes {
  node: KoffiType;
  dictionaryInfo: KoffiType;
}

let bindingTypes: BindingTypes | null = null;

// koffi registers struct names globally, so they are declared once per process
function getBindingTypes(): BindingTypes {
  if (!bindingTypes) {
    bindingTypes = {
      dictionaryInfo: koffi.struct('mecab_dictionary_info_t', {
        filename: 'void *',
        charset: 'void *',
        size: 'uint',
        type: 'int',
        lsize: 'uint',
        rsize: 'uint',
        version: 'ushort',
        next: 'void *'
      }),
      node: koffi.struct('mecab_node_t', {
        prev: 'void *',
        next: 'void *',
        enext: 'void *',
        bnext: 'void *',
        rpath: 'void *',
        lpath: 'void *',
        surface: 'void *',
        feature: 'void *',
        id: 'uint',
        length: 'ushort',
        rlength: 'ushort',
        rcAttr: 'ushort',
        lcAttr: 'ushort',
        posid: 'ushort',
        char_type: 'uchar',
        stat: 'uchar',
        isbest: 'uchar',
        alpha: 'float',
        beta: 'float',
        prob: 'float',
        wcost: 'short',
        cost: 'long'
      })
    };
  }
  return bindingTypes;
}

function numberField(struct: Struct, name: string, type: string): number {
  const value = struct[name];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new MecabError(`Unexpected ${typeof value} in ${type}.${name}`);
}

function pointerField(struct: Struct, name: string, type: string): NativePointer | null {
  const value = struct[name];
  if (value === null || value === undefined) return null;
  if (typeof value === 'object') return value;
  throw new MecabError(`Unexpected ${typeof value} in ${type}.${name}`);
}

function asPointer(value: unknown): NativePointer | null {
  return value !== null && typeof value === 'object' ? value : null;
}

export type StringLength = (ptr: NativePointer) => number;

/**
 * Copy a NUL-terminated C string out of native memory, as bytes. Without a
 * usable strlen the terminator is found one byte at a time.
 */
export function readCString(ptr: NativePointer | null, strlen: StringLength | null): Uint8Array {
  if (!ptr) return new Uint8Array(0);
  if (strlen) return readBytes(ptr, strlen(ptr));

  let length = 0;
  for (;;) {
    const byte: unknown = koffi.decode(ptr, length, 'uint8_t');
    if (typeof byte !== 'number' || byte === 0) break;
    length++;
  }
  return readBytes(ptr, length);
}

function readBytes(ptr: NativePointer | null, length: number): Uint8Array {
  if (!ptr || length <= 0) return new Uint8Array(0);
  const decoded: unknown = koffi.decode(ptr, 'uint8_t', length);
  if (decoded instanceof Uint8Array) return Uint8Array.from(decoded);
  if (Array.isArray(decoded)) return Uint8Array.from(decoded.map(Number));
  throw new MecabError(`Could not read ${length} bytes from native memory`);
}

// libc's strlen, reached through libmecab's own dependencies
function bindStrlen(lib: KoffiLib): StringLength | null {
  try {
    const strlen = lib.func('size_t strlen(const void *s)');
    return (ptr) => Number(strlen(ptr));
  } catch (error) {
    dp(`strlen is not reachable through libmecab, scanning strings bytewise: ${errorMessage(error)}`);
    return null;
  }
}

function cString(bytes: Uint8Array): Buffer {
  return Buffer.concat([Buffer.from(bytes), Buffer.from([0])]);
}

/**
 * Load libmecab from the given path and bind the lattice API.
 */
export function loadMecab(libraryPath: string): MecabNative {
  let lib: KoffiLib;
  try {
    lib = koffi.load(libraryPath);
  } catch (error) {
    throw new ConstructionError(`Could not load MeCab library at ${libraryPath}: ${errorMessage(error)}`, { cause: error });
  }

  const types = getBindingTypes();

  const bind = (prototype: string) => {
    try {
      return lib.func(prototype);
    } catch (error) {
      throw new ConstructionError(`MeCab library at ${libraryPath} lacks ${prototype}: ${errorMessage(error)}`, { cause: error });
    }
  };

  const fn = {
    version: bind('void *mecab_version()'),
    strerror: bind('void *mecab_strerror(void *mecab)'),
    modelNew2: bind('void *mecab_model_new2(const uint8_t *arg)'),
    modelDestroy: bind('void mecab_model_destroy(void *model)'),
    modelNewTagger: bind('void *mecab_model_new_tagger(void *model)'),
    modelNewLattice: bind('void *mecab_model_new_lattice(void *model)'),
    modelDictionaryInfo: bind('void *mecab_model_dictionary_info(void *model)'),
    destroy: bind('void mecab_destroy(void *mecab)'),
    parseLattice: bind('int mecab_parse_lattice(void *mecab, void *lattice)'),
    formatNode: bind('void *mecab_format_node(void *mecab, void *node)'),
    latticeDestroy: bind('void mecab_lattice_destroy(void *lattice)'),
    latticeClear: bind('void mecab_lattice_clear(void *lattice)'),
    latticeSetSentence2: bind('void mecab_lattice_set_sentence2(void *lattice, const uint8_t *sentence, size_t len)'),
    latticeGetSize: bind('size_t mecab_lattice_get_size(void *lattice)'),
    latticeSetRequestType: bind('void mecab_lattice_set_request_type(void *lattice, int request_type)'),
    latticeGetRequestType: bind('int mecab_lattice_get_request_type(void *lattice)'),
    latticeSetTheta: bind('void mecab_lattice_set_theta(void *lattice, double theta)'),
    latticeSetBoundaryConstraint: bind('void mecab_lattice_set_boundary_constraint(void *lattice, size_t pos, int boundary_type)'),
    latticeSetFeatureConstraint: bind('void mecab_lattice_set_feature_constraint(void *lattice, size_t begin_pos, size_t end_pos, const uint8_t *feature)'),
    latticeToStr: bind('void *mecab_lattice_tostr(void *lattice)'),
    latticeNbestToStr: bind('void *mecab_lattice_nbest_tostr(void *lattice, size_t N)'),
    latticeNext: bind('int mecab_lattice_next(void *lattice)'),
    latticeGetBosNode: bind('void *mecab_lattice_get_bos_node(void *lattice)'),
    latticeStrerror: bind('void *mecab_lattice_strerror(void *lattice)')
  };

  const strlen = bindStrlen(lib);
  const readString = (ptr: NativePointer | null) => readCString(ptr, strlen);

  dp(`Loaded MeCab library from ${libraryPath}`);

  // MeCab keeps the feature pointer, so the bytes must outlive the call
  const retained = new WeakMap<NativePointer, Buffer[]>();
  const release = (lattice: NativePointer) => {
    retained.delete(lattice);
  };

  const nullableString = (ptr: unknown): Uint8Array | null => {
    const pointer = asPointer(ptr);
    return pointer ? readString(pointer) : null;
  };

  return {
    libraryPath,

    version: () => readString(asPointer(fn.version())),
    strerror: (tagger) => readString(asPointer(fn.strerror(tagger))),

    modelNew: (flags) => asPointer(fn.modelNew2(cString(flags))),
    modelDestroy: (model) => fn.modelDestroy(model),
    modelNewTagger: (model) => asPointer(fn.modelNewTagger(model)),
    modelNewLattice: (model) => asPointer(fn.modelNewLattice(model)),
    modelDictionaryInfo: (model) => asPointer(fn.modelDictionaryInfo(model)),

    readDictionaryInfo(info): RawDictionaryInfo {
      const type = 'mecab_dictionary_info_t';
      const raw: Struct = koffi.decode(info, types.dictionaryInfo);
      return {
        filename: readString(pointerField(raw, 'filename', type)),
        charset: readString(pointerField(raw, 'charset', type)),
        size: numberField(raw, 'size', type),
        type: numberField(raw, 'type', type),
        lsize: numberField(raw, 'lsize', type),
        rsize: numberField(raw, 'rsize', type),
        version: numberField(raw, 'version', type),
        next: pointerField(raw, 'next', type)
      };
    },

    taggerDestroy: (tagger) => fn.destroy(tagger),
    parseLattice: (tagger, lattice) => fn.parseLattice(tagger, lattice) !== 0,
    formatNode: (tagger, node) => nullableString(fn.formatNode(tagger, node)),

    latticeDestroy: (lattice) => {
      fn.latticeDestroy(lattice);
      release(lattice);
    },
    latticeClear: (lattice) => {
      fn.latticeClear(lattice);
      release(lattice);
    },
    latticeSetSentence: (lattice, sentence) => {
      fn.latticeSetSentence2(lattice, Buffer.from(sentence), sentence.length);
      release(lattice);
    },
    latticeGetSize: (lattice) => Number(fn.latticeGetSize(lattice)),
    latticeSetRequestType: (lattice, requestType) => fn.latticeSetRequestType(lattice, requestType),
    latticeGetRequestType: (lattice) => Number(fn.latticeGetRequestType(lattice)),
    latticeSetTheta: (lattice, theta) => fn.latticeSetTheta(lattice, theta),
    latticeSetBoundaryConstraint: (lattice, position: number, constraint: BoundaryConstraint) =>
      fn.latticeSetBoundaryConstraint(lattice, position, constraint),
    latticeSetFeatureConstraint: (lattice, begin, end, feature) => {
      const bytes = cString(feature);
      const buffers = retained.get(lattice) ?? [];
      buffers.push(bytes);
      retained.set(lattice, buffers);
      fn.latticeSetFeatureConstraint(lattice, begin, end, bytes);
    },
    latticeToString: (lattice) => nullableString(fn.latticeToStr(lattice)),
    latticeNbestToString: (lattice, n) => nullableString(fn.latticeNbestToStr(lattice, n)),
    latticeNext: (lattice) => fn.latticeNext(lattice) !== 0,
    latticeBosNode: (lattice) => asPointer(fn.latticeGetBosNode(lattice)),
    latticeStrerror: (lattice) => readString(asPointer(fn.latticeStrerror(lattice))),

    readNode(node): RawNode {
      const type = 'mecab_node_t';
      const raw: Struct = koffi.decode(node, types.node);
      const length = numberField(raw, 'length', type);
      return {
        next: pointerField(raw, 'next', type),
        surface: readBytes(pointerField(raw, 'surface', type), length),
        feature: readString(pointerField(raw, 'feature', type)),
        id: numberField(raw, 'id', type),
        length,
        rlength: numberField(raw, 'rlength', type),
        rcAttr: numberField(raw, 'rcAttr', type),
        lcAttr: numberField(raw, 'lcAttr', type),
        posid: numberField(raw, 'posid', type),
        charType: numberField(raw, 'char_type', type),
        stat: numberField(raw, 'stat', type),
        isbest: numberField(raw, 'isbest', type),
        alpha: numberField(raw, 'alpha', type),
        beta: numberField(raw, 'beta', type),
        prob: numberField(raw, 'prob', type),
        wcost: numberField(raw, 'wcost', type),
        cost: numberField(raw, 'cost', type)
      };
    }
  };
}
