// In-process stand-in for libmecab, shared by the package tests
//
// The fake "analyzer" cuts the sentence at every character, then applies the
// lattice constraints: token boundaries force a cut, inside-token offsets
// remove one, and each feature constraint span becomes a single node with
// its feature. Everything else gets the feature "*".

import iconv from 'iconv-lite';
import {
  BoundaryConstraint,
  NodeStatus,
  RequestType,
  Tagger,
  type MecabEnvironment,
  type MecabNative,
  type MecabOptions,
  type NativePointer,
  type RawDictionaryInfo,
  type RawNode
} from '@mecab-lattice/core';

export interface FakeDictionary {
  filename: string;
  charset: string;
  size: number;
  type: number;
  lsize: number;
  rsize: number;
  version: number;
}

export interface FakeNativeOptions {
  charset?: string;
  version?: string;
  dictionaries?: FakeDictionary[];
  /** Paths mecab_lattice_next can step through in n-best mode */
  nbestPaths?: number;
  /** mecab_model_new2 returns NULL with this global error */
  failModel?: string;
  failTagger?: boolean;
  failLattice?: boolean;
  /** mecab_parse_lattice fails with this lattice error */
  failParse?: string;
  failToString?: boolean;
  /** mecab_lattice_set_sentence keeps at most this many bytes */
  sentenceLimit?: number;
}

class FakeModel {
  constructor(readonly flags: string) {}
}

class FakeTagger {}

class FakeDictionaryHandle {
  constructor(
    readonly info: FakeDictionary,
    public next: FakeDictionaryHandle | null
  ) {}
}

class FakeNode {
  constructor(readonly raw: RawNode) {}
}

interface Segment {
  begin: number;
  end: number;
  feature: string;
}

export class FakeLattice {
  sentence: Buffer | null = null;
  requestType = 0;
  theta = 0.75;
  error = '';
  readonly boundaryCalls: Array<[position: number, constraint: BoundaryConstraint]> = [];
  readonly featureCalls: Array<[begin: number, end: number, feature: string]> = [];
  paths: FakeNode[][] = [];
  pathIndex = 0;
}

export const DEFAULT_DICTIONARY: FakeDictionary = {
  filename: '/fake/dic/sys.dic',
  charset: 'utf8',
  size: 1024,
  type: 0,
  lsize: 10,
  rsize: 10,
  version: 102
};

export class FakeNative implements MecabNative {
  readonly libraryPath = '/fake/libmecab.so';
  readonly charset: string;
  readonly created = { models: 0, taggers: 0, lattices: 0 };
  readonly destroyed = { models: 0, taggers: 0, lattices: 0 };
  readonly lattices: FakeLattice[] = [];
  readonly models: FakeModel[] = [];
  private globalError = '';
  private readonly dictionaryHead: FakeDictionaryHandle | null;

  constructor(readonly options: FakeNativeOptions = {}) {
    this.charset = options.charset ?? 'utf8';
    let head: FakeDictionaryHandle | null = null;
    const dictionaries = options.dictionaries ?? [{ ...DEFAULT_DICTIONARY, charset: this.charset }];
    for (const info of [...dictionaries].reverse()) {
      head = new FakeDictionaryHandle(info, head);
    }
    this.dictionaryHead = head;
  }

  get lastLattice(): FakeLattice {
    const lattice = this.lattices[this.lattices.length - 1];
    if (!lattice) throw new Error('no lattice has been created');
    return lattice;
  }

  version(): Uint8Array {
    return this.bytes(this.options.version ?? '0.996');
  }

  strerror(_tagger: NativePointer | null): Uint8Array {
    return this.bytes(this.globalError);
  }

  modelNew(flags: Uint8Array): NativePointer | null {
    if (this.options.failModel !== undefined) {
      this.globalError = this.options.failModel;
      return null;
    }
    this.created.models++;
    const model = new FakeModel(this.text(flags));
    this.models.push(model);
    return model;
  }

  modelDestroy(model: NativePointer): void {
    if (!(model instanceof FakeModel)) throw new Error('not a model');
    this.destroyed.models++;
  }

  modelNewTagger(model: NativePointer): NativePointer | null {
    if (!(model instanceof FakeModel)) throw new Error('not a model');
    if (this.options.failTagger) return null;
    this.created.taggers++;
    return new FakeTagger();
  }

  modelNewLattice(model: NativePointer): NativePointer | null {
    if (!(model instanceof FakeModel)) throw new Error('not a model');
    if (this.options.failLattice) return null;
    this.created.lattices++;
    const lattice = new FakeLattice();
    this.lattices.push(lattice);
    return lattice;
  }

  modelDictionaryInfo(model: NativePointer): NativePointer | null {
    if (!(model instanceof FakeModel)) throw new Error('not a model');
    return this.dictionaryHead;
  }

  readDictionaryInfo(info: NativePointer): RawDictionaryInfo {
    if (!(info instanceof FakeDictionaryHandle)) throw new Error('not a dictionary info');
    return {
      filename: this.bytes(info.info.filename),
      charset: this.bytes(info.info.charset),
      size: info.info.size,
      type: info.info.type,
      lsize: info.info.lsize,
      rsize: info.info.rsize,
      version: info.info.version,
      next: info.next
    };
  }

  taggerDestroy(tagger: NativePointer): void {
    if (!(tagger instanceof FakeTagger)) throw new Error('not a tagger');
    this.destroyed.taggers++;
  }

  parseLattice(tagger: NativePointer, handle: NativePointer): boolean {
    if (!(tagger instanceof FakeTagger)) throw new Error('not a tagger');
    const lattice = this.lattice(handle);
    if (this.options.failParse !== undefined) {
      lattice.error = this.options.failParse;
      return false;
    }
    if (!lattice.sentence) {
      lattice.error = 'sentence is not set';
      return false;
    }
    const segments = this.segment(lattice);
    const paths = lattice.requestType & RequestType.NBEST ? this.options.nbestPaths ?? 1 : 1;
    lattice.paths = [];
    for (let path = 0; path < paths; path++) {
      lattice.paths.push(this.buildPath(lattice.sentence, segments, path));
    }
    lattice.pathIndex = 0;
    return true;
  }

  formatNode(_tagger: NativePointer, node: NativePointer): Uint8Array | null {
    if (!(node instanceof FakeNode)) return null;
    const surface = this.text(node.raw.surface);
    return this.bytes(`${surface}:${this.text(node.raw.feature)}\n`);
  }

  latticeDestroy(handle: NativePointer): void {
    this.lattice(handle);
    this.destroyed.lattices++;
  }

  latticeClear(handle: NativePointer): void {
    const lattice = this.lattice(handle);
    lattice.sentence = null;
    lattice.paths = [];
    lattice.pathIndex = 0;
    lattice.boundaryCalls.length = 0;
    lattice.featureCalls.length = 0;
  }

  latticeSetSentence(handle: NativePointer, sentence: Uint8Array): void {
    this.latticeClear(handle);
    const limit = this.options.sentenceLimit ?? sentence.length;
    this.lattice(handle).sentence = Buffer.from(sentence.subarray(0, limit));
  }

  latticeGetSize(handle: NativePointer): number {
    return this.lattice(handle).sentence?.length ?? 0;
  }

  latticeSetRequestType(handle: NativePointer, requestType: number): void {
    this.lattice(handle).requestType = requestType;
  }

  latticeGetRequestType(handle: NativePointer): number {
    return this.lattice(handle).requestType;
  }

  latticeSetTheta(handle: NativePointer, theta: number): void {
    this.lattice(handle).theta = theta;
  }

  latticeSetBoundaryConstraint(handle: NativePointer, position: number, constraint: BoundaryConstraint): void {
    this.lattice(handle).boundaryCalls.push([position, constraint]);
  }

  latticeSetFeatureConstraint(handle: NativePointer, begin: number, end: number, feature: Uint8Array): void {
    this.lattice(handle).featureCalls.push([begin, end, this.text(feature)]);
  }

  latticeToString(handle: NativePointer): Uint8Array | null {
    const lattice = this.lattice(handle);
    if (this.options.failToString) {
      lattice.error = 'output buffer overflow';
      return null;
    }
    const path = lattice.paths[lattice.pathIndex];
    return path ? this.bytes(this.render(path)) : null;
  }

  latticeNbestToString(handle: NativePointer, n: number): Uint8Array | null {
    const lattice = this.lattice(handle);
    if (this.options.failToString) {
      lattice.error = 'output buffer overflow';
      return null;
    }
    return this.bytes(lattice.paths.slice(0, n).map((path) => this.render(path)).join(''));
  }

  latticeNext(handle: NativePointer): boolean {
    const lattice = this.lattice(handle);
    if (!(lattice.requestType & RequestType.NBEST)) return false;
    if (lattice.pathIndex + 1 >= lattice.paths.length) return false;
    lattice.pathIndex++;
    return true;
  }

  latticeBosNode(handle: NativePointer): NativePointer | null {
    const lattice = this.lattice(handle);
    return lattice.paths[lattice.pathIndex]?.[0] ?? null;
  }

  latticeStrerror(handle: NativePointer): Uint8Array {
    return this.bytes(this.lattice(handle).error);
  }

  readNode(node: NativePointer): RawNode {
    if (!(node instanceof FakeNode)) throw new Error('not a node');
    return node.raw;
  }

  private lattice(handle: NativePointer): FakeLattice {
    if (!(handle instanceof FakeLattice)) throw new Error('not a lattice');
    return handle;
  }

  private bytes(text: string): Buffer {
    return iconv.encode(text, this.charset);
  }

  private text(bytes: Uint8Array): string {
    return iconv.decode(Buffer.from(bytes), this.charset);
  }

  private segment(lattice: FakeLattice): Segment[] {
    const sentence = lattice.sentence ?? Buffer.alloc(0);
    const cuts = new Set<number>([0, sentence.length]);
    let offset = 0;
    for (const ch of this.text(sentence)) {
      offset += this.bytes(ch).length;
      cuts.add(offset);
    }

    for (const [position, constraint] of lattice.boundaryCalls) {
      if (constraint === BoundaryConstraint.TokenBoundary) cuts.add(position);
      if (constraint === BoundaryConstraint.InsideToken) cuts.delete(position);
    }
    const features = new Map<number, [end: number, feature: string]>();
    for (const [begin, end, feature] of lattice.featureCalls) {
      for (let position = begin + 1; position < end; position++) cuts.delete(position);
      cuts.add(begin);
      cuts.add(end);
      features.set(begin, [end, feature]);
    }

    const sorted = [...cuts].sort((a, b) => a - b);
    const segments: Segment[] = [];
    for (let i = 0; i + 1 < sorted.length; i++) {
      const begin = sorted[i] ?? 0;
      const end = sorted[i + 1] ?? 0;
      const forced = features.get(begin);
      segments.push({ begin, end, feature: forced && forced[0] === end ? forced[1] : '*' });
    }
    return segments;
  }

  private buildPath(sentence: Buffer, segments: Segment[], path: number): FakeNode[] {
    const node = (stat: NodeStatus, surface: Buffer, feature: string, cost: number): RawNode => ({
      next: null,
      surface,
      feature: this.bytes(feature),
      id: 0,
      length: surface.length,
      rlength: surface.length,
      rcAttr: 0,
      lcAttr: 0,
      posid: 0,
      charType: 0,
      stat,
      isbest: path === 0 ? 1 : 0,
      alpha: 0,
      beta: 0,
      prob: 0,
      wcost: 0,
      cost
    });

    const raws: RawNode[] = [node(NodeStatus.BeginningOfSentence, Buffer.alloc(0), 'BOS/EOS', 0)];
    segments.forEach((segment, index) => {
      raws.push(node(NodeStatus.Normal, sentence.subarray(segment.begin, segment.end), segment.feature, path * 100 + index + 1));
    });
    raws.push(node(NodeStatus.EndOfSentence, Buffer.alloc(0), 'BOS/EOS', path * 100 + segments.length + 1));

    const nodes: FakeNode[] = [];
    for (let i = raws.length - 1; i >= 0; i--) {
      const raw = raws[i];
      if (!raw) continue;
      nodes.unshift(new FakeNode({ ...raw, next: nodes[0] ?? null }));
    }
    return nodes;
  }

  private render(path: FakeNode[]): string {
    return path
      .filter((node) => node.raw.stat === NodeStatus.Normal)
      .map((node) => `${this.text(node.raw.surface)}\t${this.text(node.raw.feature)}\n`)
      .join('') + 'EOS\n';
  }
}

export function fakeEnvironment(charset = 'utf8'): MecabEnvironment {
  return { libraryPath: '/fake/libmecab.so', charset, charsetSource: 'env' };
}

/**
 * Open a Tagger over a FakeNative.
 */
export function openFakeTagger(
  options?: string | MecabOptions | null,
  fakeOptions: FakeNativeOptions = {}
): { tagger: Tagger; native: FakeNative } {
  const native = new FakeNative(fakeOptions);
  const tagger = Tagger.open(options, {
    environment: fakeEnvironment(native.charset),
    load: () => native
  });
  return { tagger, native };
}
