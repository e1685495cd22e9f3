import { describe, test, expect } from 'vitest';
import {
  ConstraintError,
  ConstructionError,
  DictionaryType,
  RequestType,
  Tagger,
  requestTypeFor,
  withTagger
} from '@mecab-lattice/core';
import { DEFAULT_DICTIONARY, FakeNative, fakeEnvironment, openFakeTagger } from '../../../test-utils/fake-native.js';

const SENTENCE = 'にわにはにわにわとりがいる。';

describe('Tagger.open', () => {
  test('reads version, dictionaries and options', () => {
    const { tagger, native } = openFakeTagger('-N2 -a');

    expect(tagger.version).toBe('0.996');
    expect(tagger.charset).toBe('utf8');
    expect(tagger.libraryPath).toBe('/fake/libmecab.so');
    expect(tagger.options).toEqual({ nbest: 2, allMorphs: true });
    expect(tagger.optionsString).toBe('--all-morphs --nbest=2');
    expect(native.models[0]?.flags).toBe('--all-morphs --nbest=2');

    expect(tagger.dictionaries).toHaveLength(1);
    const [dictionary] = tagger.dictionaries;
    expect(dictionary?.filepath).toBe('/fake/dic/sys.dic');
    expect(dictionary?.charset).toBe('utf8');
    expect(dictionary?.isSystem()).toBe(true);
  });

  test('walks every dictionary', () => {
    const { tagger } = openFakeTagger(null, {
      dictionaries: [DEFAULT_DICTIONARY, { ...DEFAULT_DICTIONARY, filename: '/fake/dic/user.dic', type: DictionaryType.User, size: 3 }]
    });
    expect(tagger.dictionaries.map((dictionary) => [dictionary.filepath, dictionary.isUser()])).toEqual([
      ['/fake/dic/sys.dic', false],
      ['/fake/dic/user.dic', true]
    ]);
    expect(tagger.dictionaries[1]?.size).toBe(3);
  });

  test('rejects bad options before loading anything', () => {
    const native = new FakeNative();
    expect(() => Tagger.open('--bogus', { environment: fakeEnvironment(), load: () => native })).toThrow(ConstraintError);
    expect(native.created.models).toBe(0);
  });

  test('fails when the library cannot be found', () => {
    expect(() =>
      Tagger.open(null, {
        discovery: {
          env: {},
          platform: 'linux',
          run: () => {
            throw new Error('command not found');
          }
        }
      })
    ).toThrow('libmecab.so could not be found, please use MECAB_PATH');
  });

  test('fails when the library cannot be loaded', () => {
    expect(() =>
      Tagger.open(null, { discovery: { env: { MECAB_PATH: '/nonexistent/libmecab.so', MECAB_CHARSET: 'utf8' } } })
    ).toThrow(ConstructionError);
  });

  test('fails on an unsupported charset', () => {
    expect(() =>
      Tagger.open(null, { environment: fakeEnvironment('klingon'), load: () => new FakeNative() })
    ).toThrow('MeCab charset klingon is not supported');
  });

  test('reports model failures with the options string', () => {
    expect(() => openFakeTagger('-N2', { failModel: 'no system dictionary' })).toThrow(
      'Could not initialize MeCab with options "--nbest=2": no system dictionary'
    );
  });

  test('destroys the model when the tagger cannot be created', () => {
    const native = new FakeNative({ failTagger: true });
    expect(() => Tagger.open(null, { environment: fakeEnvironment(), load: () => native })).toThrow(
      'Could not create MeCab tagger with options ""'
    );
    expect(native.destroyed.models).toBe(1);
  });

  test('prefers the dictionary charset over a discovered one', () => {
    const native = new FakeNative({ charset: 'utf8' });
    const tagger = Tagger.open(null, {
      environment: { libraryPath: native.libraryPath, charset: 'euc-jp', charsetSource: 'mecab' },
      load: () => native
    });
    expect(tagger.charset).toBe('utf8');
  });

  test('keeps a charset set through MECAB_CHARSET', () => {
    const native = new FakeNative({ charset: 'utf8' });
    const tagger = Tagger.open(null, {
      environment: { libraryPath: native.libraryPath, charset: 'euc-jp', charsetSource: 'env' },
      load: () => native
    });
    expect(tagger.charset).toBe('euc-jp');
  });
});

describe('Tagger.parse', () => {
  test('returns formatted output and releases the lattice', () => {
    const { tagger, native } = openFakeTagger();
    expect(tagger.parse('ab')).toBe('a\t*\nb\t*\nEOS');
    expect(native.created.lattices).toBe(1);
    expect(native.destroyed.lattices).toBe(1);
  });

  test('applies boundary constraints', () => {
    const { tagger } = openFakeTagger();
    const result = tagger.parse(SENTENCE, { boundaryConstraints: { pattern: 'にわ|はにわにわとり' } });
    expect(result).toBe('にわ\t*\nに\t*\nはにわにわとり\t*\nが\t*\nい\t*\nる\t*\n。\t*\nEOS');
  });

  test('applies boundary constraints without free gaps', () => {
    const { tagger } = openFakeTagger();
    const result = tagger.parse(SENTENCE, {
      boundaryConstraints: { pattern: /にわ|はにわにわとり/, anyBoundary: false }
    });
    expect(result).toBe('にわ\t*\nに\t*\nはにわにわとり\t*\nがいる。\t*\nEOS');
  });

  test('applies feature constraints', () => {
    const { tagger } = openFakeTagger();
    const result = tagger.parse('とりがいる', { featureConstraints: [['とり', '名詞,一般']] });
    expect(result).toBe('とり\t名詞,一般\nが\t*\nい\t*\nる\t*\nEOS');
  });

  test('returns nodes lazily', () => {
    const { tagger, native } = openFakeTagger();
    const nodes = tagger.parse('ab', { asNodes: true });
    expect(native.created.lattices).toBe(0);

    expect([...nodes].map((node) => node.surface)).toEqual(['a', 'b', '']);
    expect(native.created.lattices).toBe(1);
    expect(native.destroyed.lattices).toBe(1);
  });

  test('releases the lattice when node iteration stops early', () => {
    const { tagger, native } = openFakeTagger();
    for (const node of tagger.parse('abc', { asNodes: true })) {
      expect(node.surface).toBe('a');
      break;
    }
    expect(native.destroyed.lattices).toBe(1);
    expect(tagger.openLattices).toBe(0);
  });

  test('rejects empty text', () => {
    const { tagger, native } = openFakeTagger();
    expect(() => tagger.parse('')).toThrow(ConstraintError);
    expect(() => tagger.parse('', { asNodes: true })).toThrow('Text to parse cannot be empty');
    expect(native.created.lattices).toBe(0);
  });

  test('rejects both kinds of constraints at once', () => {
    const { tagger } = openFakeTagger();
    expect(() =>
      tagger.parse('ab', { boundaryConstraints: { pattern: 'a' }, featureConstraints: [['a', 'x']] })
    ).toThrow('Boundary and feature constraints cannot be used together');
  });

  test('releases the lattice when parsing fails', () => {
    const { tagger, native } = openFakeTagger(null, { failParse: 'out of memory' });
    expect(() => tagger.parse('ab')).toThrow('MeCab could not parse the sentence: out of memory');
    expect(native.destroyed.lattices).toBe(1);
  });
});

describe('Tagger.close', () => {
  test('is idempotent and destroys tagger then model once', () => {
    const { tagger, native } = openFakeTagger();
    tagger.close();
    tagger.close();

    expect(tagger.closed).toBe(true);
    expect(native.destroyed).toEqual({ models: 1, taggers: 1, lattices: 0 });
  });

  test('closes lattices still open', () => {
    const { tagger, native } = openFakeTagger();
    const lattice = tagger.newLattice();
    tagger.close();

    expect(lattice.closed).toBe(true);
    expect(native.destroyed.lattices).toBe(1);
  });

  test('refuses work once closed', () => {
    const { tagger } = openFakeTagger();
    tagger.close();
    expect(() => tagger.parse('ab')).toThrow('Tagger has been closed');
    expect(() => tagger.newLattice()).toThrow(ConstructionError);
  });

  test('withTagger closes after the callback', async () => {
    const native = new FakeNative();
    const result = await withTagger(null, (tagger) => tagger.parse('ab'), {
      environment: fakeEnvironment(),
      load: () => native
    });
    expect(result).toBe('a\t*\nb\t*\nEOS');
    expect(native.destroyed.taggers).toBe(1);
  });

  test('withTagger closes when the callback rejects', async () => {
    const native = new FakeNative();
    await expect(
      withTagger(
        null,
        async () => {
          throw new Error('boom');
        },
        { environment: fakeEnvironment(), load: () => native }
      )
    ).rejects.toThrow('boom');
    expect(native.destroyed.models).toBe(1);
  });
});

describe('requestTypeFor', () => {
  test('maps options to request bits', () => {
    expect(requestTypeFor({})).toBe(RequestType.ONE_BEST);
    expect(requestTypeFor({ allMorphs: true, partial: true })).toBe(37);
    expect(requestTypeFor({ nbest: 2, marginal: true })).toBe(11);
    expect(requestTypeFor({ nbest: 1 })).toBe(1);
    expect(requestTypeFor({ latticeLevel: 2 })).toBe(9);
  });
});
