import { describe, test, expect } from 'vitest';
import { Readable } from 'stream';
import { ConstraintError, ConstructionError, ParseError, Tagger } from '@mecab-lattice/core';
import {
  JsonBodyError,
  handleInfoRequest,
  handleParseRequest,
  parseJsonBody,
  routeRequest,
  statusFor
} from '../src/index.js';
import { FakeNative, fakeEnvironment, openFakeTagger } from '../../../test-utils/fake-native.js';

function body(chunks: string[], headers: Record<string, string> = {}) {
  return Object.assign(Readable.from(chunks.map((chunk) => Buffer.from(chunk))), { headers });
}

describe('handleParseRequest', () => {
  test('returns formatted output', () => {
    const { tagger } = openFakeTagger();
    expect(handleParseRequest({ tagger }, { text: 'ab' })).toEqual({
      status: 200,
      body: { text: 'ab', result: 'a\t*\nb\t*\nEOS' }
    });
  });

  test('returns nodes', () => {
    const { tagger } = openFakeTagger();
    const response = handleParseRequest({ tagger }, { text: 'ab', nodes: true });
    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      text: 'ab',
      nodes: [
        { surface: 'a', feature: '*', status: 'Normal', begin: 0, length: 1, posid: 0, wcost: 0, cost: 1, prob: 0, nbestIndex: 0 },
        { surface: 'b', feature: '*', status: 'Normal', begin: 1, length: 1, posid: 0, wcost: 0, cost: 2, prob: 0, nbestIndex: 0 },
        {
          surface: '',
          feature: 'BOS/EOS',
          status: 'EndOfSentence',
          begin: 2,
          length: 0,
          posid: 0,
          wcost: 0,
          cost: 3,
          prob: 0,
          nbestIndex: 0
        }
      ]
    });
  });

  test('applies boundary constraints', () => {
    const { tagger } = openFakeTagger();
    const response = handleParseRequest(
      { tagger },
      { text: 'にわにはにわにわとりがいる。', boundary: 'にわ|はにわにわとり', anyBoundary: false }
    );
    expect(response.body).toEqual({
      text: 'にわにはにわにわとりがいる。',
      result: 'にわ\t*\nに\t*\nはにわにわとり\t*\nがいる。\t*\nEOS'
    });
  });

  test('applies feature constraints', () => {
    const { tagger } = openFakeTagger();
    const response = handleParseRequest({ tagger }, { text: 'とりがいる', features: [['とり', '名詞,一般']] });
    expect(response.body).toEqual({ text: 'とりがいる', result: 'とり\t名詞,一般\nが\t*\nい\t*\nる\t*\nEOS' });
  });

  test('opens a one-off tagger for request options', () => {
    const { tagger } = openFakeTagger();
    const native = new FakeNative();
    const seen: unknown[] = [];
    const response = handleParseRequest(
      {
        tagger,
        open: (options) => {
          seen.push(options);
          return Tagger.open(options, { environment: fakeEnvironment(), load: () => native });
        }
      },
      { text: 'a', options: '-N2' }
    );

    expect(response).toEqual({ status: 200, body: { text: 'a', result: 'a\t*\nEOS' } });
    expect(seen).toEqual(['-N2']);
    expect(native.destroyed).toEqual({ models: 1, taggers: 1, lattices: 1 });
    expect(tagger.closed).toBe(false);
  });

  test('rejects bodies without text', () => {
    const { tagger } = openFakeTagger();
    expect(handleParseRequest({ tagger }, { text: '' })).toEqual({
      status: 400,
      body: { error: 'Missing required field: text' }
    });
    expect(handleParseRequest({ tagger }, [1, 2])).toEqual({ status: 400, body: { error: 'Body must be a JSON object' } });
  });

  test('rejects malformed constraints', () => {
    const { tagger } = openFakeTagger();
    expect(handleParseRequest({ tagger }, { text: 'ab', boundary: 3 })).toEqual({
      status: 400,
      body: { error: 'boundary must be a regular expression string' }
    });
    expect(handleParseRequest({ tagger }, { text: 'ab', features: [['a']] })).toEqual({
      status: 400,
      body: { error: 'features[0] must be a [morpheme, feature] pair of strings' }
    });
    expect(handleParseRequest({ tagger }, { text: 'ab', boundary: '(' }).status).toBe(400);
    expect(handleParseRequest({ tagger }, { text: 'ab', options: 5 })).toEqual({
      status: 400,
      body: { error: 'options must be a MeCab option string or object' }
    });
  });

  test('maps parse failures to 422', () => {
    const { tagger } = openFakeTagger(null, { failParse: 'out of memory' });
    expect(handleParseRequest({ tagger }, { text: 'ab' })).toEqual({
      status: 422,
      body: { error: 'MeCab could not parse the sentence: out of memory' }
    });
  });
});

describe('handleInfoRequest', () => {
  test('describes the tagger', () => {
    const { tagger } = openFakeTagger('-N2');
    expect(handleInfoRequest({ tagger })).toEqual({
      status: 200,
      body: {
        version: '0.996',
        charset: 'utf8',
        options: '--nbest=2',
        dictionaries: [{ filepath: '/fake/dic/sys.dic', charset: 'utf8', size: 1024, type: 0, version: 102 }]
      }
    });
  });
});

describe('routeRequest', () => {
  const noBody = async () => {
    throw new Error('body should not be read');
  };

  test('routes health checks', async () => {
    const { tagger } = openFakeTagger();
    const response = await routeRequest({ tagger }, 'GET', '/health', noBody);
    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'ok' });
  });

  test('routes parse requests through the body reader', async () => {
    const { tagger } = openFakeTagger();
    const response = await routeRequest({ tagger }, 'POST', '/parse', async () => ({ text: 'ab' }));
    expect(response).toEqual({ status: 200, body: { text: 'ab', result: 'a\t*\nb\t*\nEOS' } });
  });

  test('answers preflight requests', async () => {
    const { tagger } = openFakeTagger();
    expect(await routeRequest({ tagger }, 'OPTIONS', '/parse', noBody)).toEqual({ status: 204, body: null });
  });

  test('reports body errors with their status', async () => {
    const { tagger } = openFakeTagger();
    const response = await routeRequest({ tagger }, 'POST', '/parse', async () => {
      throw new JsonBodyError('Payload too large', 413);
    });
    expect(response).toEqual({ status: 413, body: { error: 'Payload too large' } });
  });

  test('returns 404 for unknown routes', async () => {
    const { tagger } = openFakeTagger();
    expect(await routeRequest({ tagger }, 'GET', '/parse', noBody)).toEqual({ status: 404, body: { error: 'Not found' } });
  });
});

describe('parseJsonBody', () => {
  test('joins chunks and parses JSON', async () => {
    expect(await parseJsonBody(body(['{"text":', '"ab"}']))).toEqual({ text: 'ab' });
  });

  test('rejects empty and invalid bodies', async () => {
    await expect(parseJsonBody(body([]))).rejects.toThrow('Empty body');
    await expect(parseJsonBody(body(['{']))).rejects.toThrow(JsonBodyError);
  });

  test('rejects oversized bodies by header', async () => {
    await expect(parseJsonBody(body(['{}'], { 'content-length': String(2 * 1024 * 1024) }))).rejects.toMatchObject({
      status: 413
    });
  });
});

describe('statusFor', () => {
  test('maps error kinds to statuses', () => {
    expect(statusFor(new ConstraintError('bad'))).toBe(400);
    expect(statusFor(new ParseError('failed'))).toBe(422);
    expect(statusFor(new ConstructionError('missing'))).toBe(503);
    expect(statusFor(new JsonBodyError('Empty body'))).toBe(400);
    expect(statusFor(new Error('other'))).toBe(500);
  });
});
