import { describe, test, expect } from 'vitest';
import { StringCodec, EncodingError, encode, decode } from '@mecab-lattice/core';

describe('StringCodec', () => {
  test('round trips text through each supported charset', () => {
    for (const charset of ['utf8', 'euc-jp', 'shift_jis']) {
      const codec = new StringCodec(charset);
      const text = 'にわにはにわにわとりがいる。';
      expect(codec.decode(codec.encode(text))).toBe(text);
    }
  });

  test('measures byte lengths in the session charset', () => {
    expect(new StringCodec('utf8').byteLength('にわ')).toBe(6);
    expect(new StringCodec('euc-jp').byteLength('にわ')).toBe(4);
    expect(new StringCodec('shift_jis').byteLength('にわ')).toBe(4);
    expect(new StringCodec('utf8').byteLength('abc')).toBe(3);
  });

  test('encodes to the expected bytes', () => {
    expect([...encode('にわ', 'utf8')]).toEqual([0xe3, 0x81, 0xab, 0xe3, 0x82, 0x8f]);
    expect([...encode('にわ', 'shift_jis')]).toEqual([0x82, 0xc9, 0x82, 0xed]);
    expect(decode(Uint8Array.from([0xa4, 0xcb, 0xa4, 0xef]), 'euc-jp')).toBe('にわ');
  });

  test('rejects characters the charset cannot represent', () => {
    const codec = new StringCodec('euc-jp');
    expect(() => codec.encode('a😀')).toThrow(EncodingError);
    expect(() => codec.encode('a😀')).toThrow('euc-jp: cannot encode "😀" (U+1F600)');
  });

  test('rejects invalid byte sequences', () => {
    const codec = new StringCodec('utf8');
    expect(() => codec.decode(Uint8Array.from([0xff]))).toThrow('utf8: invalid byte sequence in 1-byte input');
  });

  test('decodeLenient does not validate', () => {
    expect(new StringCodec('utf8').decodeLenient(Uint8Array.from([0x61, 0xff]))).toBe('a�');
  });

  test('rejects unknown charsets', () => {
    expect(() => new StringCodec('klingon')).toThrow('klingon: unsupported charset');
    expect(() => new StringCodec('  ')).toThrow(EncodingError);
  });

  test('encoding errors carry the charset', () => {
    try {
      new StringCodec('utf8').decode(Uint8Array.from([0xc3]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EncodingError);
      if (error instanceof EncodingError) {
        expect(error.charset).toBe('utf8');
        expect(error.name).toBe('EncodingError');
      }
    }
  });
});
