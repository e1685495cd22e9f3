// mecab-lattice/codec - Conversion between JS strings and the dictionary charset
//
// Every string handed to libmecab, and every string read back from it, passes
// through a StringCodec. The native layer only ever sees bytes.

import iconv from 'iconv-lite';
import { EncodingError } from './errors.js';

function describeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return `"${ch}" (U+${code.toString(16).toUpperCase().padStart(4, '0')})`;
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export class StringCodec {
  readonly charset: string;

  constructor(charset: string) {
    const name = charset.trim();
    if (!name || !iconv.encodingExists(name)) {
      throw new EncodingError(charset, 'unsupported charset');
    }
    this.charset = name;
  }

  /**
   * Encode text; fails when any character has no representation in the charset.
   */
  encode(text: string): Buffer {
    const bytes = iconv.encode(text, this.charset, { addBOM: false });
    if (iconv.decode(bytes, this.charset, { stripBOM: false }) !== text) {
      throw new EncodingError(this.charset, `cannot encode ${this.firstUnencodable(text)}`);
    }
    return bytes;
  }

  /**
   * Decode bytes; fails on any sequence that is not valid in the charset.
   */
  decode(bytes: Uint8Array): string {
    const buffer = asBuffer(bytes);
    const text = iconv.decode(buffer, this.charset, { stripBOM: false });
    if (!iconv.encode(text, this.charset, { addBOM: false }).equals(buffer)) {
      throw new EncodingError(this.charset, `invalid byte sequence in ${buffer.length}-byte input`);
    }
    return text;
  }

  /**
   * Decode without validation; for native diagnostics, where a best-effort
   * message beats none.
   */
  decodeLenient(bytes: Uint8Array): string {
    return iconv.decode(asBuffer(bytes), this.charset);
  }

  byteLength(text: string): number {
    return this.encode(text).length;
  }

  private firstUnencodable(text: string): string {
    for (const ch of text) {
      const roundTrip = iconv.decode(iconv.encode(ch, this.charset), this.charset, { stripBOM: false });
      if (roundTrip !== ch) {
        return describeChar(ch);
      }
    }
    return 'text';
  }
}

export function encode(text: string, charset: string): Buffer {
  return new StringCodec(charset).encode(text);
}

export function decode(bytes: Uint8Array, charset: string): string {
  return new StringCodec(charset).decode(bytes);
}
