// mecab-lattice/dictionary - Dictionary metadata read from the model

import type { StringCodec } from './codec.js';
import { DictionaryType, type MecabNative, type NativePointer, type RawDictionaryInfo } from './native.js';

export class DictionaryInfo {
  constructor(
    /** Full path to the compiled dictionary file */
    readonly filepath: string,
    /** Dictionary charset as MeCab reports it, e.g. "utf8", "EUC-JP" */
    readonly charset: string,
    /** Number of registered words */
    readonly size: number,
    readonly type: DictionaryType,
    /** Left attributes size */
    readonly lsize: number,
    /** Right attributes size */
    readonly rsize: number,
    readonly version: number
  ) {
    Object.freeze(this);
  }

  static fromRaw(raw: RawDictionaryInfo, codec: StringCodec): DictionaryInfo {
    return new DictionaryInfo(
      codec.decode(raw.filename),
      codec.decode(raw.charset),
      raw.size,
      toDictionaryType(raw.type),
      raw.lsize,
      raw.rsize,
      raw.version
    );
  }

  isSystem(): boolean {
    return this.type === DictionaryType.System;
  }

  isUser(): boolean {
    return this.type === DictionaryType.User;
  }

  isUnknown(): boolean {
    return this.type === DictionaryType.Unknown;
  }
}

function toDictionaryType(type: number): DictionaryType {
  if (type === DictionaryType.System) return DictionaryType.System;
  if (type === DictionaryType.User) return DictionaryType.User;
  return DictionaryType.Unknown;
}

/**
 * Walk the model's dictionary list until the NULL `next` pointer.
 */
export function readDictionaries(native: MecabNative, model: NativePointer, codec: StringCodec): DictionaryInfo[] {
  const dictionaries: DictionaryInfo[] = [];
  let ptr = native.modelDictionaryInfo(model);
  while (ptr !== null) {
    const raw = native.readDictionaryInfo(ptr);
    dictionaries.push(DictionaryInfo.fromRaw(raw, codec));
    ptr = raw.next;
  }
  return dictionaries;
}
