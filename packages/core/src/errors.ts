// mecab-lattice/errors - Error kinds raised at the native boundary

export interface MecabErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every error this package raises.
 */
export class MecabError extends Error {
  constructor(message: string, options: MecabErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'MecabError';
  }
}

/**
 * Text could not be encoded to, or bytes decoded from, the dictionary charset.
 */
export class EncodingError extends MecabError {
  constructor(public charset: string, message: string, options: MecabErrorOptions = {}) {
    super(`${charset}: ${message}`, options);
    this.name = 'EncodingError';
  }
}

/**
 * A native library, model, tagger or lattice could not be created.
 */
export class ConstructionError extends MecabError {
  constructor(message: string, options: MecabErrorOptions = {}) {
    super(message, options);
    this.name = 'ConstructionError';
  }
}

/**
 * The native parse or one of its extraction calls failed.
 * `nativeMessage` is the decoded strerror text, when MeCab gave one.
 */
export class ParseError extends MecabError {
  constructor(message: string, public nativeMessage: string | null = null, options: MecabErrorOptions = {}) {
    super(nativeMessage ? `${message}: ${nativeMessage}` : message, options);
    this.name = 'ParseError';
  }
}

/**
 * Caller input (constraints, options, offsets) was rejected before any native call.
 */
export class ConstraintError extends MecabError {
  constructor(message: string, options: MecabErrorOptions = {}) {
    super(message, options);
    this.name = 'ConstraintError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
