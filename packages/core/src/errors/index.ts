const DISABLE_STACKTRACE : boolean = true;

export class NelfError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export type ParseErrorKind =
  | 'MalformedLength'
  | 'LengthOverflow'
  | 'MissingSeparator'
  | 'TruncatedContent'
  | 'MissingTerminator'
  | 'InvalidEncoding'
  | 'ElementLimitExceeded';

/**
 * First malformed construct found in a source buffer.
 * `offset` is absolute within the buffer handed to the engine.
 */
export class ParseError extends NelfError {
  constructor(
    readonly kind   : ParseErrorKind,
    readonly offset : number,
    description     : string,
  ) {
    super(`${description} at offset ${offset}`);
  }
}

export class MalformedLengthError extends ParseError {
  constructor(offset: number) {
    super('MalformedLength', offset, 'Expected a decimal length');
  }
}

export class LengthOverflowError extends ParseError {
  constructor(offset: number, readonly max: number) {
    super('LengthOverflow', offset, `Length exceeds maximum of ${max}`);
  }
}

export class MissingSeparatorError extends ParseError {
  constructor(offset: number) {
    super('MissingSeparator', offset, 'Expected length separator');
  }
}

export class TruncatedContentError extends ParseError {
  constructor(offset: number, readonly declared: number, readonly available: number) {
    super(
      'TruncatedContent',
      offset,
      `Declared length ${declared} runs past end of input (${available} bytes left)`,
    );
  }
}

export class MissingTerminatorError extends ParseError {
  constructor(offset: number) {
    super('MissingTerminator', offset, 'Expected element terminator');
  }
}

export class InvalidEncodingError extends ParseError {
  constructor(offset: number, readonly rule: string) {
    super('InvalidEncoding', offset, `Content is not valid ${rule}`);
  }
}

export class ElementLimitExceededError extends ParseError {
  constructor(offset: number, readonly limit: number) {
    super('ElementLimitExceeded', offset, `More than ${limit} elements`);
  }
}

/** Encode-side: an element longer than the configured maximum. */
export class ElementTooLargeError extends NelfError {
  readonly kind = 'ElementTooLarge' as const;
  constructor(
    readonly index  : number,
    readonly offset : number,
    readonly length : number,
    readonly max    : number,
  ) {
    super(`Element ${index} is ${length} bytes, maximum is ${max} at offset ${offset}`);
  }
}

export class ConfigError      extends NelfError {}
export class TextRuleError    extends NelfError {}
export class FilesystemError  extends NelfError {}
