// packages/core/src/index.ts

import './config/defaults.js';

import { resolveOptions }                      from './config/options.js';
import { frame, safeFrame, iterateSpans }      from './framer/framer.js';
import { view, iterate, safeDecode, type DecodeResult } from './view/builder.js';
import { encode, encodeElement }               from './encoder/encoder.js';
import { ElementView }                         from './view/ElementView.js';
import { toBytes }                             from './util/bytes.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';
import { ParseError } from './errors/index.js';
import type {
  Element,
  FrameResult,
  FramingConfig,
  NelfOptions,
  Source,
  Span,
} from './types/index.js';

/**
 * Nelf binds one framing configuration to the decode/encode operations and
 * reports what it does through a verbosity logger.
 *
 * String sources are UTF-8 encoded once; views then borrow from that copy.
 * `Uint8Array` sources are never copied.
 */
export class Nelf {
  private readonly cfg : FramingConfig;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  /**
   * @param opt - Framing bytes, limits, text rule and logging options
   */
  constructor(opt: NelfOptions = {}) {
    this.cfg = resolveOptions(opt);
    this.log = createLogger(opt.verbose ?? 0, opt.logger).scoped('nelf');
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * True when `input` frames and validates completely under `opt`.
   */
  static isWellFormed(input: Source, opt: NelfOptions = {}): boolean {
    return new Nelf(opt).safeDecode(input).ok;
  }

  /** The resolved configuration (frozen). */
  get config(): FramingConfig { return this.cfg; }

  /** Adjust verbosity level of internal logger at runtime. */
  setVerbose(level: Verbosity): void { this.log.level = level; }
  getVerbose(): Verbosity            { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Framing
  // ════════════════════════════════════════════════════════════════════════

  frame(input: Source): Span[] {
    const buf = toBytes(input);
    try {
      const spans = frame(buf, this.cfg);
      this.log.log(2, `Framed ${spans.length} element(s) from ${buf.length} bytes`);
      return spans;
    } catch (err) {
      this.report(err);
      throw err;
    }
  }

  safeFrame(input: Source): FrameResult {
    const res = safeFrame(toBytes(input), this.cfg);
    if (!res.ok) this.report(res.error);
    return res;
  }

  iterateSpans(input: Source): Generator<Span, void, undefined> {
    return iterateSpans(toBytes(input), this.cfg);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Views
  // ════════════════════════════════════════════════════════════════════════

  view(buf: Uint8Array, span: Span): ElementView {
    return view(buf, span, this.cfg);
  }

  /**
   * Frame and validate the whole input; throws the first {@link ParseError}.
   */
  decode(input: Source): ElementView[] {
    const buf = toBytes(input);
    const out: ElementView[] = [];
    try {
      for (const el of iterate(buf, this.cfg)) {
        this.log.log(4, `#${out.length} @${el.start} len=${el.length}`);
        out.push(el);
      }
    } catch (err) {
      this.report(err);
      throw err;
    }
    this.log.log(2, `Decoded ${out.length} element(s) from ${buf.length} bytes`);
    return out;
  }

  safeDecode(input: Source): DecodeResult {
    const res = safeDecode(toBytes(input), this.cfg);
    if (!res.ok) this.report(res.error);
    return res;
  }

  iterate(input: Source): Generator<ElementView, void, undefined> {
    return iterate(toBytes(input), this.cfg);
  }

  decodeText(input: Source): string[] {
    return this.decode(input).map(el => el.text);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Encoding
  // ════════════════════════════════════════════════════════════════════════

  encode(elements: Iterable<Element>): Uint8Array {
    const out = encode(elements, this.cfg);
    this.log.log(2, `Encoded ${out.length} bytes`);
    return out;
  }

  encodeElement(el: Element): Uint8Array {
    return encodeElement(el, this.cfg);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PRIVATE
  // ════════════════════════════════════════════════════════════════════════

  private report(err: unknown): void {
    if (err instanceof ParseError) {
      this.log.log(1, `${err.kind} at offset ${err.offset}`);
    }
  }
}

export { frame, safeFrame, iterateSpans }          from './framer/framer.js';
export { view, decode, safeDecode, iterate, decodeText } from './view/builder.js';
export type { DecodeResult }                       from './view/builder.js';
export { encode, encodeElement }                   from './encoder/encoder.js';
export { ElementView }                             from './view/ElementView.js';
export { resolveOptions }                          from './config/options.js';
export { TextRuleRegistry }                        from './config/TextRuleRegistry.js';
export {
  DEFAULT_SEPARATOR,
  DEFAULT_TERMINATOR,
  DEFAULT_MAX_ELEMENT_LENGTH,
  DEFAULT_MAX_ELEMENTS,
}                                                  from './config/defaults.js';
export { createLogger, clampVerbosity }            from './util/logger.js';
export type { Logger, Verbosity }                  from './util/logger.js';
export * from './errors/index.js';
export type * from './types/index.js';
