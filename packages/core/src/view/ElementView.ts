// packages/core/src/view/ElementView.ts
import { base64Encode, hexEncode } from '../util/bytes.js';
import type { Span, TextRule } from '../types/index.js';

/**
 * One decoded element, borrowing from the source buffer.
 *
 * The view keeps a reference to the buffer it was framed from and never
 * copies it: mutating that buffer afterwards changes what the view reads.
 * Callers that need to keep an element past the buffer's lifetime take
 * `copy()`.
 */
export class ElementView implements Span {
  readonly start  : number;
  readonly length : number;

  readonly #source : Uint8Array;
  readonly #rule   : TextRule;
  #text?: string;

  constructor(source: Uint8Array, span: Span, rule: TextRule) {
    this.#source = source;
    this.start   = span.start;
    this.length  = span.length;
    this.#rule   = rule;
  }

  /** Zero-copy bytes of the element (do NOT mutate). */
  get bytes(): Uint8Array {
    return this.#source.subarray(this.start, this.start + this.length);
  }

  /** Element read under the text rule it was validated with. */
  get text(): string {
    this.#text ??= this.#rule.decode(this.bytes);
    return this.#text;
  }

  get hex(): string    { return hexEncode(this.bytes); }
  get base64(): string { return base64Encode(this.bytes); }

  /** Owned copy, independent of the source buffer. */
  copy(): Uint8Array { return this.bytes.slice(); }

  equals(other: string | Uint8Array): boolean {
    if (typeof other === 'string') return this.text === other;
    if (other.length !== this.length) return false;
    const own = this.bytes;
    for (let i = 0; i < own.length; i++) if (own[i] !== other[i]) return false;
    return true;
  }

  toString(): string { return this.text; }
  toJSON(): string   { return this.text; }
}
