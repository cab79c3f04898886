// packages/core/src/view/builder.ts
import { configOf } from '../config/options.js';
import { iterateSpans } from '../framer/framer.js';
import { ElementView } from './ElementView.js';
import { InvalidEncodingError, ParseError } from '../errors/index.js';
import type { FramingConfig, NelfOptions, Span } from '../types/index.js';

export type DecodeResult =
  | { ok: true;  elements: ElementView[] }
  | { ok: false; error: ParseError; elements: ElementView[] };

/**
 * Bind `span` to `buf` as an {@link ElementView}, validating its bytes under
 * the configured text rule.
 *
 * A span that does not lie inside `buf` did not come from `frame(buf)`; that
 * is a caller bug and raises a RangeError rather than a ParseError.
 */
export function view(
  buf : Uint8Array,
  span: Span,
  opt?: NelfOptions | FramingConfig,
): ElementView {
  const { textRule } = configOf(opt);
  const { start, length } = span;

  if (!Number.isInteger(start) || !Number.isInteger(length) ||
      start < 0 || length < 0 || start + length > buf.length) {
    throw new RangeError(`Span [${start}, +${length}) outside buffer of ${buf.length} bytes`);
  }

  const bytes = buf.subarray(start, start + length);
  const bad   = textRule.validate(bytes);
  if (bad >= 0) throw new InvalidEncodingError(start + bad, textRule.name);

  return new ElementView(buf, span, textRule);
}

/** Lazily frame and view `buf`, one element at a time. */
export function* iterate(
  buf : Uint8Array,
  opt?: NelfOptions | FramingConfig,
): Generator<ElementView, void, undefined> {
  const cfg = configOf(opt);
  for (const span of iterateSpans(buf, cfg)) yield view(buf, span, cfg);
}

/** Every element of `buf`, stopping at the first framing or text error. */
export function decode(buf: Uint8Array, opt?: NelfOptions | FramingConfig): ElementView[] {
  return [...iterate(buf, opt)];
}

/** {@link decode} reporting malformed input as a value with the valid prefix. */
export function safeDecode(buf: Uint8Array, opt?: NelfOptions | FramingConfig): DecodeResult {
  const elements: ElementView[] = [];
  try {
    for (const el of iterate(buf, opt)) elements.push(el);
    return { ok: true, elements };
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err, elements };
    throw err;
  }
}

export function decodeText(buf: Uint8Array, opt?: NelfOptions | FramingConfig): string[] {
  return decode(buf, opt).map(el => el.text);
}
