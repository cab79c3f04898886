// packages/core/src/framer/framer.ts
import { configOf } from '../config/options.js';
import { DIGIT_0, isDigit } from '../util/bytes.js';
import {
  ElementLimitExceededError,
  LengthOverflowError,
  MalformedLengthError,
  MissingSeparatorError,
  MissingTerminatorError,
  ParseError,
  TruncatedContentError,
} from '../errors/index.js';
import type { FrameResult, FramingConfig, NelfOptions, Span } from '../types/index.js';

/**
 * Walk `buf` element by element:
 *
 *   element := digit+ SEP content TERM
 *
 * Every span is bounds-checked before it is yielded, and the generator throws
 * a {@link ParseError} at the first malformed element, after every valid
 * element before it has been yielded.
 */
export function* iterateSpans(
  buf : Uint8Array,
  opt?: NelfOptions | FramingConfig,
): Generator<Span, void, undefined> {
  const { separator, terminator, maxElementLength, maxElements } = configOf(opt);
  const end = buf.length;
  let cursor = 0;
  let count  = 0;

  while (cursor < end) {
    if (count >= maxElements) throw new ElementLimitExceededError(cursor, maxElements);

    /* (a) length digits */
    let pos    = cursor;
    let length = 0;
    while (pos < end && isDigit(buf[pos])) {
      const d = buf[pos] - DIGIT_0;
      if (length > Math.floor((maxElementLength - d) / 10)) {
        throw new LengthOverflowError(pos, maxElementLength);
      }
      length = length * 10 + d;
      pos++;
    }
    if (pos === cursor) throw new MalformedLengthError(cursor);

    /* (b) separator */
    if (pos === end || buf[pos] !== separator) throw new MissingSeparatorError(pos);
    const start = pos + 1;

    /* (c) content */
    const contentEnd = start + length;
    if (contentEnd > end) throw new TruncatedContentError(start, length, end - start);

    /* (d) terminator */
    if (contentEnd === end || buf[contentEnd] !== terminator) {
      throw new MissingTerminatorError(contentEnd);
    }

    yield { start, length };
    count++;

    cursor = contentEnd + 1;
  }
}

/** All spans of `buf` in document order; throws at the first malformed element. */
export function frame(buf: Uint8Array, opt?: NelfOptions | FramingConfig): Span[] {
  return [...iterateSpans(buf, opt)];
}

/**
 * Like {@link frame} but reports malformed input as a value, together with
 * the spans framed before the error.
 */
export function safeFrame(buf: Uint8Array, opt?: NelfOptions | FramingConfig): FrameResult {
  const spans: Span[] = [];
  try {
    for (const span of iterateSpans(buf, opt)) spans.push(span);
    return { ok: true, spans };
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err, spans };
    throw err;
  }
}
