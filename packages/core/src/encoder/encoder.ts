// packages/core/src/encoder/encoder.ts
import { configOf } from '../config/options.js';
import { concatAll, decimalBytes, toBytes } from '../util/bytes.js';
import { ElementTooLargeError } from '../errors/index.js';
import type { Element, FramingConfig, NelfOptions } from '../types/index.js';

/**
 * Frame `elements` as `<len>SEP<bytes>TERM`, in order. Content is written
 * verbatim; nothing inside an element is ever escaped.
 */
export function encode(
  elements: Iterable<Element>,
  opt?    : NelfOptions | FramingConfig,
): Uint8Array {
  const { separator, terminator, maxElementLength } = configOf(opt);
  const sep  = Uint8Array.of(separator);
  const term = Uint8Array.of(terminator);

  const parts: Uint8Array[] = [];
  let offset = 0;
  let index  = 0;

  for (const el of elements) {
    const bytes = toBytes(el);
    if (bytes.length > maxElementLength) {
      throw new ElementTooLargeError(index, offset, bytes.length, maxElementLength);
    }
    const len = decimalBytes(bytes.length);
    parts.push(len, sep, bytes, term);
    offset += len.length + 1 + bytes.length + 1;
    index++;
  }

  return concatAll(parts);
}

/** A single framed element. */
export function encodeElement(el: Element, opt?: NelfOptions | FramingConfig): Uint8Array {
  return encode([el], opt);
}
