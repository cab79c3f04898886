import { ParseError } from '../../src/errors/index.js';

const enc = new TextEncoder();

/** UTF-8 bytes of `s`. */
export const b = (s: string): Uint8Array => enc.encode(s);

/** Bytes of `parts`, strings UTF-8 encoded, numbers taken as raw bytes. */
export function bytesOf(...parts: Array<string | number>): Uint8Array {
  const out: number[] = [];
  for (const p of parts) {
    if (typeof p === 'number') out.push(p);
    else out.push(...enc.encode(p));
  }
  return Uint8Array.from(out);
}

export const text = (u8: Uint8Array): string => new TextDecoder().decode(u8);

/** The ParseError thrown by `fn`; fails the test when nothing (or something else) is thrown. */
export function parseErrorOf(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}
