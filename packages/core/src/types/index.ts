import type { Verbosity } from '../util/logger.js';
import type { ParseError } from '../errors/index.js';

/* ------------------------------ Spans -------------------------------- */

/** Content coordinates of one element, framing bytes excluded. */
export interface Span {
  readonly start  : number;
  readonly length : number;
}

/* ---------------------------- Text rules ----------------------------- */

/**
 * Decides whether an element's bytes are acceptable text and how they read.
 * `validate` returns the index (relative to `bytes`) of the first offending
 * byte, or -1 when the bytes are acceptable.
 */
export interface TextRule {
  readonly name: string;
  validate(bytes: Uint8Array): number;
  decode(bytes: Uint8Array): string;
}

/* --------------------------- Configuration --------------------------- */

/** A framing byte as a number (0…255) or a one-character ASCII string. */
export type FramingByte = number | string;

export interface NelfOptions {
  /** Byte ending the length field; defaults to ':' */
  separator?        : FramingByte;
  /** Byte ending each element; defaults to ',' */
  terminator?       : FramingByte;
  /** Largest accepted element length in bytes */
  maxElementLength? : number;
  /** Largest accepted element count per buffer */
  maxElements?      : number;
  /** Registered text rule name used by `view`/`decode`; defaults to 'utf8' */
  textRule?         : string;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?          : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?           : (msg: string) => void;
}

/** Validated, frozen form of {@link NelfOptions} used by the engine. */
export interface FramingConfig {
  readonly separator        : number;
  readonly terminator       : number;
  readonly maxElementLength : number;
  readonly maxElements      : number;
  readonly textRule         : TextRule;
}

/* ----------------------------- Results ------------------------------- */

export type FrameResult =
  | { ok: true;  spans: Span[] }
  | { ok: false; error: ParseError; spans: Span[] };

export type Source = string | Uint8Array;

export type Element = string | Uint8Array;
