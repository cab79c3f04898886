import { TextRuleRegistry } from './TextRuleRegistry.js';
import { firstInvalidUtf8 } from '../util/utf8.js';
import type { TextRule } from '../types/index.js';

export const DEFAULT_SEPARATOR  = 0x3A;   // ':'
export const DEFAULT_TERMINATOR = 0x2C;   // ','

/** Largest length a decimal field may carry and still be an exact JS number. */
export const DEFAULT_MAX_ELEMENT_LENGTH = Number.MAX_SAFE_INTEGER;
export const DEFAULT_MAX_ELEMENTS       = Number.POSITIVE_INFINITY;

export const DEFAULT_TEXT_RULE = 'utf8';

// BOM must survive decoding, otherwise a leading U+FEFF would not round-trip
const strict  = new TextDecoder('utf-8', { fatal: true,  ignoreBOM: true });
const lenient = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

const utf8: TextRule = {
  name: 'utf8',
  validate: firstInvalidUtf8,
  decode: bytes => strict.decode(bytes),
};

TextRuleRegistry.register(utf8);

/** Skips validation; ill-formed sequences read as U+FFFD. */
const none: TextRule = {
  name: 'none',
  validate: () => -1,
  decode: bytes => lenient.decode(bytes),
};

TextRuleRegistry.register(none);
