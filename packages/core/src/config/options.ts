// packages/core/src/config/options.ts
import {
  DEFAULT_MAX_ELEMENTS,
  DEFAULT_MAX_ELEMENT_LENGTH,
  DEFAULT_SEPARATOR,
  DEFAULT_TERMINATOR,
  DEFAULT_TEXT_RULE,
} from './defaults.js';
import { TextRuleRegistry } from './TextRuleRegistry.js';
import { ConfigError } from '../errors/index.js';
import { isDigit } from '../util/bytes.js';
import type { FramingByte, FramingConfig, NelfOptions } from '../types/index.js';

export function toFramingByte(v: FramingByte, label: string): number {
  let byte: number;
  if (typeof v === 'string') {
    if (v.length !== 1 || v.charCodeAt(0) > 0x7F) {
      throw new ConfigError(`${label} must be a single ASCII character, got '${v}'`);
    }
    byte = v.charCodeAt(0);
  } else {
    byte = v;
  }

  if (!Number.isInteger(byte) || byte < 0 || byte > 0xFF) {
    throw new ConfigError(`${label} must be a byte value (0-255), got ${String(v)}`);
  }
  // a digit would be swallowed by the length field
  if (isDigit(byte)) {
    throw new ConfigError(`${label} cannot be a decimal digit`);
  }
  return byte;
}

function checkMaxLength(n: number): number {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new ConfigError(`Invalid maxElementLength: ${n}. Must be a non-negative safe integer.`);
  }
  return n;
}

function checkMaxElements(n: number): number {
  if (n === Number.POSITIVE_INFINITY) return n;
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new ConfigError(`Invalid maxElements: ${n}. Must be a non-negative integer or Infinity.`);
  }
  return n;
}

/** Validate user options once; the engine only ever sees the result. */
export function resolveOptions(opt: NelfOptions = {}): FramingConfig {
  const textRule = opt.textRule ?? DEFAULT_TEXT_RULE;
  if (!TextRuleRegistry.has(textRule)) {
    throw new ConfigError(
      `Unknown text rule '${textRule}'. Known: ${TextRuleRegistry.names().join(', ')}`,
    );
  }

  return Object.freeze({
    separator        : toFramingByte(opt.separator  ?? DEFAULT_SEPARATOR,  'separator'),
    terminator       : toFramingByte(opt.terminator ?? DEFAULT_TERMINATOR, 'terminator'),
    maxElementLength : checkMaxLength(opt.maxElementLength ?? DEFAULT_MAX_ELEMENT_LENGTH),
    maxElements      : checkMaxElements(opt.maxElements ?? DEFAULT_MAX_ELEMENTS),
    textRule         : TextRuleRegistry.get(textRule),
  });
}

let defaultConfig: FramingConfig | undefined;

/** Shared default configuration, resolved on first use. */
export function defaults(): FramingConfig {
  defaultConfig ??= resolveOptions();
  return defaultConfig;
}

/** Accept either raw options or an already resolved configuration. */
export function configOf(opt?: NelfOptions | FramingConfig): FramingConfig {
  if (opt === undefined) return defaults();
  if (isFramingConfig(opt)) return opt;
  return resolveOptions(opt);
}

function isFramingConfig(v: NelfOptions | FramingConfig): v is FramingConfig {
  return typeof v.textRule === 'object' && Object.isFrozen(v);
}
