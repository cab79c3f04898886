// packages/node-runtime/src/index.ts
import { Nelf, type NelfOptions } from '../../core/src/index.js';

/** Nelf instance logging to STDERR, so STDOUT stays free for output. */
export function createNelf(cfg: NelfOptions = {}): Nelf {
  return new Nelf({
    logger: (msg: string) => { process.stderr.write(msg + '\n'); },
    ...cfg,
  });
}

export { Nelf, ElementView } from '../../core/src/index.js';
export { readSource, writeOutput, assertWritable, stdinLimit } from './io.js';
