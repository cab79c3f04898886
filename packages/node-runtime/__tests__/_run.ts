import { fileURLToPath } from 'node:url';
import { execa } from 'execa';

export const CLI = fileURLToPath(new URL('../src/cli.ts', import.meta.url));

/* Node runs the TypeScript sources through the tsx loader. */
export const run = (args: string[], input: string | Uint8Array = '') =>
  execa('node', ['--import', 'tsx', CLI, ...args], {
    input,
    reject: false,              // do not throw on exitCode ≠ 0
    stripFinalNewline: false,
  });

/* Same as run, but STDOUT/STDERR come back as raw bytes. */
export const runRaw = (args: string[], input: string | Uint8Array = '') =>
  execa('node', ['--import', 'tsx', CLI, ...args], {
    input,
    reject: false,
    encoding: 'buffer',
  });
