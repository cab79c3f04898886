// packages/node-runtime/src/io.ts
import { existsSync, accessSync, constants as fsConstants, realpathSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { stdin } from 'node:process';
import { dirname, resolve, sep, isAbsolute } from 'node:path';
import { FilesystemError } from '../../core/src/errors/index.js';

const DEFAULT_ROOT = process.cwd();

/** 1 GiB unless NELF_STDIN_MAX_BYTES says otherwise. */
export function stdinLimit(env: NodeJS.ProcessEnv = process.env): number {
  const envLimit = Number(env.NELF_STDIN_MAX_BYTES);
  return Number.isFinite(envLimit) && envLimit > 0
    ? Math.floor(envLimit)
    : 1024 * 1024 * 1024;
}

export async function readAllFromStdin(maxBytes = stdinLimit()): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const c of stdin) {
    const buf = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    total += buf.length;
    if (total > maxBytes) {
      throw new FilesystemError(`STDIN exceeds maximum allowed size (${maxBytes} bytes). Aborting.`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

/** Whole file or STDIN (`-` / omitted) as one buffer. */
export async function readSource(src?: string): Promise<Uint8Array> {
  if (!src || src === '-') return readAllFromStdin();
  if (!existsSync(src)) throw new FilesystemError(`Input file not found: ${src}`);
  return readFile(src);
}

const LF = 0x0A;
const CR = 0x0D;

/**
 * Split raw bytes on LF into zero-copy line views. A CR right before the LF
 * is dropped, and so is one empty line after a final LF. Line content is
 * never decoded.
 */
export function splitLines(buf: Uint8Array): Uint8Array[] {
  const lines: Uint8Array[] = [];
  let start = 0;
  for (let i = 0; i < buf.length; i++) {
    if (buf[i] !== LF) continue;
    const end = i > start && buf[i - 1] === CR ? i - 1 : i;
    lines.push(buf.subarray(start, end));
    start = i + 1;
  }
  if (start < buf.length) lines.push(buf.subarray(start));
  return lines;
}

/**
 * Resolve `out` and make sure it lands inside `root`, in an existing,
 * writable directory. Returns the absolute path.
 */
export function assertWritable(out: string, root: string = DEFAULT_ROOT): string {
  const absRoot   = realpathSync(root);
  const absOut    = isAbsolute(out) ? resolve(out) : resolve(absRoot, out);
  const targetDir = dirname(absOut);

  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }

  const realTarget = realpathSync(targetDir);
  if (realTarget !== absRoot && !realTarget.startsWith(absRoot + sep)) {
    throw new FilesystemError('Refusing to write outside of root directory.');
  }

  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch {
    throw new FilesystemError('Output directory is not writeable');
  }

  return absOut;
}

/** `-` writes to STDOUT; anything else goes through {@link assertWritable}. */
export async function writeOutput(out: string, data: Uint8Array | string): Promise<void> {
  if (out === '-') {
    await new Promise<void>((res, rej) =>
      process.stdout.write(data, err => (err ? rej(err) : res())),
    );
    return;
  }
  await writeFile(assertWritable(out), data);
}
