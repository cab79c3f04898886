#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, Option } from 'commander';
import { stderr } from 'node:process';
import { createNelf } from './index.js';
import { readSource, splitLines, writeOutput } from './io.js';
import { clampVerbosity, type Element, type NelfOptions } from '../../core/src/index.js';

const PKG_VERSION = '0.3.0'; // sync with root package.json

type OutputFormat = 'json' | 'lines' | 'base64';

type GlobalOptions = {
  separator   : string;
  terminator  : string;
  maxLength?  : number;
  maxElements?: number;
  textRule    : string;
  verbose     : number;
};

function nonNegativeInt(label: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new Error(`${label} must be a non-negative integer`);
    }
    return n;
  };
}

function fail(err: unknown): void {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('nelf')
  .version(PKG_VERSION)
  .description(
    'Encode and decode length-prefixed string lists (no escaping needed)\n' +
    'Element: <length>:<content>,',
  )

  .addOption(
    new Option('--separator <char>', 'byte ending the length field')
      .default(':')
  )
  .addOption(
    new Option('--terminator <char>', 'byte ending each element')
      .default(',')
  )
  .addOption(
    new Option('--max-length <bytes>', 'largest accepted element length')
      .argParser(nonNegativeInt('Max length'))
  )
  .addOption(
    new Option('--max-elements <count>', 'largest accepted element count')
      .argParser(nonNegativeInt('Max elements'))
  )
  .addOption(
    new Option('-t, --text-rule <rule>', 'text validity rule for decoded elements')
      .choices(['utf8', 'none'] as const)
      .default('utf8')
  )

  // verbosity (repeatable)
  .addOption(
    new Option('-v, --verbose', 'increase verbosity (use multiple times)')
      .default(0)
      .argParser((_: string, previous: number) => previous + 1)
  );

function nelfFromOptions() {
  const opts = program.opts<GlobalOptions>();
  const cfg: NelfOptions = {
    separator        : opts.separator,
    terminator       : opts.terminator,
    maxElementLength : opts.maxLength,
    maxElements      : opts.maxElements,
    textRule         : opts.textRule,
    verbose          : clampVerbosity(opts.verbose),
  };
  return createNelf(cfg);
}

/* ------------------------------------------------------------------ */
/*  decode                                                             */
/* ------------------------------------------------------------------ */
program
  .command('decode [src]')
  .description('Decode a list; omit arg or use - to read from STDIN')
  .addOption(
    new Option('-f, --format <format>', 'output format (lines is ambiguous when elements hold newlines; json and base64 round-trip)')
      .choices(['json', 'lines', 'base64'] as const)
      .default('json')
  )
  .action(async (src: string | undefined, cmd: { format: OutputFormat }) => {
    const nelf     = nelfFromOptions();
    const elements = nelf.decode(await readSource(src));

    let out: string;
    switch (cmd.format) {
      case 'lines':
        out = elements.map(e => e.text + '\n').join('');
        break;
      case 'base64':
        out = elements.map(e => e.base64 + '\n').join('');
        break;
      case 'json':
      default:
        out = JSON.stringify(elements.map(e => e.text)) + '\n';
    }
    await writeOutput('-', out);
  });

/* ------------------------------------------------------------------ */
/*  encode                                                             */
/* ------------------------------------------------------------------ */
program
  .command('encode [items...]')
  .description('Encode arguments; without arguments encode the lines of STDIN')
  .option('-o, --out <file>', 'output file (default STDOUT)', '-')
  .action(async (items: string[], cmd: { out: string }) => {
    const nelf = nelfFromOptions();

    const elements: Element[] = items.length > 0
      ? items
      : splitLines(await readSource('-'));

    await writeOutput(cmd.out, nelf.encode(elements));
  });

/* ------------------------------------------------------------------ */
/*  inspect                                                            */
/* ------------------------------------------------------------------ */
program
  .command('inspect [src]')
  .description('Show element offsets and lengths without text validation')
  .action(async (src?: string) => {
    const nelf  = nelfFromOptions();
    const buf   = await readSource(src);
    const spans = nelf.frame(buf);

    const meta = {
      count    : spans.length,
      bytes    : buf.length,
      elements : spans.map((s, index) => ({ index, start: s.start, length: s.length })),
    };
    await writeOutput('-', JSON.stringify(meta, null, 2) + '\n');
  });

program.parseAsync().catch(fail);
