import { run, runRaw } from './_run.js';

describe('nelf (CLI)', () => {
  it('encodes arguments, empty ones included', async () => {
    const res = await run(['encode', 'hello', '', 'a,b']);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe('5:hello,0:,3:a,b,');
  });

  it('encodes the lines of STDIN when given no arguments', async () => {
    const res = await run(['encode'], 'foo\nbar\n');
    expect(res.stdout).toBe('3:foo,3:bar,');
  });

  it('encodes STDIN lines as raw bytes, CRLF included', async () => {
    const res = await runRaw(['encode'], Uint8Array.of(0x61, 0xFF, 0x0D, 0x0A, 0x62, 0x0A));
    expect(res.exitCode).toBe(0);
    expect([...res.stdout]).toEqual([
      0x32, 0x3A, 0x61, 0xFF, 0x2C,   // 2:a\xFF,
      0x31, 0x3A, 0x62, 0x2C,         // 1:b,
    ]);
  });

  it('decodes STDIN to a JSON array', async () => {
    const res = await run(['decode', '-'], '5:hello,0:,3:a,b,');
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe('["hello","","a,b"]\n');
  });

  it('decodes to lines and base64', async () => {
    expect((await run(['decode', '--format', 'lines', '-'], '1:a,1:b,')).stdout).toBe('a\nb\n');
    expect((await run(['decode', '-f', 'base64'], '2:hi,')).stdout).toBe('aGk=\n');
  });

  it('names the round-trip formats in decode --help', async () => {
    const res = await run(['decode', '--help']);
    expect(res.exitCode).toBe(0);
    expect(res.stdout.replace(/\s+/g, ' ')).toContain(
      'lines is ambiguous when elements hold newlines; json and base64 round-trip',
    );
  });

  it('uses custom framing bytes', async () => {
    const res = await run(['--separator', '=', '--terminator', ';', 'encode', 'a;b']);
    expect(res.stdout).toBe('3=a;b;');
  });

  it('inspects element offsets', async () => {
    const res = await run(['inspect', '-'], '2:ab,0:,');
    expect(res.exitCode).toBe(0);
    expect(JSON.parse(res.stdout)).toEqual({
      count: 2,
      bytes: 8,
      elements: [
        { index: 0, start: 2, length: 2 },
        { index: 1, start: 7, length: 0 },
      ],
    });
  });

  it('logs to STDERR when verbose', async () => {
    const res = await run(['-vv', 'decode', '-'], '1:a,');
    expect(res.stdout).toBe('["a"]\n');
    expect(res.stderr).toBe('2| [nelf] Decoded 1 element(s) from 4 bytes\n');
  });
});

describe('nelf (CLI) - diagnostics', () => {
  it('reports a malformed length with exit code 1', async () => {
    const res = await run(['decode', '-'], 'x:abc,');
    expect(res.exitCode).toBe(1);
    expect(res.stdout).toBe('');
    expect(res.stderr).toBe('Error [MalformedLengthError]: Expected a decimal length at offset 0\n');
  });

  it('reports truncated content at the content start', async () => {
    const res = await run(['decode', '-'], '3:ab');
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe(
      'Error [TruncatedContentError]: Declared length 3 runs past end of input (2 bytes left) at offset 2\n',
    );
  });

  it('enforces --max-elements', async () => {
    const res = await run(['--max-elements', '1', 'decode', '-'], '1:a,1:b,');
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe('Error [ElementLimitExceededError]: More than 1 elements at offset 4\n');
  });

  it('accepts --max-length 0', async () => {
    const empty = await run(['--max-length', '0', 'encode', '']);
    expect(empty.exitCode).toBe(0);
    expect(empty.stdout).toBe('0:,');

    const tooLarge = await run(['--max-length', '0', 'encode', 'a']);
    expect(tooLarge.exitCode).toBe(1);
    expect(tooLarge.stderr).toBe(
      'Error [ElementTooLargeError]: Element 0 is 1 bytes, maximum is 0 at offset 0\n',
    );
  });

  it('validates UTF-8 unless --text-rule none', async () => {
    const bad = Uint8Array.of(0x31, 0x3A, 0xFF, 0x2C);

    const strict = await run(['decode', '-'], bad);
    expect(strict.exitCode).toBe(1);
    expect(strict.stderr).toBe('Error [InvalidEncodingError]: Content is not valid utf8 at offset 2\n');

    const lenient = await run(['--text-rule', 'none', 'decode', '-'], bad);
    expect(lenient.exitCode).toBe(0);
    expect(JSON.parse(lenient.stdout)).toEqual(['\uFFFD']);
  });

  it('rejects a digit as framing byte', async () => {
    const res = await run(['--separator', '5', 'encode', 'a']);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe('Error [ConfigError]: separator cannot be a decimal digit\n');
  });
});
