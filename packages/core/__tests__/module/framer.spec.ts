import { frame, safeFrame, iterateSpans } from '../../src/framer/framer.js';
import { b } from './_helper.js';

describe('framer - well-formed input', () => {
  it('frames the reference list, terminator inside content included', () => {
    expect(frame(b('5:hello,0:,3:a,b,'))).toEqual([
      { start: 2,  length: 5 },
      { start: 10, length: 0 },
      { start: 13, length: 3 },
    ]);
  });

  it('returns no spans for an empty buffer', () => {
    expect(frame(new Uint8Array(0))).toEqual([]);
  });

  it('accepts leading zeros in the length field', () => {
    expect(frame(b('003:abc,'))).toEqual([{ start: 4, length: 3 }]);
  });

  it('treats digits and framing bytes inside content as data', () => {
    expect(frame(b('4:1:2,,'))).toEqual([{ start: 2, length: 4 }]);
  });

  it('honours custom framing bytes', () => {
    const opt = { separator: '=', terminator: ';' };
    expect(frame(b('3=a;b;0=;'), opt)).toEqual([
      { start: 2, length: 3 },
      { start: 8, length: 0 },
    ]);
  });

  it('allows separator and terminator to be the same byte', () => {
    expect(frame(b('3,a,b,'), { separator: ',', terminator: ',' }))
      .toEqual([{ start: 2, length: 3 }]);
  });

  it('frames a buffer that is a window into a larger one', () => {
    const whole  = b('junk1:a,');
    const window = whole.subarray(4);
    expect(frame(window)).toEqual([{ start: 2, length: 1 }]);
  });
});

describe('framer - lazy iteration', () => {
  it('yields valid elements before throwing on a later one', () => {
    const gen = iterateSpans(b('1:a,?'));
    expect(gen.next().value).toEqual({ start: 2, length: 1 });
    expect(() => gen.next()).toThrow('Expected a decimal length at offset 4');
  });
});

describe('framer - safeFrame', () => {
  it('reports success with every span', () => {
    expect(safeFrame(b('1:a,'))).toEqual({ ok: true, spans: [{ start: 2, length: 1 }] });
  });

  it('keeps the framed prefix next to the error', () => {
    const res = safeFrame(b('1:a,1:b,x'));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.spans).toEqual([{ start: 2, length: 1 }, { start: 6, length: 1 }]);
    expect(res.error.kind).toBe('MalformedLength');
    expect(res.error.offset).toBe(8);
  });

  it('rethrows configuration problems instead of reporting them', () => {
    expect(() => safeFrame(b('1:a,'), { separator: '7' })).toThrow('separator cannot be a decimal digit');
  });
});
