// packages/core/src/util/utf8.ts

/**
 * Index of the first byte of the first ill-formed UTF-8 sequence in `u8`,
 * or -1 when the whole array is well formed. Overlong forms, surrogates and
 * code points above U+10FFFF are ill formed.
 */
export function firstInvalidUtf8(u8: Uint8Array): number {
  const n = u8.length;
  let i = 0;

  while (i < n) {
    const b = u8[i];
    if (b < 0x80) { i++; continue; }

    let need: number;
    let lo = 0x80;
    let hi = 0xBF;

    if (b >= 0xC2 && b <= 0xDF)       need = 1;
    else if (b === 0xE0)              { need = 2; lo = 0xA0; }
    else if (b === 0xED)              { need = 2; hi = 0x9F; }
    else if (b >= 0xE1 && b <= 0xEF)  need = 2;
    else if (b === 0xF0)              { need = 3; lo = 0x90; }
    else if (b === 0xF4)              { need = 3; hi = 0x8F; }
    else if (b >= 0xF1 && b <= 0xF3)  need = 3;
    else return i;

    if (i + need >= n) return i;   // sequence cut short

    // only the second byte has a narrowed range
    const second = u8[i + 1];
    if (second < lo || second > hi) return i;
    for (let k = 2; k <= need; k++) {
      const c = u8[i + k];
      if (c < 0x80 || c > 0xBF) return i;
    }
    i += need + 1;
  }
  return -1;
}
