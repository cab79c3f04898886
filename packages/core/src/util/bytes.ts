const encoder = new TextEncoder();

export function concat(...chunks: Uint8Array[]): Uint8Array {
  return concatAll(chunks);
}

/** Array form of {@link concat}, safe for more chunks than fit in an argument list. */
export function concatAll(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/** Strings are UTF-8 encoded; byte arrays pass through untouched (no copy). */
export function toBytes(input: string | Uint8Array): Uint8Array {
  if (typeof input === 'string') return encoder.encode(input);
  if (input instanceof Uint8Array) return input;
  throw new TypeError('toBytes: unsupported input type');
}

/* ----------  ASCII decimal  --------------------------------------- */
export const DIGIT_0 = 0x30;
export const DIGIT_9 = 0x39;

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_9;
}

export function decimalBytes(n: number): Uint8Array {
  return encoder.encode(String(n));
}

/* ----------  Renderings  ------------------------------------------ */
export function hexEncode(u8: Uint8Array): string {
  let s = '';
  for (let i = 0; i < u8.length; i++) {
    s += u8[i].toString(16).padStart(2, '0');
  }
  return s;
}

export function base64Encode(...chunks: Uint8Array[]): string {
  const data = concat(...chunks);
  let binary = '';
  for (let i = 0; i < data.length; i++) binary += String.fromCharCode(data[i]);
  return btoa(binary);
}
