import { DecodeError } from './errors.js';

/** RFC 9285 alphabet. Note the space: it is a valid symbol. */
export const BASE45_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:';

const DECODE_TABLE: ReadonlyMap<string, number> = new Map(
  Array.from(BASE45_ALPHABET, (ch, index) => [ch, index] as const)
);

function symbolValue(ch: string): number {
  const value = DECODE_TABLE.get(ch);
  if (value === undefined) {
    throw new DecodeError('base45', `invalid symbol ${JSON.stringify(ch)}`);
  }
  return value;
}

/**
 * Three symbols carry two bytes (little-endian digits, value <= 0xFFFF); a
 * trailing pair carries one byte (value <= 0xFF). A lone trailing symbol is
 * malformed.
 */
export function decodeBase45(input: string): Buffer {
  const values = Array.from(input, symbolValue);
  const out: number[] = [];

  for (let i = 0; i < values.length; ) {
    const remaining = values.length - i;
    const c = values[i] ?? 0;
    const d = values[i + 1] ?? 0;

    if (remaining >= 3) {
      const e = values[i + 2] ?? 0;
      const n = c + d * 45 + e * 45 * 45;
      if (n > 0xffff) {
        throw new DecodeError('base45', `group value ${n} out of range at ${i}`);
      }
      out.push(n >> 8, n & 0xff);
      i += 3;
    } else if (remaining === 2) {
      const n = c + d * 45;
      if (n > 0xff) {
        throw new DecodeError('base45', `trailing value ${n} out of range`);
      }
      out.push(n);
      i += 2;
    } else {
      throw new DecodeError('base45', 'dangling trailing symbol');
    }
  }

  return Buffer.from(out);
}

export function encodeBase45(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < bytes.length; i += 2) {
    const hi = bytes[i] ?? 0;
    if (i + 1 < bytes.length) {
      let n = hi * 256 + (bytes[i + 1] ?? 0);
      for (let k = 0; k < 3; k++) {
        out += BASE45_ALPHABET[n % 45];
        n = Math.floor(n / 45);
      }
    } else {
      out += BASE45_ALPHABET[hi % 45];
      out += BASE45_ALPHABET[Math.floor(hi / 45)];
    }
  }
  return out;
}
