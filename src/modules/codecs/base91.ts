import { DecodeError } from './errors.js';

/** basE91 table: 91 printable ASCII symbols, excluding `-`, `'`, `\` and space. */
export const BASE91_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789' +
  '!#$%&()*+,./:;<=>?@[]^_`{|}~"';

const DECODE_TABLE: ReadonlyMap<string, number> = new Map(
  Array.from(BASE91_ALPHABET, (ch, index) => [ch, index] as const)
);

/**
 * Symbol pairs carry 13 or 14 bits into a bit queue; whole bytes are drained
 * as soon as at least 8 bits are queued. A dangling half pair is flushed as one
 * final byte.
 */
export function decodeBase91(input: string): Buffer {
  const out: number[] = [];
  let value = -1;
  let queue = 0;
  let bits = 0;

  for (const ch of input) {
    const symbol = DECODE_TABLE.get(ch);
    if (symbol === undefined) {
      throw new DecodeError('base91', `invalid symbol ${JSON.stringify(ch)}`);
    }

    if (value < 0) {
      value = symbol;
      continue;
    }

    value += symbol * 91;
    queue |= value << bits;
    bits += (value & 8191) > 88 ? 13 : 14;
    do {
      out.push(queue & 0xff);
      queue >>= 8;
      bits -= 8;
    } while (bits > 7);
    value = -1;
  }

  if (value !== -1) {
    out.push((queue | (value << bits)) & 0xff);
  }

  return Buffer.from(out);
}

export function encodeBase91(bytes: Uint8Array): string {
  let out = '';
  let queue = 0;
  let bits = 0;

  for (const byte of bytes) {
    queue |= byte << bits;
    bits += 8;
    if (bits > 13) {
      let value = queue & 8191;
      if (value > 88) {
        queue >>= 13;
        bits -= 13;
      } else {
        value = queue & 16383;
        queue >>= 14;
        bits -= 14;
      }
      out += BASE91_ALPHABET[value % 91];
      out += BASE91_ALPHABET[Math.floor(value / 91)];
    }
  }

  if (bits > 0) {
    out += BASE91_ALPHABET[queue % 91];
    if (bits > 7 || queue > 90) {
      out += BASE91_ALPHABET[Math.floor(queue / 91)];
    }
  }

  return out;
}
