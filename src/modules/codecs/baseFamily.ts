import { DecodeError, tryDecode } from './errors.js';

export type BaseFamilyEncoding = 'hex' | 'base64' | 'base64url' | 'base32' | 'ascii85' | 'base85';

export const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
export const BASE85_ALPHABET =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz!#$%&()*+-;<=>?@^_`{|}~';

const BASE64_STD_RE = /^[A-Za-z0-9+/]*={0,2}$/;
const BASE64_URL_RE = /^[A-Za-z0-9\-_]*={0,2}$/;
const BASE32_RE = /^[A-Z2-7]*={0,6}$/;
const HEX_RE = /^[0-9a-fA-F]*$/;

const BASE32_VALID_PADDING = new Set([0, 1, 3, 4, 6]);
const BASE85_TABLE: ReadonlyMap<string, number> = new Map(
  Array.from(BASE85_ALPHABET, (ch, index) => [ch, index] as const)
);
const MAX_GROUP = 0xffffffff;

/** Pad with `=` up to the next multiple of `block`. */
export function autopad(value: string, block: number): string {
  const missing = (block - (value.length % block)) % block;
  return missing === 0 ? value : value + '='.repeat(missing);
}

export function decodeHex(input: string): Buffer {
  if (!HEX_RE.test(input) || input.length % 2 !== 0) {
    throw new DecodeError('hex', 'expected an even number of hex digits');
  }
  return Buffer.from(input, 'hex');
}

export function decodeBase64(input: string): Buffer {
  const padded = autopad(input, 4);
  if (!BASE64_STD_RE.test(padded)) {
    throw new DecodeError('base64', 'symbol outside the standard alphabet or misplaced padding');
  }
  return Buffer.from(padded, 'base64');
}

export function decodeBase64Url(input: string): Buffer {
  const padded = autopad(input, 4);
  if (!BASE64_URL_RE.test(padded)) {
    throw new DecodeError('base64url', 'symbol outside the URL-safe alphabet or misplaced padding');
  }
  return Buffer.from(padded.replace(/=+$/, ''), 'base64url');
}

export function decodeBase32(input: string): Buffer {
  const padded = autopad(input, 8);
  if (!BASE32_RE.test(padded)) {
    throw new DecodeError('base32', 'symbol outside the RFC 4648 alphabet');
  }
  const body = padded.replace(/=+$/, '');
  if (!BASE32_VALID_PADDING.has(padded.length - body.length)) {
    throw new DecodeError('base32', 'incorrect padding');
  }

  const out: number[] = [];
  let buffer = 0;
  let bits = 0;
  for (const ch of body) {
    buffer = (buffer << 5) | BASE32_ALPHABET.indexOf(ch);
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out.push((buffer >> bits) & 0xff);
      buffer &= (1 << bits) - 1;
    }
  }
  return Buffer.from(out);
}

function pushGroup(out: number[], value: number, count: number, encoding: string): void {
  if (value > MAX_GROUP) {
    throw new DecodeError(encoding, 'group value exceeds 32 bits');
  }
  const bytes = [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
  out.push(...bytes.slice(0, count));
}

function foldDigits(digits: readonly number[]): number {
  return digits.reduce((acc, digit) => acc * 85 + digit, 0);
}

/**
 * Shared 5-symbol group decoder. A short final group is padded with the highest
 * digit and yields one byte fewer than its symbol count; a single leftover
 * symbol is malformed.
 */
function decodeGroups(
  symbols: Iterable<number | 'zero'>,
  encoding: string,
): Buffer {
  const out: number[] = [];
  let group: number[] = [];

  for (const symbol of symbols) {
    if (symbol === 'zero') {
      if (group.length !== 0) {
        throw new DecodeError(encoding, "'z' inside a group");
      }
      out.push(0, 0, 0, 0);
      continue;
    }
    group.push(symbol);
    if (group.length === 5) {
      pushGroup(out, foldDigits(group), 4, encoding);
      group = [];
    }
  }

  if (group.length === 1) {
    throw new DecodeError(encoding, 'dangling trailing symbol');
  }
  if (group.length > 1) {
    const count = group.length - 1;
    while (group.length < 5) group.push(84);
    pushGroup(out, foldDigits(group), count, encoding);
  }

  return Buffer.from(out);
}

export function decodeAscii85(input: string): Buffer {
  let body = input;
  if (body.startsWith('<~')) body = body.slice(2);
  if (body.endsWith('~>')) body = body.slice(0, -2);

  const symbols = Array.from(body, (ch): number | 'zero' => {
    if (ch === 'z') return 'zero';
    const code = ch.charCodeAt(0);
    if (code < 33 || code > 117) {
      throw new DecodeError('ascii85', `invalid symbol ${JSON.stringify(ch)}`);
    }
    return code - 33;
  });
  return decodeGroups(symbols, 'ascii85');
}

export function decodeBase85(input: string): Buffer {
  const symbols = Array.from(input, (ch) => {
    const value = BASE85_TABLE.get(ch);
    if (value === undefined) {
      throw new DecodeError('base85', `invalid symbol ${JSON.stringify(ch)}`);
    }
    return value;
  });
  return decodeGroups(symbols, 'base85');
}

export interface BaseFamilyDecoder {
  readonly encoding: BaseFamilyEncoding;
  decode(input: string): Buffer;
}

/** Attempt order when a token is tried under every member of the family. */
export const BASE_FAMILY_DECODERS: readonly BaseFamilyDecoder[] = [
  { encoding: 'hex', decode: decodeHex },
  { encoding: 'base64', decode: decodeBase64 },
  { encoding: 'base64url', decode: decodeBase64Url },
  { encoding: 'base32', decode: decodeBase32 },
  { encoding: 'ascii85', decode: decodeAscii85 },
  { encoding: 'base85', decode: decodeBase85 },
];

export interface DecodedVariant {
  encoding: BaseFamilyEncoding;
  bytes: Buffer;
}

/**
 * Try every family member independently. A token can legitimately decode
 * under several of them; each success is returned.
 */
export function decodeAllBaseFamily(input: string): DecodedVariant[] {
  const results: DecodedVariant[] = [];
  if (input.length === 0) {
    return results;
  }
  for (const decoder of BASE_FAMILY_DECODERS) {
    const bytes = tryDecode(decoder.decode, input);
    if (bytes) {
      results.push({ encoding: decoder.encoding, bytes });
    }
  }
  return results;
}

export function encodeBase32(bytes: Uint8Array): string {
  let out = '';
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      out += BASE32_ALPHABET[(buffer >> bits) & 31];
    }
    buffer &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += BASE32_ALPHABET[(buffer << (5 - bits)) & 31];
  }
  return autopad(out, 8);
}

function encodeGroups(bytes: Uint8Array, alphabet: (digit: number) => string, zeroShortcut: boolean): string {
  let out = '';
  for (let i = 0; i < bytes.length; i += 4) {
    const chunk = Array.from(bytes.subarray(i, i + 4));
    const count = chunk.length;
    while (chunk.length < 4) chunk.push(0);
    let value = ((chunk[0] ?? 0) * 2 ** 24) + ((chunk[1] ?? 0) << 16) + ((chunk[2] ?? 0) << 8) + (chunk[3] ?? 0);

    if (zeroShortcut && count === 4 && value === 0) {
      out += 'z';
      continue;
    }

    const digits: string[] = [];
    for (let k = 0; k < 5; k++) {
      digits.unshift(alphabet(value % 85));
      value = Math.floor(value / 85);
    }
    out += digits.slice(0, count + 1).join('');
  }
  return out;
}

export function encodeAscii85(bytes: Uint8Array): string {
  return encodeGroups(bytes, (digit) => String.fromCharCode(digit + 33), true);
}

export function encodeBase85(bytes: Uint8Array): string {
  return encodeGroups(bytes, (digit) => BASE85_ALPHABET[digit] ?? '', false);
}
