import { createHash } from 'node:crypto';
import { DecodeError } from './errors.js';

export const BASE58_ALPHABETS = {
  bitcoin: '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz',
  ripple: 'rpshnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCg65jkm8oFqi1tuvAxyz',
  flickr: '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ',
} as const;

export type Base58AlphabetName = keyof typeof BASE58_ALPHABETS;

export const BASE58_ALPHABET_NAMES = ['bitcoin', 'ripple', 'flickr'] as const satisfies readonly Base58AlphabetName[];

const CHECKSUM_LENGTH = 4;

const tableCache = new Map<string, ReadonlyMap<string, bigint>>();

function decodeTable(alphabet: string): ReadonlyMap<string, bigint> {
  let table = tableCache.get(alphabet);
  if (!table) {
    table = new Map(Array.from(alphabet, (ch, index) => [ch, BigInt(index)] as const));
    tableCache.set(alphabet, table);
  }
  return table;
}

/**
 * Positional big-integer decode. Each leading "zero" symbol (the alphabet's
 * first character) becomes a leading 0x00 byte.
 */
export function decodeBase58(input: string, alphabet: string = BASE58_ALPHABETS.bitcoin): Buffer {
  if (input.length === 0) {
    return Buffer.alloc(0);
  }

  const table = decodeTable(alphabet);
  let num = 0n;
  for (const ch of input) {
    const digit = table.get(ch);
    if (digit === undefined) {
      throw new DecodeError('base58', `invalid symbol ${JSON.stringify(ch)}`);
    }
    num = num * 58n + digit;
  }

  const body: number[] = [];
  while (num > 0n) {
    body.push(Number(num & 0xffn));
    num >>= 8n;
  }
  body.reverse();

  let zeros = 0;
  while (zeros < input.length && input[zeros] === alphabet[0]) {
    zeros++;
  }

  return Buffer.concat([Buffer.alloc(zeros), Buffer.from(body)]);
}

export function encodeBase58(bytes: Uint8Array, alphabet: string = BASE58_ALPHABETS.bitcoin): string {
  let zeros = 0;
  while (zeros < bytes.length && bytes[zeros] === 0) {
    zeros++;
  }

  let num = 0n;
  for (const byte of bytes) {
    num = (num << 8n) | BigInt(byte);
  }

  let body = '';
  while (num > 0n) {
    body = alphabet.charAt(Number(num % 58n)) + body;
    num /= 58n;
  }

  return alphabet.charAt(0).repeat(zeros) + body;
}

function doubleSha256(payload: Uint8Array): Buffer {
  const first = createHash('sha256').update(payload).digest();
  return createHash('sha256').update(first).digest();
}

export function base58Checksum(payload: Uint8Array): Buffer {
  return doubleSha256(payload).subarray(0, CHECKSUM_LENGTH);
}

export interface Base58CheckResult {
  valid: boolean;
  payload: Buffer;
}

/**
 * Split `[payload][4-byte checksum]` and verify the checksum against the first
 * four bytes of SHA-256(SHA-256(payload)). Fewer than five bytes never verify.
 */
export function verifyBase58Check(raw: Uint8Array): Base58CheckResult {
  const bytes = Buffer.from(raw);
  if (bytes.length <= CHECKSUM_LENGTH) {
    return { valid: false, payload: bytes };
  }
  const payload = bytes.subarray(0, bytes.length - CHECKSUM_LENGTH);
  const checksum = bytes.subarray(bytes.length - CHECKSUM_LENGTH);
  return { valid: checksum.equals(base58Checksum(payload)), payload };
}

/** Decode and strip a verified checksum; a mismatch is a decode failure. */
export function decodeBase58Check(input: string, alphabet: string = BASE58_ALPHABETS.bitcoin): Buffer {
  const { valid, payload } = verifyBase58Check(decodeBase58(input, alphabet));
  if (!valid) {
    throw new DecodeError('base58check', 'checksum mismatch');
  }
  return payload;
}

export function encodeBase58Check(payload: Uint8Array, alphabet: string = BASE58_ALPHABETS.bitcoin): string {
  return encodeBase58(Buffer.concat([Buffer.from(payload), base58Checksum(payload)]), alphabet);
}
