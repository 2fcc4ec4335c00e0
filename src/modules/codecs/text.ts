const ZERO_WIDTH = /[\u200b\u200c\u200d\ufeff]/g;

/** ASCII printable range plus the whitespace a terminal renders. */
const PRINTABLE_WHITESPACE = new Set(['\t', '\n', '\r', '\x0b', '\x0c']);

export const DEFAULT_MIN_PLAIN_LEN = 6;
export const PRINTABLE_THRESHOLD = 0.9;

/**
 * Canonicalise pasted input: NFKC folds full-width and compatibility forms,
 * zero-width characters are dropped, surrounding whitespace trimmed.
 */
export function normalizeInput(value: string): string {
  return value.normalize('NFKC').replace(ZERO_WIDTH, '').trim();
}

export function isPrintableChar(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return (code >= 0x20 && code <= 0x7e) || PRINTABLE_WHITESPACE.has(ch);
}

/** C0 controls and DEL, except the whitespace counted as printable. */
export function isControlChar(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return (code < 0x20 && !PRINTABLE_WHITESPACE.has(ch)) || code === 0x7f;
}

export function isMostlyPrintable(value: string, threshold = PRINTABLE_THRESHOLD): boolean {
  const chars = Array.from(value);
  let good = 0;
  for (const ch of chars) {
    if (isPrintableChar(ch)) good++;
  }
  return good / Math.max(1, chars.length) >= threshold;
}

/** Lenient UTF-8: malformed sequences are dropped rather than replaced. */
export function bytesToUtf8(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('utf8').replace(/\uFFFD/g, '');
}

/**
 * Decoded bytes count as plaintext only when they are long enough once trimmed
 * and mostly printable. Returns the untrimmed text on success.
 */
export function bytesToText(bytes: Uint8Array, minLen = DEFAULT_MIN_PLAIN_LEN): string | undefined {
  const text = bytesToUtf8(bytes);
  if (text.length === 0 || text.trim().length < minLen) {
    return undefined;
  }
  return isMostlyPrintable(text) ? text : undefined;
}
