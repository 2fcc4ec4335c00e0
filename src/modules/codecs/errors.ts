/**
 * Expected decode failure: invalid symbol, bad length, out-of-range group or
 * checksum mismatch. Strategies treat it as "no candidate from this token".
 */
export class DecodeError extends Error {
  readonly encoding: string;

  constructor(encoding: string, message: string) {
    super(`${encoding}: ${message}`);
    this.name = 'DecodeError';
    this.encoding = encoding;
  }
}

/**
 * Run a decoder and map a `DecodeError` to `undefined`. Any other error is a
 * bug in the caller and is rethrown.
 */
export function tryDecode<T>(decode: (input: string) => T, input: string): T | undefined {
  try {
    return decode(input);
  } catch (error) {
    if (error instanceof DecodeError) {
      return undefined;
    }
    throw error;
  }
}
