import { describe, expect, it } from 'vitest';
import {
  autopad,
  decodeAllBaseFamily,
  decodeAscii85,
  decodeBase32,
  decodeBase64,
  decodeBase64Url,
  decodeBase85,
  decodeHex,
  encodeAscii85,
  encodeBase32,
  encodeBase85,
} from '../../../src/modules/codecs/baseFamily.js';
import { DecodeError } from '../../../src/modules/codecs/errors.js';

describe('autopad', () => {
  it('pads to the next block boundary', () => {
    expect(autopad('abc', 4)).toBe('abc=');
    expect(autopad('abcd', 4)).toBe('abcd');
    expect(autopad('MZXW6YTBOI', 8)).toBe('MZXW6YTBOI======');
  });
});

describe('base64', () => {
  it('decodes with missing padding restored', () => {
    expect(decodeBase64('SGVsbG8sIFdvcmxkIQ').toString()).toBe('Hello, World!');
  });

  it('rejects url-safe symbols in the standard alphabet', () => {
    expect(() => decodeBase64('ab-_')).toThrow(DecodeError);
  });

  it('decodes url-safe symbols with the url alphabet', () => {
    expect([...decodeBase64Url('-_-_')]).toEqual([0xfb, 0xff, 0xbf]);
  });
});

describe('base32', () => {
  it('decodes RFC 4648 text with or without padding', () => {
    expect(decodeBase32('MZXW6YTBOI======').toString()).toBe('foobar');
    expect(decodeBase32('MZXW6YTBOI').toString()).toBe('foobar');
    expect(encodeBase32(Buffer.from('foobar'))).toBe('MZXW6YTBOI======');
  });

  it('rejects impossible padding lengths', () => {
    expect(() => decodeBase32('MZXW6Y=')).toThrow('incorrect padding');
  });
});

describe('hex', () => {
  it('needs an even number of digits', () => {
    expect(decodeHex('68690a').toString()).toBe('hi\n');
    expect(() => decodeHex('686')).toThrow(DecodeError);
  });

  it('accepts the empty string like the other decoders', () => {
    expect(decodeHex('')).toHaveLength(0);
    expect(() => decodeHex('6g')).toThrow(DecodeError);
  });
});

describe('ascii85 and base85', () => {
  it('decodes Adobe ascii85 with or without delimiters', () => {
    expect(encodeAscii85(Buffer.from('Hello World'))).toBe('87cURD]i,"Ebo7');
    expect(decodeAscii85('87cURD]i,"Ebo7').toString()).toBe('Hello World');
    expect(decodeAscii85('<~87cURD]i,"Ebo7~>').toString()).toBe('Hello World');
  });

  it('expands z to four zero bytes', () => {
    expect(encodeAscii85(Buffer.from('\0\0\0\0abc'))).toBe('z@:E^');
    expect([...decodeAscii85('z@:E^')]).toEqual([0, 0, 0, 0, 0x61, 0x62, 0x63]);
  });

  it('decodes the RFC 1924 alphabet', () => {
    expect(encodeBase85(Buffer.from('Hello World'))).toBe('NM&qnZy;B1a%^M');
    expect(decodeBase85('NM&qnZy;B1a%^M').toString()).toBe('Hello World');
  });

  it('rejects a single leftover symbol', () => {
    expect(() => decodeBase85('NM&qnZ')).toThrow('dangling trailing symbol');
  });
});

describe('decodeAllBaseFamily', () => {
  it('returns every member that accepts the token', () => {
    const encodings = decodeAllBaseFamily('MZXW6YTBOI').map((variant) => variant.encoding);
    expect(encodings).toContain('base32');
    expect(encodings).toContain('base64');
    expect(encodings).not.toContain('hex');
  });

  it('returns nothing for the empty string', () => {
    expect(decodeAllBaseFamily('')).toEqual([]);
  });
});
