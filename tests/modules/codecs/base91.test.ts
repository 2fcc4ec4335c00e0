import { describe, expect, it } from 'vitest';
import { decodeBase91, encodeBase91 } from '../../../src/modules/codecs/base91.js';

describe('base91', () => {
  it('round-trips a known vector', () => {
    expect(encodeBase91(Buffer.from('Hello, World!'))).toBe('>OwJh>}AQ;r@@Y?F');
    expect(decodeBase91('>OwJh>}AQ;r@@Y?F').toString()).toBe('Hello, World!');
  });

  it('flushes a dangling half pair as a final byte', () => {
    expect(encodeBase91(Buffer.from('test'))).toBe('fPNKd');
    expect(decodeBase91('fPNKd').toString()).toBe('test');
  });

  it('rejects characters outside the table', () => {
    expect(() => decodeBase91("fP'Kd")).toThrow('invalid symbol');
  });
});
