import { describe, expect, it } from 'vitest';
import {
  formatProvenance,
  occamBonus,
  provenancePenalty,
  type OccamBonus,
  type PenaltyWeights,
} from '../../../src/modules/strategies/provenance.js';

const WEIGHTS: PenaltyWeights = {
  keep: 0.4,
  scan: 0,
  removal: 0.6,
  periodic: 1.2,
  repair: 0.2,
  nestedHop: 0.6,
  exoticEncoding: 0.6,
};

const OCCAM: OccamBonus = {
  tiers: [
    { minLetters: 0.75, maxOthers: 0.05, bonus: 1.6 },
    { minLetters: 0.6, maxOthers: 0.1, bonus: 0.9 },
  ],
  floor: 0.3,
};

describe('formatProvenance', () => {
  it('renders every step kind', () => {
    expect(formatProvenance([{ kind: 'scan', pattern: 'b64', start: 7, end: 27 }, { kind: 'decode', encoding: 'base64' }])).toBe(
      'scan[b64@7:27]->base64'
    );
    expect(
      formatProvenance([
        { kind: 'remove', alphabet: 'std', removed: ['7', '9'], dropRatio: 0.125 },
        { kind: 'decode', encoding: 'base64' },
      ])
    ).toBe('rm_std["7","9"](drop=0.13)->base64');
    expect(formatProvenance([{ kind: 'periodic', alphabet: 'b45', k: 5, phase: 4, dropRatio: 0.2 }])).toBe(
      'rm_periodic_b45(k=5,ph=4,drop=0.20)'
    );
    expect(
      formatProvenance([
        { kind: 'raw' },
        { kind: 'decode', encoding: 'base58', variant: 'bitcoin' },
        { kind: 'checksum' },
      ])
    ).toBe('raw->base58[bitcoin]->b58check');
    expect(formatProvenance([{ kind: 'keep', alphabet: 'url', dropRatio: 0 }, { kind: 'repair', variant: 'to_std' }])).toBe(
      'keep_url(drop=0.00)->repair[to_std]'
    );
    expect(formatProvenance([{ kind: 'progressive', startKey: 3, step: -2, order: 'LTR', mode: 'decode' }])).toBe(
      'start=3,step=-2,order=LTR,mode=decode'
    );
    expect(formatProvenance([{ kind: 'rot', k: 13 }])).toBe('k=13');
  });
});

describe('provenancePenalty', () => {
  it('costs nothing for a raw single decode', () => {
    expect(provenancePenalty([{ kind: 'raw' }, { kind: 'decode', encoding: 'base64' }], WEIGHTS)).toBe(0);
  });

  it('adds the keep weight and the drop extra', () => {
    const penalty = provenancePenalty(
      [{ kind: 'keep', alphabet: 'std', dropRatio: 0.1 }, { kind: 'decode', encoding: 'base64' }],
      WEIGHTS
    );
    expect(penalty).toBeCloseTo(0.4 + 0.3);
  });

  it('charges combinations like periodic surgery and each extra decode a hop', () => {
    const penalty = provenancePenalty(
      [
        { kind: 'remove', alphabet: 'std', removed: ['7', '9'], dropRatio: 0.2 },
        { kind: 'decode', encoding: 'base64' },
        { kind: 'decode', encoding: 'hex' },
      ],
      WEIGHTS
    );
    expect(penalty).toBeCloseTo(1.2 + 0.6 + 0.6);
  });

  it('caps the drop extra and charges exotic encodings', () => {
    const penalty = provenancePenalty(
      [
        { kind: 'periodic', alphabet: 'std', k: 2, phase: 0, dropRatio: 0.9 },
        { kind: 'decode', encoding: 'ascii85' },
      ],
      WEIGHTS
    );
    expect(penalty).toBeCloseTo(1.2 + 0.6 + 2);
  });
});

describe('occamBonus', () => {
  it('picks the first matching tier', () => {
    expect(occamBonus('Hello world', OCCAM)).toBe(1.6);
    expect(occamBonus('Hi 12345 there', OCCAM)).toBe(0.3);
    expect(occamBonus('abcdefg 123', OCCAM)).toBe(0.9);
  });

  it('applies the floor to symbol-heavy text and zero to empty text', () => {
    expect(occamBonus('$$$$abc', OCCAM)).toBe(0.3);
    expect(occamBonus('', OCCAM)).toBe(0);
  });
});
