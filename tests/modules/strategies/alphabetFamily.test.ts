import { describe, expect, it } from 'vitest';
import { base45Strategy } from '../../../src/modules/strategies/base45.js';
import { base91Strategy } from '../../../src/modules/strategies/base91.js';
import { Deadline } from '../../../src/modules/strategies/deadline.js';
import type { StrategyRegistration } from '../../../src/modules/strategies/types.js';

function run(strategy: StrategyRegistration, ciphertext: string, rawOptions: Record<string, unknown> = {}) {
  const prepared = strategy.prepare(rawOptions);
  return prepared.run(ciphertext, { deadline: new Deadline(prepared.budgetS, () => 0) });
}

describe('alphabet family strategies', () => {
  it('decodes clean base45 directly', () => {
    expect(run(base45Strategy, 'DZ97$C944SUEB/D-3E')).toContainEqual(
      expect.objectContaining({ strategyName: 'base45', provenance: 'raw->base45', text: 'Meet at noon' })
    );
  });

  it('removes junk inserted at a fixed period', () => {
    // '*' is a base45 symbol, so keep-only stripping cannot remove it
    const noisy = 'DZ97*$C94*4SUE*B/D-*3E';
    expect(run(base45Strategy, noisy)).toContainEqual(
      expect.objectContaining({
        provenance: 'rm_periodic_b45(k=5,ph=4,drop=0.18)->base45',
        text: 'Meet at noon',
      })
    );
  });

  it('finds base91 tokens inside surrounding text', () => {
    expect(run(base91Strategy, 'token: >OwJh>}AQ;r@@Y?F end')).toContainEqual(
      expect.objectContaining({
        strategyName: 'base91',
        provenance: 'scan[b91@7:23]->base91',
        text: 'Hello, World!',
      })
    );
  });

  it('skips scanning when disabled', () => {
    const candidates = run(base91Strategy, 'token: >OwJh>}AQ;r@@Y?F end', { scanSubstrings: false });
    expect(candidates.some((candidate) => candidate.provenance.startsWith('scan['))).toBe(false);
  });

  it('returns nothing once the budget is spent', () => {
    expect(run(base45Strategy, 'DZ97$C944SUEB/D-3E', { budgetS: 0 })).toEqual([]);
  });

  it('rejects unknown options', () => {
    expect(() => base91Strategy.prepare({ alphabet: 'custom' })).toThrow('Invalid options for strategy "base91"');
  });
});
