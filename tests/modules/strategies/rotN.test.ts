import { describe, expect, it } from 'vitest';
import { Deadline } from '../../../src/modules/strategies/deadline.js';
import { rotNStrategy } from '../../../src/modules/strategies/rotN.js';

function run(ciphertext: string, rawOptions: Record<string, unknown>) {
  const prepared = rotNStrategy.prepare(rawOptions);
  return prepared.run(ciphertext, { deadline: new Deadline(prepared.budgetS, () => 0) });
}

describe('rotN strategy', () => {
  it('defaults to a single ROT13 candidate', () => {
    expect(run('Uryyb, Jbeyq!', {})).toEqual([
      expect.objectContaining({ strategyName: 'rotN', provenance: 'k=13', text: 'Hello, World!' }),
    ]);
  });

  it('sweeps all 26 shifts and ranks the right one highest', () => {
    const candidates = run('Uryyb, Jbeyq!', { n: 'all' });
    expect(candidates).toHaveLength(26);

    const best = [...candidates].sort((a, b) => b.score - a.score)[0];
    expect(best?.provenance).toBe('k=13');
    expect(best?.text).toBe('Hello, World!');
  });

  it('normalises the shift modulo 26', () => {
    expect(run('Khoor', { n: 29 })[0]).toMatchObject({ provenance: 'k=3', text: 'Hello' });
    expect(run('Khoor', { n: -23 })[0]).toMatchObject({ provenance: 'k=3', text: 'Hello' });
  });

  it('still returns the fixed shift with no budget', () => {
    expect(run('Uryyb', { budgetS: 0 })).toHaveLength(1);
    expect(run('Uryyb', { budgetS: 0, n: 'all' })).toEqual([]);
  });

  it('deciphers the textToDecipher override', () => {
    expect(run('Jbeyq', { textToDecipher: 'Uryyb %c' })[0]?.text).toBe('Hello World');
  });
});
