import { describe, expect, it } from 'vitest';
import { progressiveShift } from '../../../src/modules/codecs/shift.js';
import { Deadline } from '../../../src/modules/strategies/deadline.js';
import { blobPenalty, stepRange, superRotStrategy } from '../../../src/modules/strategies/superRot.js';

function run(ciphertext: string, rawOptions: Record<string, unknown>, clock: () => number = () => 0) {
  const prepared = superRotStrategy.prepare(rawOptions);
  return prepared.run(ciphertext, { deadline: new Deadline(prepared.budgetS, clock) });
}

describe('stepRange', () => {
  it('excludes zero', () => {
    expect(stepRange(2)).toEqual([-2, -1, 1, 2]);
  });
});

describe('blobPenalty', () => {
  it('penalises outputs still shaped like encoded blobs', () => {
    expect(blobPenalty('SGVsbG8sIFdvcmxkIQ==')).toBe(2.0);
    expect(blobPenalty('SGVsbG8sIFdvcmxkIQ')).toBe(1.2);
    expect(blobPenalty('ab#12$cd!x')).toBe(1.0);
    expect(blobPenalty('plain text here')).toBe(0);
    expect(blobPenalty('short')).toBe(0);
  });
});

describe('super_rot strategy', () => {
  const plaintext = 'meet me at the old bridge after dark';
  const ciphertext = progressiveShift(plaintext, { startKey: 3, step: 2, mode: 'encode', order: 'LTR' });

  it('produces one candidate per combination', () => {
    expect(run(ciphertext, { maxAbsStep: 3 })).toHaveLength(26 * 6 * 2 * 2);
  });

  it('recovers a progressive shift', () => {
    expect(ciphertext).toBe('pjlc zt to sih vuo qibydd dkanc srkf');

    const candidates = run(ciphertext, { maxAbsStep: 3 });
    const best = [...candidates].sort((a, b) => b.score - a.score)[0];
    expect(best?.text).toBe(plaintext);
    expect(candidates).toContainEqual(
      expect.objectContaining({ provenance: 'start=3,step=2,order=LTR,mode=decode', text: plaintext })
    );
  });

  it('honours restricted sweeps', () => {
    const candidates = run(ciphertext, { startKeys: [3], maxAbsStep: 2, modes: ['decode'], orders: ['LTR'] });
    expect(candidates.map((candidate) => candidate.provenance)).toEqual([
      'start=3,step=-2,order=LTR,mode=decode',
      'start=3,step=-1,order=LTR,mode=decode',
      'start=3,step=1,order=LTR,mode=decode',
      'start=3,step=2,order=LTR,mode=decode',
    ]);
  });

  it('stops when the budget runs out', () => {
    let now = 0;
    const clock = () => {
      now += 100;
      return now;
    };
    // each budget check advances the clock by 100ms
    expect(run(ciphertext, { budgetS: 1 }, clock)).toHaveLength(9);
  });

  it('rejects a zero step bound', () => {
    expect(() => superRotStrategy.prepare({ maxAbsStep: 0 })).toThrow('Invalid options for strategy "super_rot"');
  });
});
