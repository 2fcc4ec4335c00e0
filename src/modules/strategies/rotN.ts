import { z } from 'zod';
import { rotN } from '../codecs/shift.js';
import { scoreText } from '../scoring/fitness.js';
import { formatStep } from './provenance.js';
import { baseOptionsShape, defineStrategy, resolveCiphertext } from './salvage.js';
import type { Candidate } from './types.js';

const RotNOptionsSchema = z
  .object({
    ...baseOptionsShape(1),
    n: z.union([z.number().int(), z.literal('all')]).default(13),
  })
  .strict();

export type RotNOptions = z.infer<typeof RotNOptionsSchema>;

function rotCandidate(input: string, k: number): Candidate {
  const text = rotN(input, k);
  return { strategyName: 'rotN', provenance: formatStep({ kind: 'rot', k }), text, score: scoreText(text) };
}

/**
 * Caesar shift. A fixed `n` always yields its one candidate, even with no
 * budget left; `"all"` sweeps 0..25 while the budget lasts.
 */
export const rotNStrategy = defineStrategy<RotNOptions>({
  name: 'rotN',
  description: 'Caesar / ROT-N: one fixed shift (default 13) or all 26.',
  options: RotNOptionsSchema,
  run(ciphertext, options, { deadline }) {
    const input = resolveCiphertext(ciphertext, options);

    if (options.n !== 'all') {
      return [rotCandidate(input, ((options.n % 26) + 26) % 26)];
    }

    const candidates: Candidate[] = [];
    for (let k = 0; k < 26; k++) {
      if (deadline.expired()) break;
      candidates.push(rotCandidate(input, k));
    }
    return candidates;
  },
});
