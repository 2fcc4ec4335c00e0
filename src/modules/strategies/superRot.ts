import { z } from 'zod';
import { progressiveShift } from '../codecs/shift.js';
import { scoreText } from '../scoring/fitness.js';
import { formatStep } from './provenance.js';
import { baseOptionsShape, defineStrategy, looksBase64, looksOtherBlob, resolveCiphertext } from './salvage.js';
import type { Candidate } from './types.js';

const ALL_KEYS = Array.from({ length: 26 }, (_, key) => key);

const SuperRotOptionsSchema = z
  .object({
    ...baseOptionsShape(60),
    startKeys: z.array(z.number().int().min(0).max(25)).min(1).default(ALL_KEYS),
    maxAbsStep: z.number().int().min(1).max(25).default(5),
    modes: z.array(z.enum(['decode', 'encode'])).min(1).default(['decode', 'encode']),
    orders: z.array(z.enum(['LTR', 'RTL'])).min(1).default(['LTR', 'RTL']),
  })
  .strict();

export type SuperRotOptions = z.infer<typeof SuperRotOptionsSchema>;

export const BLOB_PENALTY = {
  base64: 1.2,
  base64Padded: 2.0,
  otherBlob: 1.0,
} as const;

/** Shift output that still looks like an encoded blob is a false positive. */
export function blobPenalty(text: string): number {
  if (looksBase64(text)) {
    return text.endsWith('==') ? BLOB_PENALTY.base64Padded : BLOB_PENALTY.base64;
  }
  return looksOtherBlob(text) ? BLOB_PENALTY.otherBlob : 0;
}

/** Steps -N..-1 then 1..N. */
export function stepRange(maxAbsStep: number): number[] {
  const steps: number[] = [];
  for (let step = -maxAbsStep; step <= maxAbsStep; step++) {
    if (step !== 0) steps.push(step);
  }
  return steps;
}

export const superRotStrategy = defineStrategy<SuperRotOptions>({
  name: 'super_rot',
  description:
    'Progressive shift cipher sweep: every start key, step, direction and mode, one candidate each.',
  options: SuperRotOptionsSchema,
  run(ciphertext, options, { deadline }) {
    const input = resolveCiphertext(ciphertext, options);
    const steps = stepRange(options.maxAbsStep);
    const candidates: Candidate[] = [];

    for (const startKey of options.startKeys) {
      for (const step of steps) {
        for (const order of options.orders) {
          for (const mode of options.modes) {
            if (deadline.expired()) return candidates;
            const text = progressiveShift(input, { startKey, step, mode, order });
            candidates.push({
              strategyName: 'super_rot',
              provenance: formatStep({ kind: 'progressive', startKey, step, order, mode }),
              text,
              score: scoreText(text) - blobPenalty(text),
            });
          }
        }
      }
    }
    return candidates;
  },
});
