import { z } from 'zod';
import { tryDecode } from '../codecs/errors.js';
import { bytesToText, DEFAULT_MIN_PLAIN_LEN, normalizeInput } from '../codecs/text.js';
import type { OccamBonus, Provenance } from './provenance.js';
import {
  baseOptionsShape,
  CandidateCollector,
  defineStrategy,
  dropRatio,
  keepOnly,
  periodicDeletions,
  resolveCiphertext,
  scanTokens,
  toCharSet,
} from './salvage.js';
import type { StrategyName, StrategyRegistration } from './types.js';

/** A single-alphabet encoding with no padding, variants or nesting. */
export interface AlphabetFamily {
  name: StrategyName;
  description: string;
  /** Short tag used in provenance labels, e.g. `b45`. */
  tag: string;
  alphabet: string;
  decode(token: string): Buffer;
  defaultMinTokenLen: number;
  occam: OccamBonus;
}

/**
 * Raw and keep-only attempts, periodic deletion and token scanning over one
 * alphabet. Every distinct token is decoded at most once per run.
 */
export function defineAlphabetFamilyStrategy(family: AlphabetFamily): StrategyRegistration {
  const allowed = toCharSet(family.alphabet);
  const scoring = {
    strategyName: family.name,
    occam: family.occam,
    penalties: {
      keep: 0.3,
      scan: 0.2,
      removal: 1.0,
      periodic: 1.0,
      repair: 0,
      nestedHop: 0,
      exoticEncoding: 0,
    },
  };

  const OptionsSchema = z
    .object({
      ...baseOptionsShape(5),
      scanSubstrings: z.boolean().default(true),
      minTokenLen: z.number().int().min(1).default(family.defaultMinTokenLen),
      periodicMaxK: z.number().int().min(2).default(6),
      minPlainLen: z.number().int().min(1).default(DEFAULT_MIN_PLAIN_LEN),
    })
    .strict();

  return defineStrategy<z.infer<typeof OptionsSchema>>({
    name: family.name,
    description: family.description,
    options: OptionsSchema,
    run(ciphertext, options, { deadline }) {
      const source = normalizeInput(resolveCiphertext(ciphertext, options));
      const collector = new CandidateCollector(scoring);

      const attempt = (token: string, steps: Provenance): void => {
        if (!collector.claim(token)) return;
        const bytes = tryDecode(family.decode, token);
        const plain = bytes && bytesToText(bytes, options.minPlainLen);
        if (plain) {
          collector.add(plain, [...steps, { kind: 'decode', encoding: family.name }]);
        }
      };

      if (deadline.expired()) return collector.candidates;

      attempt(source, [{ kind: 'raw' }]);
      const kept = keepOnly(source, allowed);
      if (kept.length >= options.minTokenLen && !deadline.expired()) {
        attempt(kept, [{ kind: 'keep', alphabet: family.tag, dropRatio: dropRatio(kept, source) }]);
      }

      for (const { k, phase, cleaned } of periodicDeletions(source, options.periodicMaxK)) {
        if (deadline.expired()) return collector.candidates;
        const stripped = keepOnly(cleaned, allowed);
        if (stripped.length >= options.minTokenLen) {
          attempt(stripped, [
            { kind: 'periodic', alphabet: family.tag, k, phase, dropRatio: dropRatio(stripped, source) },
          ]);
        }
      }

      if (options.scanSubstrings) {
        for (const { start, end, token } of scanTokens(source, family.alphabet, options.minTokenLen)) {
          if (deadline.expired()) break;
          attempt(token, [{ kind: 'scan', pattern: family.tag, start, end }]);
        }
      }

      return collector.candidates;
    },
  });
}
