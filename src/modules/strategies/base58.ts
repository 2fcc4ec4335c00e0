import { z } from 'zod';
import { decodeBase64, decodeBase64Url } from '../codecs/baseFamily.js';
import {
  BASE58_ALPHABET_NAMES,
  BASE58_ALPHABETS,
  decodeBase58,
  verifyBase58Check,
} from '../codecs/base58.js';
import { tryDecode } from '../codecs/errors.js';
import { bytesToText, DEFAULT_MIN_PLAIN_LEN, normalizeInput } from '../codecs/text.js';
import type { Provenance, ProvenanceStep } from './provenance.js';
import {
  baseOptionsShape,
  CandidateCollector,
  defineStrategy,
  dropRatio,
  keepOnly,
  looksBase64,
  mostFrequent,
  periodicDeletions,
  removeAll,
  resolveCiphertext,
  scanTokens,
  toCharSet,
  type FamilyScoring,
} from './salvage.js';
import type { Candidate, StrategyContext } from './types.js';

/** All three alphabets share the bitcoin symbol set, so stripping and scanning use it. */
const SYMBOLS = BASE58_ALPHABETS.bitcoin;
const ALLOWED = toCharSet(SYMBOLS);
const NOISE_CHARS_TRIED = 2;

const SCORING: FamilyScoring = {
  strategyName: 'base58',
  occam: {
    tiers: [
      { minLetters: 0.75, maxOthers: 0.05, bonus: 1.4 },
      { minLetters: 0.6, maxOthers: 0.1, bonus: 0.7 },
    ],
    floor: 0.2,
  },
  penalties: {
    keep: 0.3,
    scan: 0,
    removal: 1.1,
    periodic: 1.1,
    repair: 0,
    nestedHop: 0.5,
    exoticEncoding: 0,
  },
};

const Base58OptionsSchema = z
  .object({
    ...baseOptionsShape(5),
    alphabets: z.array(z.enum(BASE58_ALPHABET_NAMES)).min(1).default(['bitcoin']),
    checkModes: z.array(z.enum(['none', 'b58check'])).default(['none', 'b58check']),
    nestedPasses: z.number().int().min(0).default(1),
    scanSubstrings: z.boolean().default(true),
    minTokenLen: z.number().int().min(1).default(10),
    aggressiveSalvage: z.boolean().default(true),
    periodicMaxK: z.number().int().min(2).default(6),
    minPlainLen: z.number().int().min(1).default(DEFAULT_MIN_PLAIN_LEN),
  })
  .strict();

export type Base58Options = z.infer<typeof Base58OptionsSchema>;

/** Printable Base64 decodes of a Base64-shaped payload, standard alphabet first. */
function nestedBase64(text: string): Array<{ encoding: 'base64' | 'base64url'; text: string }> {
  const token = text.trim();
  if (!looksBase64(token)) return [];

  const out: Array<{ encoding: 'base64' | 'base64url'; text: string }> = [];
  for (const [encoding, decode] of [
    ['base64', decodeBase64],
    ['base64url', decodeBase64Url],
  ] as const) {
    const bytes = tryDecode(decode, token);
    const plain = bytes && bytesToText(bytes, 1);
    if (plain) out.push({ encoding, text: plain });
  }
  return out;
}

class Base58Run {
  private readonly collector = new CandidateCollector(SCORING);
  private readonly source: string;

  constructor(
    ciphertext: string,
    private readonly options: Base58Options,
    private readonly context: StrategyContext
  ) {
    this.source = normalizeInput(resolveCiphertext(ciphertext, options));
  }

  private get expired(): boolean {
    return this.context.deadline.expired();
  }

  private emit(bytes: Buffer, provenance: Provenance): void {
    const plain = bytesToText(bytes, this.options.minPlainLen);
    if (!plain) return;
    this.collector.add(plain, provenance);

    for (const nested of nestedBase64(plain).slice(0, this.options.nestedPasses)) {
      this.collector.add(nested.text, [...provenance, { kind: 'decode', encoding: nested.encoding }]);
    }
  }

  /** Every configured alphabet, as plain Base58 and, when verified, Base58Check. */
  private attempt(token: string, steps: Provenance): void {
    for (const alphabetName of this.options.alphabets) {
      if (this.expired) return;
      const raw = tryDecode((input) => decodeBase58(input, BASE58_ALPHABETS[alphabetName]), token);
      if (!raw) continue;

      const decoded: Provenance = [...steps, { kind: 'decode', encoding: 'base58', variant: alphabetName }];
      if (this.options.checkModes.includes('none')) {
        this.emit(raw, decoded);
      }
      if (this.options.checkModes.includes('b58check')) {
        const { valid, payload } = verifyBase58Check(raw);
        if (valid) this.emit(payload, [...decoded, { kind: 'checksum' }]);
      }
    }
  }

  private attemptStripped(cleaned: string, makeStep: (drop: number) => ProvenanceStep): void {
    const stripped = keepOnly(cleaned, ALLOWED);
    if (stripped.length < this.options.minTokenLen || !this.collector.claim(stripped)) return;
    this.attempt(stripped, [makeStep(dropRatio(stripped, this.source))]);
  }

  private wholeString(): void {
    if (this.collector.claim(this.source)) {
      this.attempt(this.source, [{ kind: 'raw' }]);
    }
    if (this.expired) return;
    this.attemptStripped(this.source, (drop) => ({ kind: 'keep', alphabet: 'std', dropRatio: drop }));
  }

  private salvage(): void {
    const noise = Array.from(this.source).filter((ch) => !ALLOWED.has(ch) && !/\s/.test(ch));
    for (const [ch] of mostFrequent(noise, NOISE_CHARS_TRIED)) {
      if (this.expired) return;
      this.attemptStripped(removeAll(this.source, [ch]), (drop) => ({
        kind: 'remove',
        alphabet: 'std',
        removed: [ch],
        dropRatio: drop,
      }));
    }

    for (const { k, phase, cleaned } of periodicDeletions(this.source, this.options.periodicMaxK)) {
      if (this.expired) return;
      this.attemptStripped(cleaned, (drop) => ({ kind: 'periodic', alphabet: 'std', k, phase, dropRatio: drop }));
    }
  }

  private scan(): void {
    for (const { start, end, token } of scanTokens(this.source, SYMBOLS, this.options.minTokenLen)) {
      if (this.expired) return;
      this.attempt(token, [{ kind: 'scan', pattern: 'b58', start, end }]);
    }
  }

  execute(): Candidate[] {
    if (this.expired) return this.collector.candidates;

    this.wholeString();
    if (this.options.aggressiveSalvage && !this.expired) this.salvage();
    if (this.options.scanSubstrings && !this.expired) this.scan();

    return this.collector.candidates;
  }
}

export const base58Strategy = defineStrategy<Base58Options>({
  name: 'base58',
  description:
    'Base58 over the bitcoin, ripple and flickr alphabets, with Base58Check verification, ' +
    'noise removal, periodic deletion, token scanning and a nested Base64 pass.',
  options: Base58OptionsSchema,
  run: (ciphertext, options, context) => new Base58Run(ciphertext, options, context).execute(),
});
