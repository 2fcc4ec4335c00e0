import { z } from 'zod';
import {
  decodeAllBaseFamily,
  decodeBase64,
  decodeBase64Url,
  type BaseFamilyEncoding,
} from '../codecs/baseFamily.js';
import { tryDecode } from '../codecs/errors.js';
import { bytesToText, DEFAULT_MIN_PLAIN_LEN, normalizeInput } from '../codecs/text.js';
import type { Provenance, ProvenanceStep, RepairVariant } from './provenance.js';
import {
  baseOptionsShape,
  CandidateCollector,
  combinations,
  defineStrategy,
  dropRatio,
  keepOnly,
  looksEncoded,
  mostFrequent,
  periodicDeletions,
  removeAll,
  resolveCiphertext,
  scanTokens,
  toCharSet,
  type FamilyScoring,
} from './salvage.js';
import type { Candidate, StrategyContext } from './types.js';

const STD_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
const URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

interface KeepAlphabet {
  tag: 'std' | 'url';
  allowed: ReadonlySet<string>;
}

const KEEP_STD: KeepAlphabet = { tag: 'std', allowed: toCharSet(`${STD_ALPHABET}=`) };
const KEEP_URL: KeepAlphabet = { tag: 'url', allowed: toCharSet(`${URL_ALPHABET}=`) };

/** Look-alike substitutions seen in hand-obfuscated tokens. */
const LOOKALIKE_REPAIRS: Readonly<Record<string, string>> = {
  '|': 'I',
  '!': 'I',
  $: 'S',
  '@': 'A',
  '€': 'E',
  '£': 'L',
  '—': '-',
  '–': '-',
  '·': '.',
};

const SINGLE_DIGIT_MIN_COUNT = 3;
const SINGLE_DIGIT_CANDIDATES = 10;
const COMBO_DIGIT_POOL = 3;

const SCORING: FamilyScoring = {
  strategyName: 'base64',
  occam: {
    tiers: [
      { minLetters: 0.75, maxOthers: 0.05, bonus: 1.6 },
      { minLetters: 0.6, maxOthers: 0.1, bonus: 0.9 },
    ],
    floor: 0.3,
  },
  penalties: {
    keep: 0.4,
    scan: 0,
    removal: 0.6,
    periodic: 1.2,
    repair: 0.2,
    nestedHop: 0.6,
    exoticEncoding: 0.6,
  },
};

const Base64OptionsSchema = z
  .object({
    ...baseOptionsShape(5),
    nestedPasses: z.number().int().min(0).default(1),
    scanSubstrings: z.boolean().default(true),
    minTokenLen: z.number().int().min(1).default(12),
    allowUrlsafe: z.boolean().default(true),
    aggressiveSalvage: z.boolean().default(true),
    periodicMaxK: z.number().int().min(2).default(6),
    digitComboK: z.number().int().min(0).default(2),
    kgramLengths: z.array(z.number().int().min(2)).default([2, 3]),
    kgramTopK: z.number().int().min(0).default(6),
    minPlainLen: z.number().int().min(1).default(DEFAULT_MIN_PLAIN_LEN),
  })
  .strict();

export type Base64Options = z.infer<typeof Base64OptionsSchema>;

interface RepairedToken {
  token: string;
  repair?: RepairVariant;
}

/** The token itself, its look-alike repair and its std/url punctuation swaps. */
export function repairVariants(token: string): RepairedToken[] {
  const base = normalizeInput(token);
  const lookalike = Array.from(base, (ch) => LOOKALIKE_REPAIRS[ch] ?? ch).join('');
  const variants: RepairedToken[] = [
    { token: base },
    { token: lookalike, repair: 'lookalike' },
    { token: lookalike.replace(/-/g, '+').replace(/_/g, '/'), repair: 'to_std' },
    { token: lookalike.replace(/\+/g, '-').replace(/\//g, '_'), repair: 'to_url' },
  ];

  const seen = new Set<string>();
  return variants.filter((variant) => {
    if (seen.has(variant.token)) return false;
    seen.add(variant.token);
    return true;
  });
}

function withRepair(steps: Provenance, repair: RepairVariant | undefined): ProvenanceStep[] {
  return repair ? [...steps, { kind: 'repair', variant: repair }] : [...steps];
}

/** Letter+digit alphanumeric k-grams, most frequent first. */
export function topMixedKgrams(value: string, length: number, limit: number): string[] {
  const grams: string[] = [];
  for (let i = 0; i + length <= value.length; i++) {
    const gram = value.slice(i, i + length);
    if (/^[A-Za-z0-9]+$/.test(gram) && /[0-9]/.test(gram) && /[A-Za-z]/.test(gram)) {
      grams.push(gram);
    }
  }
  return mostFrequent(grams, limit).map(([gram]) => gram);
}

class Base64Run {
  private readonly collector = new CandidateCollector(SCORING);
  private readonly source: string;
  private readonly keepAlphabets: readonly KeepAlphabet[];

  constructor(
    ciphertext: string,
    private readonly options: Base64Options,
    private readonly context: StrategyContext
  ) {
    this.source = normalizeInput(resolveCiphertext(ciphertext, options));
    this.keepAlphabets = options.allowUrlsafe ? [KEEP_STD, KEEP_URL] : [KEEP_STD];
  }

  private get expired(): boolean {
    return this.context.deadline.expired();
  }

  private familyDecode(token: string) {
    return decodeAllBaseFamily(token).filter(
      (variant) => this.options.allowUrlsafe || variant.encoding !== 'base64url'
    );
  }

  private emit(text: string, provenance: Provenance): void {
    this.collector.add(text, provenance);
    this.nest(text, provenance);
  }

  /** Re-decode outputs that still look encoded, one level per pass. */
  private nest(text: string, provenance: Provenance): void {
    let queue: Array<{ text: string; provenance: Provenance }> = [{ text, provenance }];
    for (let pass = 0; pass < this.options.nestedPasses && queue.length > 0; pass++) {
      if (this.expired) return;
      const next: typeof queue = [];
      for (const item of queue) {
        const token = item.text.trim();
        if (!looksEncoded(token)) continue;
        for (const { encoding, bytes } of this.familyDecode(token)) {
          const plain = bytesToText(bytes, this.options.minPlainLen);
          if (!plain) continue;
          const chained: Provenance = [...item.provenance, { kind: 'decode', encoding }];
          this.collector.add(plain, chained);
          next.push({ text: plain, provenance: chained });
        }
      }
      queue = next;
    }
  }

  private attempt(token: string, steps: Provenance): void {
    for (const { encoding, bytes } of this.familyDecode(token)) {
      if (this.expired) return;
      const plain = bytesToText(bytes, this.options.minPlainLen);
      if (plain) {
        this.emit(plain, [...steps, { kind: 'decode', encoding }]);
      }
    }
  }

  /** Strip to each alphabet and decode once per distinct survivor. */
  private attemptStripped(cleaned: string, makeStep: (alphabet: string, drop: number) => ProvenanceStep): void {
    for (const alphabet of this.keepAlphabets) {
      const stripped = keepOnly(cleaned, alphabet.allowed);
      if (stripped.length < this.options.minTokenLen || !this.collector.claim(stripped)) continue;
      this.attempt(stripped, [makeStep(alphabet.tag, dropRatio(stripped, this.source))]);
    }
  }

  private wholeString(): void {
    for (const { token, repair } of repairVariants(this.source)) {
      if (this.expired) return;
      if (!this.collector.claim(token)) continue;
      this.attempt(token, withRepair([{ kind: 'raw' }], repair));
    }
    if (this.expired) return;
    this.attemptStripped(this.source, (alphabet, drop) => ({ kind: 'keep', alphabet, dropRatio: drop }));
  }

  private removeDigits(): void {
    const digits = mostFrequent(Array.from(this.source).filter((ch) => /[0-9]/.test(ch)), SINGLE_DIGIT_CANDIDATES);

    for (const [digit, count] of digits) {
      if (this.expired || count < SINGLE_DIGIT_MIN_COUNT) break;
      this.attemptStripped(removeAll(this.source, [digit]), (alphabet, drop) => ({
        kind: 'remove',
        alphabet,
        removed: [digit],
        dropRatio: drop,
      }));
    }

    const pool = digits.slice(0, COMBO_DIGIT_POOL).map(([digit]) => digit);
    for (let size = 2; size <= Math.min(this.options.digitComboK, pool.length); size++) {
      for (const combo of combinations(pool, size)) {
        if (this.expired) return;
        this.attemptStripped(removeAll(this.source, combo), (alphabet, drop) => ({
          kind: 'remove',
          alphabet,
          removed: combo,
          dropRatio: drop,
        }));
      }
    }
  }

  private removePeriodic(): void {
    for (const { k, phase, cleaned } of periodicDeletions(this.source, this.options.periodicMaxK)) {
      if (this.expired) return;
      this.attemptStripped(cleaned, (alphabet, drop) => ({ kind: 'periodic', alphabet, k, phase, dropRatio: drop }));
    }
  }

  private removeKgrams(): void {
    for (const length of this.options.kgramLengths) {
      for (const gram of topMixedKgrams(this.source, length, this.options.kgramTopK)) {
        if (this.expired) return;
        this.attemptStripped(removeAll(this.source, [gram]), (alphabet, drop) => ({
          kind: 'remove',
          alphabet,
          removed: [gram],
          dropRatio: drop,
        }));
      }
    }
  }

  private scan(): void {
    const tokens = scanTokens(this.source, STD_ALPHABET, this.options.minTokenLen, '=').map((token) => ({
      ...token,
      kind: 'b64',
    }));
    if (this.options.allowUrlsafe) {
      tokens.push(
        ...scanTokens(this.source, URL_ALPHABET, this.options.minTokenLen, '=').map((token) => ({
          ...token,
          kind: 'b64url',
        }))
      );
    }

    const seenSpans = new Set<string>();
    for (const { kind, start, end, token } of tokens) {
      const span = `${start}:${end}`;
      if (seenSpans.has(span)) continue;
      seenSpans.add(span);

      const decoders: Array<[BaseFamilyEncoding, (input: string) => Buffer]> =
        kind === 'b64url'
          ? [['base64url', decodeBase64Url], ['base64', decodeBase64]]
          : [['base64', decodeBase64], ['base64url', decodeBase64Url]];

      for (const { token: repaired, repair } of repairVariants(token)) {
        for (const [encoding, decode] of decoders) {
          if (this.expired) return;
          if (encoding === 'base64url' && !this.options.allowUrlsafe) continue;
          const bytes = tryDecode(decode, repaired);
          const plain = bytes && bytesToText(bytes, this.options.minPlainLen);
          if (plain) {
            const steps = withRepair([{ kind: 'scan', pattern: kind, start, end }], repair);
            this.emit(plain, [...steps, { kind: 'decode', encoding }]);
          }
        }
      }
    }
  }

  execute(): Candidate[] {
    if (this.expired) return this.collector.candidates;

    this.wholeString();
    if (this.options.aggressiveSalvage) {
      if (!this.expired) this.removeDigits();
      if (!this.expired) this.removePeriodic();
      if (!this.expired) this.removeKgrams();
    }
    if (this.options.scanSubstrings && !this.expired) this.scan();

    return this.collector.candidates;
  }
}

export const base64Strategy = defineStrategy<Base64Options>({
  name: 'base64',
  description:
    'Hex, Base64 (standard and URL-safe), Base32, Ascii85 and Base85 with look-alike repair, ' +
    'noise removal, periodic deletion, embedded-token scanning and nested decoding.',
  options: Base64OptionsSchema,
  run: (ciphertext, options, context) => new Base64Run(ciphertext, options, context).execute(),
});
