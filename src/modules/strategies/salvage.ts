import { z } from 'zod';
import { ConfigError } from '../../errors/ConfigError.js';
import { scoreText } from '../scoring/fitness.js';
import {
  formatProvenance,
  occamBonus,
  provenancePenalty,
  type OccamBonus,
  type PenaltyWeights,
  type Provenance,
} from './provenance.js';
import type {
  BaseStrategyOptions,
  Candidate,
  PreparedStrategy,
  StrategyDefinition,
  StrategyName,
  StrategyRegistration,
} from './types.js';

/** Zod shape shared by every strategy's options. */
export function baseOptionsShape(defaultBudgetS: number) {
  return {
    budgetS: z.number().finite().min(0).default(defaultBudgetS),
    textToDecipher: z.string().optional(),
  };
}

/** Bind a definition to its option schema. */
export function defineStrategy<O extends BaseStrategyOptions>(
  definition: StrategyDefinition<O>
): StrategyRegistration {
  return {
    name: definition.name,
    description: definition.description,
    prepare(rawOptions: unknown): PreparedStrategy {
      const parsed = definition.options.safeParse(rawOptions ?? {});
      if (!parsed.success) {
        throw new ConfigError(`Invalid options for strategy "${definition.name}"`, {
          strategy: definition.name,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        });
      }
      const options = parsed.data;
      return {
        name: definition.name,
        budgetS: options.budgetS,
        options,
        run: (ciphertext, context) => definition.run(ciphertext, options, context),
      };
    },
  };
}

/** Apply the `textToDecipher` override, expanding every `%c`. */
export function resolveCiphertext(ciphertext: string, options: BaseStrategyOptions): string {
  if (options.textToDecipher === undefined) {
    return ciphertext;
  }
  return options.textToDecipher.replaceAll('%c', ciphertext);
}

export interface FamilyScoring {
  strategyName: StrategyName;
  occam: OccamBonus;
  penalties: PenaltyWeights;
}

/**
 * Per-invocation candidate sink. Owns the set of already-attempted tokens so
 * the same repaired string is never decoded twice within one run.
 */
export class CandidateCollector {
  private readonly tried = new Set<string>();
  private readonly collected: Candidate[] = [];

  constructor(private readonly scoring: FamilyScoring) {}

  /** True the first time a token is offered, false afterwards. */
  claim(token: string): boolean {
    if (this.tried.has(token)) {
      return false;
    }
    this.tried.add(token);
    return true;
  }

  add(text: string, provenance: Provenance): void {
    const score =
      scoreText(text) +
      occamBonus(text, this.scoring.occam) -
      provenancePenalty(provenance, this.scoring.penalties);
    this.collected.push({
      strategyName: this.scoring.strategyName,
      provenance: formatProvenance(provenance),
      text,
      score,
    });
  }

  get candidates(): Candidate[] {
    return this.collected;
  }
}

export function toCharSet(alphabet: string): ReadonlySet<string> {
  return new Set(Array.from(alphabet));
}

export function keepOnly(value: string, allowed: ReadonlySet<string>): string {
  let out = '';
  for (const ch of value) {
    if (allowed.has(ch)) out += ch;
  }
  return out;
}

/** Fraction of the source that stripping removed. */
export function dropRatio(kept: string, source: string): number {
  return 1 - Array.from(kept).length / Math.max(1, Array.from(source).length);
}

export function removeAll(value: string, needles: readonly string[]): string {
  let out = value;
  for (const needle of needles) {
    out = out.split(needle).join('');
  }
  return out;
}

export interface PeriodicDeletion {
  k: number;
  phase: number;
  cleaned: string;
}

/** Delete every k-th character at each phase, for k = 2..maxK (at least k = 2). */
export function* periodicDeletions(value: string, maxK: number): Generator<PeriodicDeletion> {
  const chars = Array.from(value);
  const upper = Math.max(2, maxK);
  for (let k = 2; k <= upper; k++) {
    for (let phase = 0; phase < k; phase++) {
      const cleaned = chars.filter((_, index) => index % k !== phase).join('');
      yield { k, phase, cleaned };
    }
  }
}

/** Most frequent items, ties in first-seen order. */
export function mostFrequent(items: Iterable<string>, limit: number): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

/** All r-element combinations, in lexicographic index order. */
export function combinations<T>(items: readonly T[], r: number): T[][] {
  const out: T[][] = [];
  const pick = (start: number, current: T[]): void => {
    if (current.length === r) {
      out.push([...current]);
      return;
    }
    for (let i = start; i < items.length; i++) {
      const item = items[i];
      if (item === undefined) continue;
      current.push(item);
      pick(i + 1, current);
      current.pop();
    }
  };
  pick(0, []);
  return out;
}

function escapeClass(alphabet: string): string {
  return alphabet.replace(/[\\\]\[^-]/g, '\\$&');
}

export interface ScannedToken {
  start: number;
  end: number;
  token: string;
}

/**
 * Maximal runs of `alphabet` symbols (plus optional trailing padding) of at
 * least `minLen` characters. Lookarounds keep a match from starting or ending
 * inside a longer run.
 */
export function scanTokens(
  value: string,
  alphabet: string,
  minLen: number,
  padding = ''
): ScannedToken[] {
  const cls = `[${escapeClass(alphabet)}]`;
  const pad = padding ? `(?:${escapeClass(padding)}){0,2}` : '';
  const pattern = new RegExp(`(?<!${cls})${cls}+${pad}(?!${cls})`, 'g');

  const tokens: ScannedToken[] = [];
  for (const match of value.matchAll(pattern)) {
    const start = match.index ?? 0;
    const token = match[0];
    if (token.length >= minLen) {
      tokens.push({ start, end: start + token.length, token });
    }
  }
  return tokens;
}

const BLOB_SHAPES = {
  base64: /^[A-Za-z0-9+/]+={0,2}$/,
  base64url: /^[A-Za-z0-9\-_]+={0,2}$/,
  base32: /^[A-Z2-7]+=*$/,
  hex: /^[0-9a-fA-F]+$/,
  base58: /^[1-9A-HJ-NP-Za-km-z]+$/,
  base45: /^[0-9A-Z $%*+\-./:]+$/,
  base91: /^[A-Za-z0-9!#$%&()*+,./:;<=>?@[\]^_`{|}~"]+$/,
} as const;

const MIN_BLOB_LENGTH = 8;

function isBlobCandidate(text: string): boolean {
  return text.length >= MIN_BLOB_LENGTH && !/\s/.test(text);
}

/** Loosely shaped like another Base64-family token; gates nested decoding. */
export function looksEncoded(text: string): boolean {
  if (!isBlobCandidate(text)) return false;
  return (
    BLOB_SHAPES.base64.test(text) ||
    BLOB_SHAPES.base64url.test(text) ||
    BLOB_SHAPES.base32.test(text) ||
    BLOB_SHAPES.hex.test(text)
  );
}

export function looksBase64(text: string): boolean {
  return isBlobCandidate(text) && (BLOB_SHAPES.base64.test(text) || BLOB_SHAPES.base64url.test(text));
}

/** Shaped like a Base58, Base45 or Base91 token and carrying at least one digit. */
export function looksOtherBlob(text: string): boolean {
  if (!isBlobCandidate(text) || !/[0-9]/.test(text)) return false;
  return BLOB_SHAPES.base58.test(text) || BLOB_SHAPES.base45.test(text) || BLOB_SHAPES.base91.test(text);
}
