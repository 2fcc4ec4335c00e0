import type { ShiftMode, ShiftOrder } from '../codecs/shift.js';

export type RepairVariant = 'lookalike' | 'to_std' | 'to_url';

/** One transformation applied to the ciphertext on the way to a candidate. */
export type ProvenanceStep =
  | { kind: 'raw' }
  | { kind: 'repair'; variant: RepairVariant }
  | { kind: 'keep'; alphabet: string; dropRatio: number }
  | { kind: 'remove'; alphabet: string; removed: readonly string[]; dropRatio: number }
  | { kind: 'periodic'; alphabet: string; k: number; phase: number; dropRatio: number }
  | { kind: 'scan'; pattern: string; start: number; end: number }
  | { kind: 'decode'; encoding: string; variant?: string }
  | { kind: 'checksum' }
  | { kind: 'progressive'; startKey: number; step: number; order: ShiftOrder; mode: ShiftMode }
  | { kind: 'rot'; k: number };

export type Provenance = readonly ProvenanceStep[];

function ratio(value: number): string {
  return value.toFixed(2);
}

export function formatStep(step: ProvenanceStep): string {
  switch (step.kind) {
    case 'raw':
      return 'raw';
    case 'repair':
      return `repair[${step.variant}]`;
    case 'keep':
      return `keep_${step.alphabet}(drop=${ratio(step.dropRatio)})`;
    case 'remove':
      return `rm_${step.alphabet}[${step.removed.map((item) => JSON.stringify(item)).join(',')}](drop=${ratio(step.dropRatio)})`;
    case 'periodic':
      return `rm_periodic_${step.alphabet}(k=${step.k},ph=${step.phase},drop=${ratio(step.dropRatio)})`;
    case 'scan':
      return `scan[${step.pattern}@${step.start}:${step.end}]`;
    case 'decode':
      return step.variant ? `${step.encoding}[${step.variant}]` : step.encoding;
    case 'checksum':
      return 'b58check';
    case 'progressive':
      return `start=${step.startKey},step=${step.step},order=${step.order},mode=${step.mode}`;
    case 'rot':
      return `k=${step.k}`;
  }
}

/** Human-readable path, e.g. `scan[b64@7:27]->base64`. */
export function formatProvenance(provenance: Provenance): string {
  return provenance.map(formatStep).join('->');
}

/** Per-family weights for the subtractive provenance penalty. */
export interface PenaltyWeights {
  keep: number;
  scan: number;
  removal: number;
  periodic: number;
  repair: number;
  nestedHop: number;
  /** Extra cost for decodes under rarely-intended encodings (ascii85, base85). */
  exoticEncoding: number;
}

const EXOTIC_ENCODINGS: ReadonlySet<string> = new Set(['ascii85', 'base85']);
const DROP_PENALTY_FACTOR = 3;
const DROP_PENALTY_CAP = 2;

function dropRatioOf(step: ProvenanceStep): number {
  switch (step.kind) {
    case 'keep':
    case 'remove':
    case 'periodic':
      return step.dropRatio;
    default:
      return 0;
  }
}

/**
 * Raw decodes cost nothing; stripping and single removals cost a little;
 * periodic and combinatorial surgery cost more; each decode after the first
 * costs a hop. The largest drop ratio on the path adds a capped extra.
 */
export function provenancePenalty(provenance: Provenance, weights: PenaltyWeights): number {
  let penalty = 0;
  let decodes = 0;
  let maxDrop = 0;

  for (const step of provenance) {
    switch (step.kind) {
      case 'keep':
        penalty += weights.keep;
        break;
      case 'scan':
        penalty += weights.scan;
        break;
      case 'remove':
        penalty += step.removed.length > 1 ? weights.periodic : weights.removal;
        break;
      case 'periodic':
        penalty += weights.periodic;
        break;
      case 'repair':
        penalty += weights.repair;
        break;
      case 'decode':
        decodes++;
        if (EXOTIC_ENCODINGS.has(step.encoding)) penalty += weights.exoticEncoding;
        break;
      default:
        break;
    }
    maxDrop = Math.max(maxDrop, dropRatioOf(step));
  }

  penalty += Math.max(0, decodes - 1) * weights.nestedHop;
  penalty += Math.min(DROP_PENALTY_CAP, maxDrop * DROP_PENALTY_FACTOR);
  return penalty;
}

export interface OccamTier {
  minLetters: number;
  maxOthers: number;
  bonus: number;
}

/** Tiers checked in order; the floor applies when none matches. */
export interface OccamBonus {
  tiers: readonly OccamTier[];
  floor: number;
}

/** Punctuation that counts as ordinary plaintext for the Occam bonus. */
const PLAIN_PUNCTUATION: ReadonlySet<string> = new Set(Array.from(' _-.,:;!?/|()[]{}\'"\\'));
const LETTER = /\p{L}/u;
const ALNUM = /[\p{L}\p{N}]/u;

export function occamBonus(text: string, bonus: OccamBonus): number {
  const chars = Array.from(text);
  if (chars.length === 0) return 0;

  let letters = 0;
  let others = 0;
  for (const ch of chars) {
    if (LETTER.test(ch)) letters++;
    else if (!ALNUM.test(ch) && !PLAIN_PUNCTUATION.has(ch)) others++;
  }
  const letterShare = letters / chars.length;
  const otherShare = others / chars.length;

  for (const tier of bonus.tiers) {
    if (letterShare >= tier.minLetters && otherShare <= tier.maxOthers) {
      return tier.bonus;
    }
  }
  return bonus.floor;
}
