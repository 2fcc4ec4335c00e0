import { isControlChar, isMostlyPrintable } from '../codecs/text.js';
import {
  COMMON_BIGRAMS,
  COMMON_TETRAGRAMS,
  COMMON_TRIGRAMS,
  ENGLISH_LETTER_FREQUENCY,
  ENGLISH_TARGET_IC,
  VOWELS,
} from './englishStats.js';

/**
 * Signal weights. Frequency, coincidence and character-class dominate;
 * n-grams and wordness break ties; the rest gate short or binary-looking text.
 */
export const FITNESS_WEIGHTS = {
  frequency: 3.0,
  coincidence: 2.5,
  charClass: 1.3,
  ngram: 1.2,
  caseTransition: 0.6,
  separator: 0.1,
  separatorCap: 1.0,
  wordBase: 0.15,
  wordVowelFit: 0.25,
  wordCap: 8,
} as const;

export const FITNESS_PENALTIES = {
  paddingMarker: 0.8,
  controlPerChar: 0.5,
  controlCap: 2.0,
  shortText: 0.75,
  veryShortText: 1.5,
  tailNoise: 0.6,
} as const;

const DAMPING_LENGTH = 16;
const UNPRINTABLE_FACTOR = 0.6;
const TARGET_VOWEL_RATIO = 0.45;

const WORD_SEPARATORS = /[\s_\-.,:;!?/|()[\]{}'"\\]+/;
const TAIL_SEPARATORS = /[\s_-]+/;
const ALPHA_WORD = /^[A-Za-z]{3,}$/;
const TAIL_NOISE = /^[A-Z]{2,5}$/;

function isAsciiLetter(ch: string): boolean {
  return (ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z');
}

function isAsciiDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function letterCounts(text: string): { counts: Map<string, number>; total: number } {
  const counts = new Map<string, number>();
  let total = 0;
  for (const ch of text.toUpperCase()) {
    if (ch >= 'A' && ch <= 'Z') {
      counts.set(ch, (counts.get(ch) ?? 0) + 1);
      total++;
    }
  }
  return { counts, total };
}

/** `1 / (1 + chi²)` against English unigram frequencies; 0 when there are no letters. */
export function chiSquareFit(text: string): number {
  const { counts, total } = letterCounts(text);
  if (total === 0) return 0;

  let chi = 0;
  for (const [letter, percent] of Object.entries(ENGLISH_LETTER_FREQUENCY)) {
    const expected = total * (percent / 100);
    const observed = counts.get(letter) ?? 0;
    chi += (observed - expected) ** 2 / expected;
  }
  return 1 / (1 + chi);
}

export function indexOfCoincidence(text: string): number {
  const { counts, total } = letterCounts(text);
  if (total < 2) return 0;

  let numerator = 0;
  for (const count of counts.values()) {
    numerator += count * (count - 1);
  }
  return numerator / (total * (total - 1));
}

/** Closeness of the IC to English, in [0, 1]. */
export function coincidenceScore(text: string): number {
  const { total } = letterCounts(text);
  if (total < 2) return 0;
  const ic = indexOfCoincidence(text);
  return Math.max(0, 1 - Math.abs(ic - ENGLISH_TARGET_IC) / ENGLISH_TARGET_IC);
}

/** Weighted count of common English bi/tri/tetragrams, case-insensitive. */
export function ngramHits(text: string): number {
  const lower = text.toLowerCase();
  let bigrams = 0;
  let trigrams = 0;
  let tetragrams = 0;

  for (let i = 0; i < lower.length; i++) {
    if (COMMON_BIGRAMS.has(lower.slice(i, i + 2))) bigrams++;
    if (i + 3 <= lower.length && COMMON_TRIGRAMS.has(lower.slice(i, i + 3))) trigrams++;
    if (i + 4 <= lower.length && COMMON_TETRAGRAMS.has(lower.slice(i, i + 4))) tetragrams++;
  }
  return bigrams * 0.6 + trigrams * 1.0 + tetragrams * 1.5;
}

/**
 * Reward letters, penalise digits and symbols. Spaces, underscores and
 * hyphens are neutral separators. A `==` padding marker outside a decoder is
 * a strong hint the text is still encoded.
 */
export function charClassScore(text: string): number {
  const chars = Array.from(text);
  const n = chars.length;
  if (n === 0) return 0;

  let letters = 0;
  let digits = 0;
  let separators = 0;
  for (const ch of chars) {
    if (isAsciiLetter(ch)) letters++;
    else if (isAsciiDigit(ch)) digits++;
    else if (ch === ' ' || ch === '_' || ch === '-') separators++;
  }
  const others = n - letters - digits - separators;

  let score = (letters / n) * 2.2 - (digits / n) * 0.9 - (others / n) * 2.2;
  if (text.includes('==')) score -= FITNESS_PENALTIES.paddingMarker;
  return score;
}

/** Alphabetic runs of three or more letters between separators. */
export function extractWords(text: string): string[] {
  return text.split(WORD_SEPARATORS).filter((token) => ALPHA_WORD.test(token));
}

export function wordnessScore(text: string): number {
  const words = extractWords(text).slice(0, FITNESS_WEIGHTS.wordCap);
  let score = 0;
  for (const word of words) {
    const lower = word.toLowerCase();
    let vowels = 0;
    for (const ch of lower) {
      if (VOWELS.has(ch)) vowels++;
    }
    const ratio = vowels / lower.length;
    const fit = Math.max(0, 1 - Math.abs(ratio - TARGET_VOWEL_RATIO) / TARGET_VOWEL_RATIO);
    score += FITNESS_WEIGHTS.wordBase + FITNESS_WEIGHTS.wordVowelFit * fit;
  }
  return score;
}

export function controlCharPenalty(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (isControlChar(ch)) count++;
  }
  return Math.min(FITNESS_PENALTIES.controlCap, count * FITNESS_PENALTIES.controlPerChar);
}

export function shortTextPenalty(length: number): number {
  if (length <= 2) return FITNESS_PENALTIES.veryShortText;
  if (length < 4) return FITNESS_PENALTIES.shortText;
  return 0;
}

/** A trailing 2-5 letter all-caps token is a typical truncated-decode artifact. */
export function tailNoisePenalty(text: string): number {
  const tokens = text.split(TAIL_SEPARATORS).filter((token) => token.length > 0);
  const last = tokens[tokens.length - 1];
  if (last !== undefined && TAIL_NOISE.test(last)) {
    return FITNESS_PENALTIES.tailNoise;
  }
  return 0;
}

/** Insert `_` at every lower→upper transition, then lowercase. */
export function snakeFromCamel(text: string): string {
  let out = '';
  let previous = '';
  for (const ch of text) {
    if (previous >= 'a' && previous <= 'z' && ch >= 'A' && ch <= 'Z') {
      out += '_';
    }
    out += ch;
    previous = ch;
  }
  return out.toLowerCase();
}

function separatorBonus(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === ' ' || ch === '_') count++;
  }
  return Math.min(FITNESS_WEIGHTS.separatorCap, count * FITNESS_WEIGHTS.separator);
}

/**
 * English-likelihood of arbitrary text. Pure and total: any string, including
 * the empty one, yields a finite number. Higher is better; negative is valid.
 */
export function scoreText(text: string): number {
  const length = Array.from(text).length;
  const damping = Math.min(1, length / DAMPING_LENGTH);

  let score =
    damping *
    (FITNESS_WEIGHTS.frequency * chiSquareFit(text) +
      FITNESS_WEIGHTS.coincidence * coincidenceScore(text) +
      FITNESS_WEIGHTS.charClass * charClassScore(text) +
      FITNESS_WEIGHTS.ngram * ngramHits(text));

  const snake = snakeFromCamel(text);
  if (snake !== text.toLowerCase()) {
    score += damping * FITNESS_WEIGHTS.caseTransition * ngramHits(snake);
  }

  score += wordnessScore(text);
  score += separatorBonus(text);

  score -= controlCharPenalty(text);
  score -= shortTextPenalty(length);
  score -= tailNoisePenalty(text);

  if (score > 0 && !isMostlyPrintable(text)) {
    score *= UNPRINTABLE_FACTOR;
  }
  return score;
}
