import { extractWords, snakeFromCamel } from './fitness.js';

export type HintLabel = 'snake' | 'lower';
export const HINT_MODES = ['auto', 'always', 'never'] as const;
export type HintMode = (typeof HINT_MODES)[number];

export function isHintMode(value: unknown): value is HintMode {
  return HINT_MODES.some((mode) => mode === value);
}

export interface NamingHint {
  label: HintLabel;
  value: string;
}

/**
 * Suggest an identifier-style rendering of a single-token candidate.
 * camelCase that splits into more words becomes snake_case; any other
 * mixed- or upper-case token is lowercased. Sentences get no hint.
 */
export function namingHint(text: string): NamingHint | undefined {
  const trimmed = text.trim();
  if (trimmed.length === 0 || /\s/.test(trimmed) || !/[A-Za-z]/.test(trimmed)) {
    return undefined;
  }

  const lower = trimmed.toLowerCase();
  const snake = snakeFromCamel(trimmed);
  if (snake !== lower && extractWords(snake).length > extractWords(lower).length) {
    return { label: 'snake', value: snake };
  }
  if (lower !== trimmed) {
    return { label: 'lower', value: lower };
  }
  return undefined;
}

/** Apply a display mode: `always` forces the snake rendering, `never` suppresses hints. */
export function hintFor(text: string, mode: HintMode): NamingHint | undefined {
  switch (mode) {
    case 'never':
      return undefined;
    case 'always':
      return { label: 'snake', value: snakeFromCamel(text) };
    case 'auto':
      return namingHint(text);
  }
}
