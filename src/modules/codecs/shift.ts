const LOWER_A = 97;
const UPPER_A = 65;

export type ShiftMode = 'decode' | 'encode';
export type ShiftOrder = 'LTR' | 'RTL';

function mod26(value: number): number {
  return ((value % 26) + 26) % 26;
}

/** Shift one ASCII letter by `k` places, preserving case. Anything else passes through. */
export function shiftChar(ch: string, k: number): string {
  const code = ch.charCodeAt(0);
  if (ch.length !== 1) return ch;
  if (code >= LOWER_A && code < LOWER_A + 26) {
    return String.fromCharCode(LOWER_A + mod26(code - LOWER_A + k));
  }
  if (code >= UPPER_A && code < UPPER_A + 26) {
    return String.fromCharCode(UPPER_A + mod26(code - UPPER_A + k));
  }
  return ch;
}

/** Undo a Caesar shift of `k` (ROT-N decode). */
export function rotN(text: string, k: number): string {
  return Array.from(text, (ch) => shiftChar(ch, -k)).join('');
}

export interface ProgressiveShiftParams {
  startKey: number;
  step: number;
  mode: ShiftMode;
  order: ShiftOrder;
}

/**
 * Position-dependent Caesar shift. The character at logical position `j`
 * (counted from the left for LTR, from the right for RTL) is shifted by
 * `(startKey + j * step) mod 26`; decode shifts backwards, encode forwards.
 * Positions count every character, letters or not.
 */
export function progressiveShift(text: string, params: ProgressiveShiftParams): string {
  const chars = Array.from(text);
  const n = chars.length;
  const sign = params.mode === 'decode' ? -1 : 1;

  return chars
    .map((ch, i) => {
      const j = params.order === 'LTR' ? i : n - 1 - i;
      const k = mod26(params.startKey + j * params.step);
      return shiftChar(ch, sign * k);
    })
    .join('');
}
