/** English unigram frequencies, percent. */
export const ENGLISH_LETTER_FREQUENCY: Readonly<Record<string, number>> = {
  A: 8.12, B: 1.49, C: 2.71, D: 4.32, E: 12.02, F: 2.3, G: 2.03, H: 5.92, I: 7.31,
  J: 0.1, K: 0.69, L: 3.98, M: 2.61, N: 6.95, O: 7.68, P: 1.82, Q: 0.11, R: 6.02,
  S: 6.28, T: 9.1, U: 2.88, V: 1.11, W: 2.09, X: 0.17, Y: 2.11, Z: 0.07,
};

export const ENGLISH_TARGET_IC = 0.066;

export const COMMON_BIGRAMS: ReadonlySet<string> = new Set(
  ('th he in er an re on at en nd ti es or te of ed is it al ar st to nt ng ' +
    'se ha as ou io le ve co me de hi ri ro').split(' ')
);

export const COMMON_TRIGRAMS: ReadonlySet<string> = new Set(
  'the and ing her hat his tha ere for ent ion ter you thi not are all wit ver'.split(' ')
);

export const COMMON_TETRAGRAMS: ReadonlySet<string> = new Set(
  'tion atio nthe thed that ther here ethe'.split(' ')
);

export const VOWELS: ReadonlySet<string> = new Set(['a', 'e', 'i', 'o', 'u']);
