import { BASE45_ALPHABET, decodeBase45 } from '../codecs/base45.js';
import { defineAlphabetFamilyStrategy } from './alphabetFamily.js';

export const base45Strategy = defineAlphabetFamilyStrategy({
  name: 'base45',
  description: 'RFC 9285 Base45 with keep-only stripping, periodic junk deletion and token scanning.',
  tag: 'b45',
  alphabet: BASE45_ALPHABET,
  decode: decodeBase45,
  defaultMinTokenLen: 6,
  occam: {
    tiers: [
      { minLetters: 0.75, maxOthers: 0.05, bonus: 1.3 },
      { minLetters: 0.6, maxOthers: 0.1, bonus: 0.7 },
    ],
    floor: 0.2,
  },
});
