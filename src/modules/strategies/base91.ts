import { BASE91_ALPHABET, decodeBase91 } from '../codecs/base91.js';
import { defineAlphabetFamilyStrategy } from './alphabetFamily.js';

export const base91Strategy = defineAlphabetFamilyStrategy({
  name: 'base91',
  description: 'basE91 with keep-only stripping, periodic junk deletion and token scanning.',
  tag: 'b91',
  alphabet: BASE91_ALPHABET,
  decode: decodeBase91,
  defaultMinTokenLen: 8,
  occam: {
    tiers: [
      { minLetters: 0.7, maxOthers: 0.08, bonus: 1.1 },
      { minLetters: 0.55, maxOthers: 0.12, bonus: 0.6 },
    ],
    floor: 0.2,
  },
});
