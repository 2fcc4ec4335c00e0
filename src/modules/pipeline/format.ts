import { hintFor, type HintMode } from '../scoring/hint.js';
import type { Candidate } from '../strategies/types.js';

export const NO_CANDIDATES_MESSAGE = 'No candidates produced.';

/**
 * Plain-text listing of ranked candidates, one block per candidate:
 *
 *   [1] score=6.412  strategy=base64     scan[b64@7:27]->base64
 *        raw:   Hello, World!
 *
 * A naming hint line follows `raw:` when `hintMode` yields one.
 */
export function formatCandidates(candidates: readonly Candidate[], hintMode: HintMode = 'auto'): string {
  if (candidates.length === 0) {
    return NO_CANDIDATES_MESSAGE;
  }

  const lines: string[] = [];
  candidates.forEach((candidate, index) => {
    lines.push(
      `[${index + 1}] score=${candidate.score.toFixed(3)}  strategy=${candidate.strategyName.padEnd(10)} ${candidate.provenance}`
    );
    lines.push(`     raw:   ${candidate.text}`);
    const hint = hintFor(candidate.text, hintMode);
    if (hint) {
      lines.push(`     ${hint.label}: ${hint.value}`);
    }
    lines.push('');
  });
  return lines.join('\n');
}
