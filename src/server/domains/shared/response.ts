import type { ToolResponse } from '../../types.js';
import { ToolError, USER_CORRECTABLE_CODES, type ToolErrorCode } from '../../../errors/ToolError.js';
import type { DecipherReport, RankedCandidate } from '../../../modules/pipeline/decipher.js';
import type { NamingHint } from '../../../modules/scoring/hint.js';

/** Decimal places kept for scores on the wire. */
export const SCORE_PRECISION = 4;

export interface CandidatePayload {
  rank: number;
  strategy: string;
  provenance: string;
  text: string;
  score: number;
  hint: NamingHint | null;
}

export interface ErrorPayload {
  success: false;
  code: ToolErrorCode;
  message: string;
  tool?: string;
  details?: Record<string, unknown>;
}

function jsonContent(payload: unknown, isError: boolean): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function asJsonResponse(payload: unknown): ToolResponse {
  return jsonContent(payload, false);
}

export function toCandidatePayload(candidate: RankedCandidate): CandidatePayload {
  return {
    rank: candidate.rank,
    strategy: candidate.strategyName,
    provenance: candidate.provenance,
    text: candidate.text,
    score: Number(candidate.score.toFixed(SCORE_PRECISION)),
    hint: candidate.hint ?? null,
  };
}

/**
 * The ranked list plus what happened along the way: per-strategy timings,
 * faults as diagnostics, and whether the run budget ran out.
 */
export function asDecipherResponse(report: DecipherReport): ToolResponse {
  return asJsonResponse({
    success: true,
    candidates: report.ranked.map(toCandidatePayload),
    totalCandidates: report.totalCandidates,
    budgetExceeded: report.budgetExceeded,
    diagnostics: report.diagnostics,
    strategies: report.strategies,
  });
}

/**
 * Every failure comes back as an `ErrorPayload`. VALIDATION and NOT_FOUND
 * omit `isError` so the caller can fix its arguments and retry; anything
 * that is not a `ToolError` is reported as RUNTIME.
 */
export function toolErrorToResponse(error: unknown): ToolResponse {
  if (error instanceof ToolError) {
    const payload: ErrorPayload = { success: false, code: error.code, message: error.message };
    if (error.toolName) payload.tool = error.toolName;
    if (error.details) payload.details = error.details;
    return jsonContent(payload, !USER_CORRECTABLE_CODES.has(error.code));
  }

  const payload: ErrorPayload = {
    success: false,
    code: 'RUNTIME',
    message: error instanceof Error ? error.message : String(error),
  };
  return jsonContent(payload, true);
}
