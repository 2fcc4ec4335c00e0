/**
 * Classified error with a machine-readable code.
 *
 * The MCP layer turns these into structured responses: user-correctable codes
 * (VALIDATION, NOT_FOUND) come back without `isError` so the caller can fix its
 * input and retry; the rest are reported as tool failures.
 */

export type ToolErrorCode =
  | 'VALIDATION'     // malformed arguments or run configuration
  | 'NOT_FOUND'      // unknown tool name
  | 'RUNTIME';       // unexpected internal failure

/** Codes the caller can fix by changing its input. */
export const USER_CORRECTABLE_CODES: ReadonlySet<ToolErrorCode> = new Set([
  'VALIDATION',
  'NOT_FOUND',
]);

export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly toolName?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ToolErrorCode,
    message: string,
    options?: {
      toolName?: string;
      details?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ToolError';
    this.code = code;
    this.toolName = options?.toolName;
    this.details = options?.details;
  }
}
