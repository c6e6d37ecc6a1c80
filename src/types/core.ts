/**
 * Core type definitions shared by the REST and MCP front ends.
 */

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the caller */
  hint?: string;
  /** Specific resolution steps */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling.
 *
 * Tool handlers return a Result instead of throwing so a failure can be
 * rendered as tool output rather than bubbling through the MCP transport.
 *
 * @example
 * ```typescript
 * const result = await searchTool.handler(input, context);
 * if (result.ok) {
 *   console.log(result.value);
 * } else if (result.guidance?.hint) {
 *   console.error(result.error, result.guidance.hint);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};
