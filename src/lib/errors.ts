/**
 * Error handling utilities and message templates
 */

import type { ErrorGuidance } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

/**
 * Fixed error bodies and text messages returned to callers.
 * REST bodies are wrapped as `{ detail }`; MCP messages are returned as plain text.
 */
export const ERROR_MESSAGES = {
  // REST
  UNAUTHORIZED: 'Invalid or missing API key',
  NOT_FOUND: 'Not found',
  INTERNAL: 'Internal server error',
  GOVERNANCE_NOT_FOUND: (feature: string) => `No governance info for: ${feature}`,

  // MCP resources
  BEST_PRACTICE_NOT_FOUND: (id: string) => `Best practice '${id}' not found.`,
  SNIPPET_NOT_FOUND: (id: string) => `Snippet '${id}' not found.`,
  TROUBLESHOOTING_NOT_FOUND: (id: string) => `Troubleshooting guide '${id}' not found.`,
  TIP_NOT_FOUND: (id: string) => `Tip '${id}' not found.`,
  GOVERNANCE_RESOURCE_NOT_FOUND: (feature: string) => `Governance info for '${feature}' not found.`,

  // MCP tools
  NO_BEST_PRACTICES: 'No best practices found matching your query.',
  NO_SNIPPETS: 'No code snippets found matching your query.',
  NO_TROUBLESHOOTING: 'No troubleshooting guides found for this issue.',
  NO_TIPS: (feature: string) => `No tips found for '${feature}'.`,
  NO_GOVERNANCE: (feature: string) => `No governance information found for '${feature}'.`,
} as const;

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create error guidance with context
 */
export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  const guidance: ErrorGuidance = { message };
  if (hint !== undefined) guidance.hint = hint;
  if (resolution !== undefined) guidance.resolution = resolution;
  if (details !== undefined) guidance.details = details;
  return guidance;
}
