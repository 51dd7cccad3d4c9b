/**
 * Shared Error Handling Utilities
 *
 * The error classes themselves live in @mev-sentinel/types. These helpers
 * normalize unknown thrown values and shape errors for HTTP bodies.
 */

import { AnalyzerError, ErrorCode } from '@mev-sentinel/types';

/**
 * Normalize a caught value to an Error instance.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : `Non-error thrown: ${String(error)}`);
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * Body for an HTTP error response. Never includes the stack.
 */
export function formatErrorForResponse(error: unknown): {
  code: number;
  message: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof AnalyzerError) {
    return {
      code: error.code,
      message: error.message,
      details: error.context
    };
  }

  return {
    code: ErrorCode.UNKNOWN_ERROR,
    message: getErrorMessage(error)
  };
}
