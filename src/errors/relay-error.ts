/**
 * Relay Error - Base error class for the task relay
 */

import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './error-codes';

export class RelayError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;

  constructor(code: ErrorCode, context?: string) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'RelayError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, RelayError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RelayError);
    }
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
