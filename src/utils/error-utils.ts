/**
 * Consistent message extraction and wrapping for thrown values.
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Prefix the message with context; Error instances are kept as `cause`. */
export function wrapError(error: unknown, context: string): Error {
  const message = `${context}: ${getErrorMessage(error)}`;
  return error instanceof Error ? new Error(message, { cause: error }) : new Error(message);
}
