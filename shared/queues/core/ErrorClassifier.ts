/**
 * Notification Dispatch - Error Classification
 *
 * Maps an exception thrown out of a handler to a task outcome. Errors that
 * match neither list are treated as retryable.
 */

import { TaskOutcome } from '../types/interfaces';

const RETRYABLE_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /rate limit/i,
  /too many requests/i,
  /temporar/i,
  /unavailable/i,
  /network/i,
  /connection/i,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /ETIMEDOUT/,
  /EAI_AGAIN/,
  /\b50[234]\b/,
  /\b429\b/,
];

const NON_RETRYABLE_PATTERNS = [
  /validation/i,
  /unauthorized/i,
  /forbidden/i,
  /not found/i,
  /does not exist/i,
  /bad request/i,
  /invalid/i,
  /\b40[0134]\b/,
];

function describe(error: unknown): { text: string; message: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
    return { text: `${error.name} ${code} ${error.message}`, message: error.message || error.name };
  }
  return { text: String(error), message: String(error) };
}

export function classifyError(error: unknown): TaskOutcome {
  const { text, message } = describe(error);

  if (RETRYABLE_PATTERNS.some(pattern => pattern.test(text))) {
    return TaskOutcome.retryable(message);
  }
  if (NON_RETRYABLE_PATTERNS.some(pattern => pattern.test(text))) {
    return TaskOutcome.fatal(message);
  }
  return TaskOutcome.retryable(message);
}
