/**
 * `AbortSignal.timeout()` aborts with a `TimeoutError` DOMException; any other
 * reason means someone canceled on purpose.
 */
export const isDeadlineReason = (reason: unknown): boolean =>
  reason instanceof Error && reason.name === 'TimeoutError';

export function describeCause(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return reason === undefined ? 'unknown reason' : String(reason);
}
