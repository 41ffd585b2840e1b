/**
 * Per-call conversion context.
 *
 * The signal is observed between fields and collection elements, and is handed
 * to types and validation hooks so they can stop long-running work.
 */
export interface ConversionContext {
  readonly signal?: AbortSignal;
}

/** A context that is never cancelled. */
export const BACKGROUND: ConversionContext = Object.freeze({});

/**
 * Describes why the context was cancelled, or returns undefined while it is
 * still live.
 */
export function cancellationReason(ctx: ConversionContext): string | undefined {
  const signal = ctx.signal;
  if (signal === undefined || !signal.aborted) {
    return undefined;
  }
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return reason === undefined ? "aborted" : String(reason);
}
