/**
 * Error types surfaced by the hole punching source.
 */

export type HolePunchErrorCode =
  | 'TRANSPORT_FAILED'
  | 'PROTOCOL_MISMATCH'
  | 'INVALID_MESSAGE'
  | 'CONNECT_TIMEOUT'
  | 'ABORTED';

export class HolePunchError extends Error {
  readonly code: HolePunchErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: HolePunchErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HolePunchError';
    this.code = code;
    this.context = context;
  }
}

export function isHolePunchError(err: unknown, code?: HolePunchErrorCode): err is HolePunchError {
  return err instanceof HolePunchError && (code === undefined || err.code === code);
}

/**
 * Normalise anything thrown into an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function describeError(err: unknown): string {
  const error = toError(err);
  return isHolePunchError(error) ? `${error.code}: ${error.message}` : error.message;
}
