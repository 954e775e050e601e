/**
 * Error types shared by the gateway and the orchestrator.
 */

/**
 * A failed exchange with the OGC API - Processes server: non-success
 * HTTP status, unreachable server, or a response that does not match
 * the expected document.
 */
export class GatewayError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GatewayError';
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * The surrounding run was cancelled (e.g. Ctrl+C). Never retried and
 * never swallowed, except by the best-effort cleanup sequence.
 */
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isCancellation(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Throw CancelledError if the signal has been aborted.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw cancelledFrom(signal);
}

/**
 * The CancelledError carried by an aborted signal, or a fresh one when the
 * signal was aborted with some other reason.
 */
export function cancelledFrom(signal: AbortSignal): CancelledError {
  return signal.reason instanceof CancelledError ? signal.reason : new CancelledError();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
