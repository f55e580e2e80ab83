/**
 * Error taxonomy.
 *
 * - `TransportError`: network failure, timeout, non-2xx status or a page that does not match the
 *   expected payload. Never retried; aborts the run.
 * - `ConfigurationError`: bad operator input. Threshold problems are recovered with defaults,
 *   anything else is fatal at the CLI.
 * - `InterruptedError`: the run was cancelled by the operator.
 */

export type TransportFailure = 'status' | 'network' | 'timeout' | 'payload';

export class TransportError extends Error {
  readonly url: string;
  readonly reason: TransportFailure;
  readonly status?: number;

  constructor(message: string, opts: { url: string; reason: TransportFailure; status?: number; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = 'TransportError';
    this.url = opts.url;
    this.reason = opts.reason;
    this.status = opts.status;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InterruptedError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'InterruptedError';
  }
}

/** Throw `InterruptedError` once the run signal has fired. */
export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new InterruptedError();
}

/** Render an unknown thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
