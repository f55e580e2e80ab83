import { CONFIG } from '../config';
import logger from '../logger';
import { HttpTransport, type HttpFetch } from '../net/httpTransport';
import { RecordFetcher, wapiBaseUrl } from './recordFetcher';

export interface ScavengerSessionOptions {
  gridHost: string;
  username: string;
  password: string;
  wapiVersion?: string;
  verifyTls?: boolean;
  concurrency?: number;
  timeoutMs?: number;
  pageSize?: number;
  signal?: AbortSignal;
  fetch?: HttpFetch;
}

export interface ScavengerSession {
  readonly fetcher: RecordFetcher;
  readonly transport: HttpTransport;
  close(): Promise<void>;
}

/**
 * Create the per-run transport (slot pool + connection pool) and the fetcher bound to it.
 * The caller owns the session and must `close()` it; prefer `withScavengerSession`.
 */
export function openScavengerSession(opts: ScavengerSessionOptions): ScavengerSession {
  const verifyTls = opts.verifyTls ?? !CONFIG.WAPI.TLS_INSECURE;
  if (!verifyTls) {
    logger.warn({ gridHost: opts.gridHost }, 'TLS certificate verification is disabled for this run');
  }

  const transport = new HttpTransport({
    username: opts.username,
    password: opts.password,
    verifyTls,
    concurrency: opts.concurrency,
    timeoutMs: opts.timeoutMs,
    signal: opts.signal,
    fetch: opts.fetch,
  });
  const fetcher = new RecordFetcher(transport, {
    baseUrl: wapiBaseUrl(opts.gridHost, opts.wapiVersion),
    pageSize: opts.pageSize,
  });

  return {
    fetcher,
    transport,
    close: () => transport.close(),
  };
}

/**
 * Run `fn` with a fresh session, releasing it on every exit path.
 */
export async function withScavengerSession<T>(
  opts: ScavengerSessionOptions,
  fn: (session: ScavengerSession) => Promise<T>,
): Promise<T> {
  const session = openScavengerSession(opts);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
