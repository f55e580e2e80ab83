import pLimit from 'p-limit';
import { Agent, fetch as undiciFetch } from 'undici';
import { CONFIG } from '../config';
import { InterruptedError, TransportError, errorMessage, throwIfInterrupted } from '../errors';
import logger from '../logger';
import { incTransportError, observeRequestLatency } from '../metrics';

const USER_AGENT = 'dns-scavenger/0.1';

/** The subset of a fetch `Response` the transport reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  body?: { cancel(): Promise<void> } | null;
  json(): Promise<unknown>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface HttpTransportOptions {
  username: string;
  password: string;
  concurrency?: number; // request slots shared by every caller of this transport
  timeoutMs?: number; // per-request timeout
  verifyTls?: boolean;
  maxConnections?: number;
  keepAliveTimeoutMs?: number;
  signal?: AbortSignal; // run-level cancellation
  fetch?: HttpFetch; // replaces the undici pool, used by tests
}

/**
 * Authenticated JSON GET client with a shared concurrency gate.
 *
 * Every request holds one `p-limit` slot from dispatch until its body is parsed or it fails,
 * so concurrent callers (one per record type) never exceed `concurrency` requests in flight.
 * Nothing is retried: non-2xx, network errors, timeouts and unparsable bodies all surface as
 * `TransportError`; a cancelled run surfaces as `InterruptedError`.
 */
export class HttpTransport {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly agent: Agent | null;
  private readonly fetchImpl: HttpFetch;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly signal?: AbortSignal;
  private closed = false;

  constructor(opts: HttpTransportOptions) {
    this.limit = pLimit(opts.concurrency ?? CONFIG.CONCURRENCY.REQUESTS);
    this.timeoutMs = opts.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
    this.signal = opts.signal;
    this.authorization = `Basic ${Buffer.from(`${opts.username}:${opts.password}`).toString('base64')}`;

    if (opts.fetch) {
      this.agent = null;
      this.fetchImpl = opts.fetch;
    } else {
      const agent = new Agent({
        connections: opts.maxConnections ?? CONFIG.CONCURRENCY.MAX_CONNECTIONS,
        keepAliveTimeout: opts.keepAliveTimeoutMs ?? CONFIG.CONCURRENCY.KEEPALIVE_TIMEOUT_MS,
        connect: { rejectUnauthorized: opts.verifyTls ?? !CONFIG.WAPI.TLS_INSECURE },
      });
      this.agent = agent;
      this.fetchImpl = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
    }
  }

  /** Requests currently holding a slot. */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Requests waiting for a slot. */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  getJson(url: string): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new Error('HttpTransport is closed'));
    }
    return this.limit(() => this.execute(url));
  }

  /**
   * Drop queued requests and release pooled connections. Requests still in flight (left behind
   * when a sibling fetch failed) are torn down rather than awaited. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.limit.clearQueue();
    if (!this.agent) return;
    if (this.limit.activeCount > 0) {
      await this.agent.destroy();
    } else {
      await this.agent.close();
    }
  }

  private async execute(url: string): Promise<unknown> {
    // A request may have waited for its slot while the run was being cancelled.
    throwIfInterrupted(this.signal);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    this.signal?.addEventListener('abort', onAbort, { once: true });
    const started = performance.now();

    try {
      let res: HttpResponse;
      try {
        res = await this.fetchImpl(url, {
          headers: {
            Accept: 'application/json',
            Authorization: this.authorization,
            'User-Agent': USER_AGENT,
          },
          signal: controller.signal,
        });
      } catch (err) {
        throw this.failure(url, err, timedOut, 'network');
      }

      if (!res.ok) {
        logger.debug({ url, status: res.status }, 'wapi request returned non-success status');
        // Unread bodies keep the pooled socket busy.
        await res.body?.cancel().catch((err: unknown) => {
          logger.debug({ url, err }, 'discarding error response body failed');
        });
        incTransportError('status');
        throw new TransportError(`GET ${url} failed: HTTP ${res.status} ${res.statusText}`.trim(), {
          url,
          reason: 'status',
          status: res.status,
        });
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw this.failure(url, err, timedOut, 'payload');
      }
      observeRequestLatency((performance.now() - started) / 1000);
      return body;
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener('abort', onAbort);
    }
  }

  private failure(url: string, err: unknown, timedOut: boolean, stage: 'network' | 'payload'): Error {
    if (this.signal?.aborted) {
      logger.debug({ url }, 'wapi request cancelled');
      return new InterruptedError();
    }
    if (timedOut) {
      logger.debug({ url, timeoutMs: this.timeoutMs }, 'wapi request timed out');
      incTransportError('timeout');
      return new TransportError(`GET ${url} timed out after ${this.timeoutMs}ms`, {
        url,
        reason: 'timeout',
        cause: err,
      });
    }
    logger.debug({ url, err }, `wapi ${stage} error`);
    incTransportError(stage);
    const what = stage === 'payload' ? 'returned an unreadable body' : 'failed';
    return new TransportError(`GET ${url} ${what}: ${errorMessage(err)}`, { url, reason: stage, cause: err });
  }
}

export default HttpTransport;
