import { describeError, ParseError, TerminalFetchError, TransientNetworkError } from "./errors";
import { RateLimiter, RetryPolicy, sleep as defaultSleep, type Sleep } from "./retry";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  label: string;
  userAgent?: string;
  accept?: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  limiter?: RateLimiter;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export const DEFAULT_USER_AGENT = "DataPulseETL/1.0 (+educational scraping)";

// 408 and 429 are the only client errors worth another attempt.
const isTransientStatus = (status: number) =>
  status === 408 || status === 429 || status >= 500;

/**
 * GET-only client with a per-request timeout, rate limiting and bounded retry.
 * Each extractor builds its own instance so limiter state is never shared by
 * accident.
 */
export class HttpClient {
  readonly label: string;
  private readonly userAgent: string;
  private readonly accept: string | undefined;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  requestCount = 0;

  constructor(options: HttpClientOptions) {
    this.label = options.label;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.accept = options.accept;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry ?? new RetryPolicy();
    this.limiter = options.limiter ?? new RateLimiter({ minIntervalMs: 0 });
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  getText(url: string, options: RequestOptions = {}) {
    return this.request(url, (response) => response.text(), options);
  }

  getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request(url, (response) => response.json(), options);
  }

  getBytes(url: string, options: RequestOptions = {}) {
    return this.request(
      url,
      async (response) => Buffer.from(await response.arrayBuffer()),
      options,
    );
  }

  async request<T>(
    url: string,
    read: (response: Response) => Promise<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    const { signal } = options;

    for (let attempt = 1; ; attempt += 1) {
      signal?.throwIfAborted();
      await this.limiter.throttle(signal);

      try {
        return await this.requestOnce(url, read, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        if (!(error instanceof TransientNetworkError)) {
          throw error;
        }
        console.warn(
          `[${this.label}] ${error.message} (attempt ${attempt}/${this.retry.maxAttempts})`,
        );
        if (!this.retry.shouldRetry(attempt)) {
          throw error;
        }
        await this.sleep(this.retry.delayFor(attempt), signal);
      }
    }
  }

  // Releases the connection held by an unread error body.
  private async discardBody(response: Response) {
    try {
      await response.body?.cancel();
    } catch (error) {
      console.warn(`[${this.label}] could not discard body of ${response.url}:`, describeError(error));
    }
  }

  private async requestOnce<T>(
    url: string,
    read: (response: Response) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      this.requestCount += 1;
      let response: Response;
      try {
        const headers: Record<string, string> = { "User-Agent": this.userAgent };
        if (this.accept) {
          headers.Accept = this.accept;
        }
        response = await this.fetchImpl(url, { signal: controller.signal, headers });
      } catch (error) {
        const reason = controller.signal.aborted && !signal?.aborted
          ? `timed out after ${this.timeoutMs}ms`
          : describeError(error);
        throw new TransientNetworkError(url, `Request to ${url} failed: ${reason}`, null, error);
      }

      if (!response.ok) {
        await this.discardBody(response);
        if (isTransientStatus(response.status)) {
          throw new TransientNetworkError(
            url,
            `Fetch failed (${response.status}) for ${url}`,
            response.status,
          );
        }
        throw new TerminalFetchError(url, response.status);
      }

      try {
        return await read(response);
      } catch (error) {
        if (error instanceof SyntaxError) {
          throw new ParseError(url, `invalid response body (${error.message})`);
        }
        throw new TransientNetworkError(
          url,
          `Reading ${url} failed: ${describeError(error)}`,
          response.status,
          error,
        );
      }
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
