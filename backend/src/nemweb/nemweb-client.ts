import { Logger } from "@nestjs/common";

import { Duration, FetchError, describeError } from "@nemcast/domain";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
}

export interface NemwebClientOptions {
  baseUrl: string;
  listingTimeoutMs: number;
  downloadTimeoutMs: number;
  userAgent: string;
  retry: RetryPolicy;
  fetchImpl: FetchLike;
  /** Context label for log lines, usually the owning region. */
  label?: string;
}

/** Delay before retry number `retry` (1-based): base, 2×base, 4×base … capped. */
export function backoffDelayMs(retry: number, policy: RetryPolicy): number {
  const base = Duration.fromMilliseconds(policy.base_delay_ms);
  const cap = Duration.fromMilliseconds(policy.max_delay_ms);
  return base.times(2 ** Math.max(0, retry - 1)).min(cap).milliseconds;
}

export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new FetchError("network", "Request cancelled"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new FetchError("network", "Request cancelled"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, {once: true});
  });
}

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export class NemwebClient {
  private readonly logger: Logger;

  constructor(private readonly options: NemwebClientOptions) {
    this.logger = new Logger(options.label ? `${NemwebClient.name}:${options.label}` : NemwebClient.name);
  }

  urlFor(path: string): string {
    return `${this.options.baseUrl}${path}`;
  }

  getText(path: string, signal: AbortSignal): Promise<string> {
    return this.requestWithRetry(this.urlFor(path), this.options.listingTimeoutMs, signal, (response) =>
      response.text(),
    );
  }

  getBytes(path: string, signal: AbortSignal): Promise<Uint8Array> {
    return this.requestWithRetry(
      this.urlFor(path),
      this.options.downloadTimeoutMs,
      signal,
      async (response) => new Uint8Array(await response.arrayBuffer()),
    );
  }

  private async requestWithRetry<T>(
    url: string,
    timeoutMs: number,
    signal: AbortSignal,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const {max_attempts: maxAttempts} = this.options.retry;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal.aborted) {
        throw new FetchError("network", `GET ${url} cancelled`);
      }
      try {
        return await this.attempt(url, timeoutMs, signal, read);
      } catch (error) {
        if (error instanceof FetchError && error.kind === "not_found") {
          throw error;
        }
        if (signal.aborted) {
          throw new FetchError("network", `GET ${url} cancelled`, {cause: error});
        }
        lastError = error;
        if (attempt < maxAttempts) {
          const delayMs = backoffDelayMs(attempt, this.options.retry);
          this.logger.warn(
            `GET ${url} failed (attempt ${attempt}/${maxAttempts}): ${describeError(error)}; retrying in ${delayMs} ms`,
          );
          await abortableDelay(delayMs, signal);
        }
      }
    }

    const status = lastError instanceof FetchError ? lastError.status : null;
    throw new FetchError("network", `GET ${url} failed after ${maxAttempts} attempts: ${describeError(lastError)}`, {
      status,
      cause: lastError,
    });
  }

  private async attempt<T>(
    url: string,
    timeoutMs: number,
    signal: AbortSignal,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener("abort", onAbort, {once: true});
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      this.logger.verbose(`GET ${url}`);
      const response = await this.options.fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          "Accept": "text/html,application/zip,application/octet-stream,*/*",
        },
        signal: controller.signal,
      });
      if (!response.ok) {
        const kind = isRetryableStatus(response.status) ? "network" : "not_found";
        throw new FetchError(kind, `HTTP ${response.status} ${response.statusText}`, {status: response.status});
      }
      return await read(response);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    }
  }
}
