/**
 * HTTP Fetcher
 *
 * The only place that talks to agency websites. Each call:
 * 1. GETs the URL with a receive timeout and a browser-like user agent
 * 2. Classifies failures (timeout, connection, DNS, 429, other HTTP status)
 * 3. Retries transient failures with exponential backoff; 429 waits longer
 * 4. Returns a Result instead of throwing
 *
 * Request pacing between calls is not done here; see RequestPacer.
 */
import axios, { AxiosInstance, AxiosResponse } from "axios";
import config from "../../config";
import { RATE_LIMIT_BACKOFF_MULTIPLIER } from "../../config/constants";
import { metrics } from "../../monitoring/metrics.collector";
import { FetchError, errorMessage } from "../../shared/errors/scrape.errors";
import { Result, err, ok } from "../../shared/types/result.types";
import { retryWithBackoff } from "../../shared/utils/retry";

export type HttpClient = Pick<AxiosInstance, "get">;

export interface FetchSuccess {
  url: string;
  status: number;
  body: string;
  attempts: number;
  retries: number;
}

export interface PageFetcher {
  fetch(url: string): Promise<Result<FetchSuccess, FetchError>>;
}

export interface FetcherOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  userAgent?: string;
  /** Backoff jitter ratio (0 disables jitter) */
  jitter?: number;
  client?: HttpClient;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ESOCKETTIMEDOUT"]);
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);
const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/** Map a thrown request error onto a FetchError kind */
export function classifyRequestError(error: unknown, url: string): FetchError {
  const code = errorCode(error) ?? "";
  const message = errorMessage(error);

  if (TIMEOUT_CODES.has(code)) return new FetchError("timeout", url, message);
  if (CONNECTION_CODES.has(code)) return new FetchError("connection", url, message);
  if (DNS_CODES.has(code)) return new FetchError("dns", url, message);
  return new FetchError("unknown", url, message);
}

export class HttpFetcher implements PageFetcher {
  private readonly client: HttpClient;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly userAgent: string;
  private readonly jitter: number;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.fetchTimeoutMs;
    this.maxAttempts = options.maxAttempts ?? config.fetchMaxAttempts;
    this.baseDelayMs = options.baseDelayMs ?? config.fetchBaseDelayMs;
    this.userAgent = options.userAgent ?? config.userAgent;
    this.jitter = options.jitter ?? 0.2;
    this.client = options.client ?? axios.create();
  }

  async fetch(url: string): Promise<Result<FetchSuccess, FetchError>> {
    let attempts = 0;
    let retries = 0;

    try {
      const response = await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          return this.request(url);
        },
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.baseDelayMs,
          label: `GET ${url}`,
          jitter: this.jitter,
          shouldRetry: (error) => error instanceof FetchError && error.retryable,
          delayMultiplier: (error) =>
            error instanceof FetchError && error.kind === "rate_limited"
              ? RATE_LIMIT_BACKOFF_MULTIPLIER
              : 1,
          onRetry: () => {
            retries++;
          },
        }
      );

      metrics.increment("fetch_requests_total", { result: "success" });
      return ok({ url, status: response.status, body: response.body, attempts, retries });
    } catch (error) {
      const failure =
        error instanceof FetchError ? error : new FetchError("unknown", url, errorMessage(error));
      failure.attempts = attempts;
      metrics.increment("fetch_requests_total", { result: failure.kind });
      return err(failure);
    }
  }

  private async request(url: string): Promise<{ status: number; body: string }> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, {
        timeout: this.timeoutMs,
        responseType: "text",
        // Status handling happens below so 4xx/5xx can be classified
        validateStatus: () => true,
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
      });
    } catch (error) {
      throw classifyRequestError(error, url);
    }

    const { status, data } = response;
    if (status === 429) {
      throw new FetchError("rate_limited", url, "HTTP 429 Too Many Requests", status);
    }
    if (status >= 400) {
      throw new FetchError("http", url, `HTTP ${status}`, status);
    }

    return { status, body: typeof data === "string" ? data : JSON.stringify(data) };
  }
}
