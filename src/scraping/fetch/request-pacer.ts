/**
 * Request Pacer
 *
 * Enforces a minimum gap between consecutive requests of one session.
 * Every session owns its own pacer; sessions never share one.
 */
import { sleep } from "../../shared/utils/retry";
import type { Result } from "../../shared/types/result.types";
import type { FetchError } from "../../shared/errors/scrape.errors";
import type { FetchSuccess, PageFetcher } from "./http-fetcher";

export class RequestPacer {
  private readonly minIntervalMs: number;
  private lastRequestAt: number | null = null;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
  }

  /**
   * Wait until the next request is allowed.
   * Returns the time waited in ms.
   */
  async waitTurn(): Promise<number> {
    let waitMs = 0;
    if (this.lastRequestAt !== null) {
      waitMs = Math.max(0, this.lastRequestAt + this.minIntervalMs - Date.now());
    }

    if (waitMs > 0) {
      await sleep(waitMs);
    }

    this.lastRequestAt = Date.now();
    return waitMs;
  }
}

/** Fetcher that waits for its pacer before every request */
export class PacedFetcher implements PageFetcher {
  private readonly inner: PageFetcher;
  private readonly pacer: RequestPacer;

  constructor(inner: PageFetcher, pacer: RequestPacer) {
    this.inner = inner;
    this.pacer = pacer;
  }

  async fetch(url: string): Promise<Result<FetchSuccess, FetchError>> {
    await this.pacer.waitTurn();
    return this.inner.fetch(url);
  }
}
