import { FetchError } from "../../shared/errors/scrape.errors";
import { err, ok } from "../../shared/types/result.types";
import type { Result } from "../../shared/types/result.types";
import type { FetchSuccess, PageFetcher } from "../../scraping/fetch/http-fetcher";

/** Serves canned pages by URL; anything else is an HTTP 404 */
export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];
  private readonly pages: Map<string, string>;

  constructor(pages: Record<string, string> = {}) {
    this.pages = new Map(Object.entries(pages));
  }

  set(url: string, body: string): void {
    this.pages.set(url, body);
  }

  async fetch(url: string): Promise<Result<FetchSuccess, FetchError>> {
    this.requested.push(url);
    const body = this.pages.get(url);
    if (body === undefined) {
      return err(new FetchError("http", url, "HTTP 404", 404));
    }
    return ok({ url, status: 200, body, attempts: 1, retries: 0 });
  }
}

export function html(body: string): string {
  return `<html><body>${body}</body></html>`;
}
