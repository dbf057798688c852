import { describe, it, expect, vi, beforeEach } from "vitest";
import { metrics } from "../../../monitoring/metrics.collector";
import { FetchError } from "../../../shared/errors/scrape.errors";
import { HttpFetcher, classifyRequestError } from "../http-fetcher";

const URL_UNDER_TEST = "https://resources.hse.gov.uk/convictions/case/case_list.asp?PN=1";

function networkError(code: string, message: string = code): Error {
  return Object.assign(new Error(message), { code });
}

function page(status: number, data: string = "<html></html>") {
  return { status, data };
}

function fetcherWith(get: ReturnType<typeof vi.fn>) {
  return new HttpFetcher({
    client: { get },
    maxAttempts: 3,
    baseDelayMs: 1,
    jitter: 0,
    timeoutMs: 5000,
    userAgent: "test-agent",
  });
}

describe("HttpFetcher", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("returns the body with attempt and retry counts after transient failures", async () => {
    const get = vi
      .fn()
      .mockRejectedValueOnce(networkError("ECONNRESET"))
      .mockRejectedValueOnce(networkError("ECONNRESET"))
      .mockResolvedValue(page(200, "<table></table>"));

    const result = await fetcherWith(get).fetch(URL_UNDER_TEST);

    expect(result).toEqual({
      ok: true,
      value: { url: URL_UNDER_TEST, status: 200, body: "<table></table>", attempts: 3, retries: 2 },
    });
    expect(metrics.get("fetch_requests_total", { result: "success" })).toBe(1);
  });

  it("sends the timeout and user agent on every request", async () => {
    const get = vi.fn().mockResolvedValue(page(200));

    await fetcherWith(get).fetch(URL_UNDER_TEST);

    expect(get).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        timeout: 5000,
        responseType: "text",
        headers: expect.objectContaining({ "User-Agent": "test-agent" }),
      })
    );
  });

  it("gives up after the last timeout", async () => {
    const get = vi.fn().mockRejectedValue(networkError("ECONNABORTED", "timeout of 5000ms exceeded"));

    const result = await fetcherWith(get).fetch(URL_UNDER_TEST);

    expect(get).toHaveBeenCalledTimes(3);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("timeout");
    expect(result.error.attempts).toBe(3);
    expect(result.error.retryable).toBe(true);
    expect(metrics.get("fetch_requests_total", { result: "timeout" })).toBe(1);
  });

  it("does not retry DNS failures", async () => {
    const get = vi.fn().mockRejectedValue(networkError("ENOTFOUND"));

    const result = await fetcherWith(get).fetch(URL_UNDER_TEST);

    expect(get).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("dns");
    expect(result.error.attempts).toBe(1);
  });

  it("does not retry a 404", async () => {
    const get = vi.fn().mockResolvedValue(page(404));

    const result = await fetcherWith(get).fetch(URL_UNDER_TEST);

    expect(get).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("http");
    expect(result.error.status).toBe(404);
    expect(result.error.message).toBe("HTTP 404");
  });

  it("retries rate limiting and server errors", async () => {
    const get = vi
      .fn()
      .mockResolvedValueOnce(page(429))
      .mockResolvedValueOnce(page(503))
      .mockResolvedValue(page(200, "done"));

    const result = await fetcherWith(get).fetch(URL_UNDER_TEST);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.body).toBe("done");
    expect(result.value.retries).toBe(2);
  });
});

describe("classifyRequestError", () => {
  it.each([
    ["ETIMEDOUT", "timeout", true],
    ["ECONNREFUSED", "connection", true],
    ["EAI_AGAIN", "dns", false],
    ["ESOMETHING", "unknown", false],
  ])("maps %s to %s", (code, kind, retryable) => {
    const error = classifyRequestError(networkError(code), URL_UNDER_TEST);
    expect(error).toBeInstanceOf(FetchError);
    expect(error.kind).toBe(kind);
    expect(error.retryable).toBe(retryable);
    expect(error.url).toBe(URL_UNDER_TEST);
  });
});
