import { describe, it, expect, beforeEach, vi } from "vitest";
import { ValidationFailedError } from "../../shared/errors/scrape.errors";
import { ok } from "../../shared/types/result.types";
import { FakeFetcher } from "../../__tests__/helpers/fake-fetcher";
import { createMemoryStores } from "../../__tests__/helpers/memory-stores";
import type { MemoryStores } from "../../__tests__/helpers/memory-stores";
import { ScriptedSource } from "../../__tests__/helpers/scripted-source";
import type { SourceFactory } from "../../scraping/agencies";
import { ProgressChannel } from "../progress-channel";
import { SessionManager } from "../session-manager";

const NOW = new Date("2024-03-01T10:00:00.000Z");

/** A promise the test resolves by hand */
function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe("SessionManager", () => {
  let stores: MemoryStores;
  let ids: number;

  beforeEach(() => {
    stores = createMemoryStores();
    ids = 0;
  });

  function managerWith(sourceFactory: SourceFactory): SessionManager {
    return new SessionManager({
      records: stores.records,
      offenders: stores.offenders,
      sessions: stores.sessions,
      resolver: {
        resolve: async (attrs) => {
          const { offender, created } = await stores.offenders.findOrCreateOffender(attrs);
          return ok({ offender, outcome: created ? "created" : "linked", matchedBy: null, score: null, review: null });
        },
      },
      channel: new ProgressChannel(),
      fetcher: new FakeFetcher(),
      sourceFactory,
      idGenerator: () => `sess-${++ids}`,
      now: () => NOW,
    });
  }

  it("validates, plans and runs a session to completion", async () => {
    const factory = vi.fn<SourceFactory>(() => new ScriptedSource([["A"], ["B"]], { lastPageHasMore: false }));
    const manager = managerWith(factory);

    const handle = await manager.start({ agency: "hse", database: "convictions", maxPages: 5, requestDelayMs: 0 });

    expect(handle.sessionId).toBe("sess-1");
    expect(stores.sessions.history[0]).toMatchObject({ sessionId: "sess-1", status: "pending" });
    expect(factory.mock.calls[0][0]).toEqual({ agency: "hse", database: "convictions" });
    expect(factory.mock.calls[0][1]).toEqual({ kind: "pages", startPage: 1, maxPages: 5, country: undefined });

    const finished = await handle.done;

    expect(finished).toMatchObject({ status: "completed", stopReason: "range_exhausted" });
    expect(finished.counters.recordsCreated).toBe(2);
    expect(manager.isActive("sess-1")).toBe(false);
    expect(await manager.get("sess-1")).toMatchObject({ status: "completed" });
  });

  it("rejects an invalid request without storing anything", async () => {
    const manager = managerWith(() => new ScriptedSource([]));

    await expect(manager.start({ agency: "hse" })).rejects.toBeInstanceOf(ValidationFailedError);
    expect(stores.sessions.rows.size).toBe(0);
  });

  it("stops a running session", async () => {
    const firstPage = gate();
    const manager = managerWith(
      () => new ScriptedSource([["A"], ["B"]], { beforePage: () => firstPage.opened })
    );

    const handle = await manager.start({ agency: "hse", database: "convictions", requestDelayMs: 0 });

    expect(manager.isActive(handle.sessionId)).toBe(true);
    expect(manager.listActive().map((session) => session.status)).toEqual(["running"]);
    expect(manager.stop(handle.sessionId)).toBe("ok");

    firstPage.open();
    const finished = await handle.done;

    expect(finished).toMatchObject({ status: "stopped", stopReason: "stop_requested" });
    expect(finished.counters.pagesProcessed).toBe(0);
    expect(manager.stop(handle.sessionId)).toBe("not_found");
  });

  it("reports unknown sessions", async () => {
    const manager = managerWith(() => new ScriptedSource([]));

    expect(manager.stop("missing")).toBe("not_found");
    expect(await manager.get("missing")).toBeNull();
  });

  it("runs sessions independently and stops them all", async () => {
    const pages = gate();
    const manager = managerWith(() => new ScriptedSource([["A"]], { beforePage: () => pages.opened }));

    const first = await manager.start({ agency: "hse", database: "convictions", requestDelayMs: 0 });
    const second = await manager.start({ agency: "hse", database: "appeals", requestDelayMs: 0 });

    expect(manager.listActive().map((session) => session.sessionId)).toEqual(["sess-1", "sess-2"]);

    const stopped = manager.stopAll();
    pages.open();
    await stopped;

    expect(manager.listActive()).toEqual([]);
    expect((await first.done).status).toBe("stopped");
    expect((await second.done).status).toBe("stopped");
  });

  it("forwards progress to subscribers", async () => {
    const page = gate();
    const manager = managerWith(
      () => new ScriptedSource([["A"]], { lastPageHasMore: false, beforePage: () => page.opened })
    );
    const seen: string[] = [];

    const handle = await manager.start({ agency: "hse", database: "convictions", requestDelayMs: 0 });
    manager.subscribe(handle.sessionId, (event) => seen.push(event.type));
    page.open();
    await handle.done;

    expect(seen.slice(-2)).toEqual(["progress", "completed"]);
  });
});
