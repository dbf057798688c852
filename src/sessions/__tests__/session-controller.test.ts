import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "../../monitoring/metrics.collector";
import { normalizeRecord } from "../../processing/record-normalizer";
import { ResolveError } from "../../shared/errors/scrape.errors";
import { err, ok } from "../../shared/types/result.types";
import { emptyCounters } from "../../shared/types/session.types";
import type { DateRange, ScrapeSession, SessionEventType, SessionLimits } from "../../shared/types/session.types";
import { pickRecordFields } from "../../shared/utils/diff";
import { EaSource } from "../../scraping/agencies/ea.source";
import { eaRegisterUrl } from "../../scraping/agencies/urls";
import { FakeFetcher, html } from "../../__tests__/helpers/fake-fetcher";
import { createMemoryStores } from "../../__tests__/helpers/memory-stores";
import type { MemoryStores } from "../../__tests__/helpers/memory-stores";
import { ScriptedSource, caseDetail, summary } from "../../__tests__/helpers/scripted-source";
import type { PageScript, ScriptedSourceOptions } from "../../__tests__/helpers/scripted-source";
import { ProgressChannel } from "../progress-channel";
import { ScrapeSessionController } from "../session-controller";
import type { OffenderResolution } from "../session-controller";

const NOW = new Date("2024-03-01T10:00:00.000Z");

function pendingSession(limits: Partial<SessionLimits> = {}): ScrapeSession {
  return {
    sessionId: "sess-1",
    agency: "hse",
    targetDatabase: "convictions",
    rangeParams: { kind: "pages", startPage: 1, maxPages: 10 },
    limits: {
      maxPages: 10,
      stopOnExisting: true,
      consecutiveExistingThreshold: 3,
      maxConsecutiveErrors: 3,
      requestDelayMs: 0,
      ...limits,
    },
    status: "pending",
    counters: emptyCounters(),
    currentPage: null,
    stopReason: null,
    lastError: null,
    startedAt: null,
    finishedAt: null,
    createdAt: NOW,
  };
}

/** Links every organization to the offender with its identity, creating it when new */
function identityResolver(stores: MemoryStores): OffenderResolution {
  return {
    resolve: async (attrs) => {
      if (attrs.name.includes("BAD")) {
        return err(new ResolveError("Offender store unavailable"));
      }
      const { offender, created } = await stores.offenders.findOrCreateOffender(attrs);
      return ok({ offender, outcome: created ? "created" : "linked", matchedBy: null, score: null, review: null });
    },
  };
}

/** Store records as an earlier session would have */
async function preload(stores: MemoryStores, sourceIds: string[], fine: number = 1000): Promise<void> {
  for (const sourceId of sourceIds) {
    const attrs = normalizeRecord(caseDetail(summary(sourceId), fine));
    const { offender } = await stores.offenders.findOrCreateOffender(attrs.offender);
    await stores.records.upsertCanonicalRecord({
      ...pickRecordFields(attrs),
      resourceType: attrs.resourceType,
      agencyCode: attrs.agencyCode,
      sourceId: attrs.sourceId,
      offenderId: offender.id,
    });
  }
}

describe("ScrapeSessionController", () => {
  let stores: MemoryStores;
  let channel: ProgressChannel;
  let events: SessionEventType[];

  beforeEach(() => {
    metrics.reset();
    stores = createMemoryStores();
    channel = new ProgressChannel();
    events = [];
    channel.subscribe("sess-1", (event) => events.push(event.type));
  });

  function controllerFor(
    pages: PageScript[],
    limits: Partial<SessionLimits> = {},
    options: ScriptedSourceOptions = {}
  ) {
    const source = new ScriptedSource(pages, options);
    const controller = new ScrapeSessionController(pendingSession(limits), {
      source,
      records: stores.records,
      offenders: stores.offenders,
      sessions: stores.sessions,
      resolver: identityResolver(stores),
      channel,
      now: () => NOW,
    });
    return { source, controller };
  }

  it("stops early after enough consecutive existing records", async () => {
    await preload(stores, ["R3", "R4", "R5"]);
    const { source, controller } = controllerFor([["R1"], ["R2"], ["R3"], ["R4"], ["R5"], ["R6"]]);

    const session = await controller.run();

    expect(session.status).toBe("completed");
    expect(session.stopReason).toBe("consecutive_existing");
    expect(session.counters).toEqual({
      pagesProcessed: 5,
      recordsFound: 5,
      recordsCreated: 2,
      recordsUpdated: 0,
      recordsExisting: 3,
      errorsCount: 0,
    });
    expect(source.pagesRequested).toEqual([1, 2, 3, 4, 5]);
    expect(events).toEqual(["started", "progress", "progress", "progress", "progress", "progress", "completed"]);
  });

  it("persists every state change and ends on the terminal one", async () => {
    const { controller } = controllerFor([["A"]], {}, { lastPageHasMore: false });

    await controller.run();

    const statuses = stores.sessions.history.map((state) => state.status);
    expect(statuses).toEqual(["running", "running", "completed"]);
    expect(stores.sessions.rows.get("sess-1")).toMatchObject({
      status: "completed",
      stopReason: "range_exhausted",
      currentPage: 1,
      startedAt: NOW,
      finishedAt: NOW,
    });
    expect(metrics.get("scrape_sessions_total", { status: "completed" })).toBe(1);
    expect(metrics.get("records_processed_total", { agency: "hse", status: "created" })).toBe(1);
  });

  it("keeps going past existing records when early stop is off", async () => {
    await preload(stores, ["A", "B", "C"]);
    const { controller } = controllerFor(
      [["A"], ["B"], ["C"]],
      { stopOnExisting: false, consecutiveExistingThreshold: 1 },
      { lastPageHasMore: false }
    );

    const session = await controller.run();

    expect(session.stopReason).toBe("range_exhausted");
    expect(session.counters.recordsExisting).toBe(3);
    expect(session.counters.pagesProcessed).toBe(3);
  });

  it("treats a zero threshold as no early stop", async () => {
    await preload(stores, ["A", "B"]);
    const { controller } = controllerFor([["A"], ["B"]], { consecutiveExistingThreshold: 0 }, { lastPageHasMore: false });

    expect((await controller.run()).stopReason).toBe("range_exhausted");
  });

  it("completes at the page limit", async () => {
    const { source, controller } = controllerFor([["A"], ["B"], ["C"], ["D"]], { maxPages: 2 });

    const session = await controller.run();

    expect(session.status).toBe("completed");
    expect(session.stopReason).toBe("max_pages");
    expect(source.pagesRequested).toEqual([1, 2]);
  });

  it("completes when the source reports no more pages", async () => {
    const { source, controller } = controllerFor([["A"]]);

    const session = await controller.run();

    expect(session.stopReason).toBe("range_exhausted");
    expect(session.counters.pagesProcessed).toBe(2);
    expect(source.pagesRequested).toEqual([1, 2]);
  });

  it("moves past an empty page the source says is not the last", async () => {
    const { source, controller } = controllerFor([[], ["B"]], {}, { lastPageHasMore: false });

    const session = await controller.run();

    expect(session.stopReason).toBe("range_exhausted");
    expect(session.counters).toMatchObject({ pagesProcessed: 2, recordsFound: 1, recordsCreated: 1 });
    expect(source.pagesRequested).toEqual([1, 2]);
  });

  it("queries every EA action type when an earlier one has no results", async () => {
    const courtCaseUrl = eaRegisterUrl("court_case", "2024-01-01", "2024-03-31");
    const cautionUrl = eaRegisterUrl("caution", "2024-01-01", "2024-03-31");
    const detailUrl = "https://environment.data.gov.uk/public-register/enforcement-action/registration/20002";
    const fetcher = new FakeFetcher({
      [courtCaseUrl]: html("<p>No results found</p>"),
      [cautionUrl]: html(`
        <table><tbody>
          <tr>
            <td><a href="/public-register/enforcement-action/registration/20002">Valley Haulage Ltd</a></td>
            <td>Station Road, Leek</td>
            <td>05/02/2024</td>
          </tr>
        </tbody></table>
      `),
      [detailUrl]: html("<dl><dt>Company No.</dt><dd>7654321</dd></dl>"),
    });
    const range: DateRange = {
      kind: "dates",
      dateFrom: "2024-01-01",
      dateTo: "2024-03-31",
      actionTypes: ["court_case", "caution"],
    };
    const controller = new ScrapeSessionController(
      { ...pendingSession(), agency: "ea", targetDatabase: "cases", rangeParams: range },
      {
        source: new EaSource(fetcher, "cases", range),
        records: stores.records,
        offenders: stores.offenders,
        sessions: stores.sessions,
        resolver: identityResolver(stores),
        channel,
        now: () => NOW,
      }
    );

    const session = await controller.run();

    expect(session.status).toBe("completed");
    expect(session.stopReason).toBe("range_exhausted");
    expect(session.counters).toMatchObject({ pagesProcessed: 2, recordsFound: 1, recordsCreated: 1 });
    expect(fetcher.requested).toEqual([courtCaseUrl, cautionUrl, detailUrl]);
  });

  it("starts at the requested page", async () => {
    const source = new ScriptedSource([["A"], ["B"], ["C"]], { lastPageHasMore: false });
    const controller = new ScrapeSessionController(
      { ...pendingSession(), rangeParams: { kind: "pages", startPage: 2, maxPages: 10 } },
      {
        source,
        records: stores.records,
        offenders: stores.offenders,
        sessions: stores.sessions,
        resolver: identityResolver(stores),
        channel,
      }
    );

    await controller.run();

    expect(source.pagesRequested).toEqual([2, 3]);
  });

  it("fails after too many consecutive record errors", async () => {
    const { source, controller } = controllerFor([["E1", "E2", "E3"], ["X"]], {}, {
      failingDetails: ["E1", "E2", "E3"],
    });

    const session = await controller.run();

    expect(session.status).toBe("failed");
    expect(session.stopReason).toBe("max_consecutive_errors");
    expect(session.lastError).toBe("timeout of 30000ms exceeded");
    expect(session.counters).toMatchObject({ pagesProcessed: 1, recordsFound: 3, errorsCount: 3 });
    expect(source.pagesRequested).toEqual([1]);
    expect(events[events.length - 1]).toBe("failed");
  });

  it("resets the error streak on a good record", async () => {
    const { controller } = controllerFor([["E1", "OK", "E2", "E3"]], {}, {
      failingDetails: ["E1", "E2", "E3"],
      lastPageHasMore: false,
    });

    const session = await controller.run();

    expect(session.status).toBe("completed");
    expect(session.counters).toMatchObject({ recordsCreated: 1, errorsCount: 3 });
  });

  it("counts a resolver failure as a record error", async () => {
    const { controller } = controllerFor([["BAD", "GOOD"]], {}, { lastPageHasMore: false });

    const session = await controller.run();

    expect(session.counters).toMatchObject({ recordsFound: 2, recordsCreated: 1, errorsCount: 1 });
    expect(session.lastError).toBe("Offender store unavailable");
  });

  it("fails when a summary page cannot be fetched", async () => {
    const { controller } = controllerFor([["A"], "fail"]);

    const session = await controller.run();

    expect(session.status).toBe("failed");
    expect(session.stopReason).toBe("summary_failed");
    expect(session.lastError).toBe("HTTP 503");
    expect(session.counters).toMatchObject({ pagesProcessed: 1, recordsCreated: 1 });
  });

  it("fails on an unexpected error and still persists the outcome", async () => {
    const { controller } = controllerFor([["A"]], {}, {
      beforePage: async () => {
        throw new Error("socket hang up");
      },
    });

    const session = await controller.run();

    expect(session).toMatchObject({ status: "failed", stopReason: "unexpected_error", lastError: "socket hang up" });
    expect(stores.sessions.rows.get("sess-1")?.status).toBe("failed");
  });

  it("stops between records and does not count the interrupted page", async () => {
    let controller: ScrapeSessionController | undefined;
    const built = controllerFor([["A", "B", "C"]], {}, {
      onEnrich: (record) => {
        if (record.sourceId === "B") controller?.requestStop();
      },
    });
    controller = built.controller;

    const session = await controller.run();

    expect(session.status).toBe("stopped");
    expect(session.stopReason).toBe("stop_requested");
    expect(session.counters).toMatchObject({ pagesProcessed: 0, recordsFound: 2, recordsCreated: 2 });
    expect(events).toEqual(["started", "stopped"]);
  });

  it("honours a stop requested before the run", async () => {
    const { source, controller } = controllerFor([["A"]]);

    expect(controller.requestStop()).toBe(true);
    const session = await controller.run();

    expect(session.status).toBe("stopped");
    expect(source.pagesRequested).toEqual([]);
  });

  it("runs only once and refuses to stop once finished", async () => {
    const { source, controller } = controllerFor([["A"]], {}, { lastPageHasMore: false });
    await controller.run();

    const again = await controller.run();

    expect(again.status).toBe("completed");
    expect(source.pagesRequested).toEqual([1]);
    expect(controller.requestStop()).toBe(false);
  });

  it("creates nothing new when the same range is scraped twice", async () => {
    const pages: PageScript[] = [["A", "B"], ["C"]];
    const limits = { stopOnExisting: false };
    await controllerFor(pages, limits, { lastPageHasMore: false }).controller.run();

    const second = await controllerFor(pages, limits, { lastPageHasMore: false }).controller.run();

    expect(second.counters).toMatchObject({ recordsCreated: 0, recordsUpdated: 0, recordsExisting: 3 });
    expect(stores.records.rows.size).toBe(3);
    expect(stores.offenders.rows.size).toBe(3);
  });

  it("updates changed records and refreshes offender totals", async () => {
    await preload(stores, ["A"], 500);
    const { controller } = controllerFor([["A"]], {}, { lastPageHasMore: false });

    const session = await controller.run();

    expect(session.counters.recordsUpdated).toBe(1);
    const record = await stores.records.findRecord("hse", "A");
    expect(record?.fine).toBe(1000);
    expect(stores.offenders.rows.get(record?.offenderId ?? "")).toMatchObject({ totalCases: 1, totalFines: 1000 });
  });

  it("skips a source id already seen in the session", async () => {
    const { controller } = controllerFor([["A"], ["A", "B"]], {}, { lastPageHasMore: false });

    const session = await controller.run();

    expect(session.counters).toMatchObject({ recordsFound: 2, recordsCreated: 2 });
  });
});
