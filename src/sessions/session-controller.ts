/**
 * Scrape Session Controller
 *
 * Drives one scraping session through its lifecycle:
 *
 *   pending -> running -> completed | failed | stopped
 *
 * For each summary page the controller enriches, normalizes, resolves and
 * upserts every record, then persists and broadcasts progress and checks
 * the stopping heuristics in this order:
 *   1. too many consecutive record failures  -> failed
 *   2. page limit reached                    -> completed
 *   3. too many consecutive existing records -> completed (stopOnExisting)
 *   4. source has no more pages              -> completed
 *
 * A stop request is honoured between records; the interrupted page is
 * not counted as processed. Record failures never abort the session on
 * their own. A failed summary page does.
 */
import type { Logger } from "../monitoring/logger";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import type { OffenderStore, RecordStore, SessionStore } from "../persistence/stores";
import { normalizeRecord } from "../processing/record-normalizer";
import { refreshOffenderCounters } from "../resolution/offender-counters";
import type { AgencySource, SummaryPage } from "../scraping/agencies";
import { errorMessage } from "../shared/errors/scrape.errors";
import type { ResolveError } from "../shared/errors/scrape.errors";
import type { Resolution } from "../shared/types/offender.types";
import type {
  CanonicalAttrs,
  OffenderAttrs,
  RawDetailRecord,
  SummaryRecord,
} from "../shared/types/record.types";
import type { Result } from "../shared/types/result.types";
import type {
  ScrapeSession,
  SessionEventType,
  SessionStatus,
  StopReason,
} from "../shared/types/session.types";
import { pickRecordFields } from "../shared/utils/diff";
import type { ProgressChannel } from "./progress-channel";

export interface OffenderResolution {
  resolve(attrs: OffenderAttrs): Promise<Result<Resolution, ResolveError>>;
}

export interface SessionControllerDependencies {
  source: AgencySource;
  records: RecordStore;
  offenders: OffenderStore;
  sessions: SessionStore;
  resolver: OffenderResolution;
  channel: ProgressChannel;
  normalize?: (detail: RawDetailRecord) => CanonicalAttrs;
  now?: () => Date;
}

type RecordOutcome = "created" | "updated" | "existing" | "error";

interface Verdict {
  status: Extract<SessionStatus, "completed" | "failed">;
  reason: StopReason;
}

export class ScrapeSessionController {
  private readonly session: ScrapeSession;
  private readonly deps: SessionControllerDependencies;
  private readonly normalize: (detail: RawDetailRecord) => CanonicalAttrs;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly seenSourceIds = new Set<string>();
  private stopRequested = false;
  private consecutiveExisting = 0;
  private consecutiveErrors = 0;

  constructor(session: ScrapeSession, deps: SessionControllerDependencies) {
    this.session = { ...session, counters: { ...session.counters } };
    this.deps = deps;
    this.normalize = deps.normalize ?? normalizeRecord;
    this.now = deps.now ?? (() => new Date());
    this.log = logger.child({
      sessionId: session.sessionId,
      agency: session.agency,
      database: session.targetDatabase,
    });
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  /** Copy of the current session state */
  snapshot(): ScrapeSession {
    return { ...this.session, counters: { ...this.session.counters } };
  }

  /**
   * Ask the session to stop at the next record boundary.
   * Returns false when the session has already finished.
   */
  requestStop(): boolean {
    if (this.session.status !== "pending" && this.session.status !== "running") {
      return false;
    }
    this.stopRequested = true;
    this.log.info("Stop requested");
    return true;
  }

  /** Run the session to a terminal state. Never rejects. */
  async run(): Promise<ScrapeSession> {
    if (this.session.status !== "pending") {
      return this.snapshot();
    }

    try {
      await this.execute();
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Session aborted by unexpected error");
      this.finish("failed", "unexpected_error", errorMessage(error));
    }

    await this.persist();
    this.emit(this.terminalEventType());

    metrics.increment("scrape_sessions_total", { status: this.session.status });
    const { startedAt, finishedAt } = this.session;
    if (startedAt && finishedAt) {
      metrics.recordDuration((finishedAt.getTime() - startedAt.getTime()) / 1000);
    }

    this.log.info(
      {
        status: this.session.status,
        stopReason: this.session.stopReason,
        ...this.session.counters,
      },
      "Session finished"
    );

    return this.snapshot();
  }

  private async execute(): Promise<void> {
    const range = this.session.rangeParams;
    let pageNumber = range.kind === "pages" ? range.startPage : 1;

    this.session.status = "running";
    this.session.startedAt = this.now();
    await this.persist();
    this.emit("started");
    this.log.info({ rangeParams: range, limits: this.session.limits }, "Session started");

    for (;;) {
      if (this.stopRequested) {
        this.finish("stopped", "stop_requested");
        return;
      }

      this.session.currentPage = pageNumber;
      const page = await this.deps.source.fetchSummaryPage(pageNumber);
      if (!page.ok) {
        this.log.error({ pageNumber, error: page.error.message }, "Summary page failed");
        this.finish("failed", "summary_failed", page.error.message);
        return;
      }

      const interrupted = await this.processPage(page.value.records);
      if (interrupted) {
        this.finish("stopped", "stop_requested");
        return;
      }

      this.session.counters.pagesProcessed += 1;
      await this.persist();
      this.emit("progress");
      this.log.debug(
        { pageNumber, records: page.value.records.length, ...this.session.counters },
        "Page processed"
      );

      const verdict = this.evaluate(page.value);
      if (verdict) {
        this.finish(verdict.status, verdict.reason);
        return;
      }

      pageNumber += 1;
    }
  }

  /** Returns true when a stop request interrupted the page */
  private async processPage(records: SummaryRecord[]): Promise<boolean> {
    for (const summary of records) {
      if (this.stopRequested) return true;

      // Listings can shift between requests and repeat a row
      if (this.seenSourceIds.has(summary.sourceId)) continue;
      this.seenSourceIds.add(summary.sourceId);

      this.session.counters.recordsFound += 1;
      const outcome = await this.processRecord(summary);
      this.tally(outcome);
    }
    return false;
  }

  private async processRecord(summary: SummaryRecord): Promise<RecordOutcome> {
    const detail = await this.deps.source.enrich(summary);
    if (!detail.ok) {
      return this.recordFailure(summary, detail.error.message);
    }

    try {
      const attrs = this.normalize(detail.value);
      const existing = await this.deps.records.findRecord(attrs.agencyCode, attrs.sourceId);

      let offenderId: string;
      if (existing) {
        offenderId = existing.offenderId;
      } else {
        const resolution = await this.deps.resolver.resolve(attrs.offender);
        if (!resolution.ok) {
          return this.recordFailure(summary, resolution.error.message);
        }
        offenderId = resolution.value.offender.id;
      }

      const outcome = await this.deps.records.upsertCanonicalRecord({
        ...pickRecordFields(attrs),
        resourceType: attrs.resourceType,
        agencyCode: attrs.agencyCode,
        sourceId: attrs.sourceId,
        offenderId,
      });

      if (outcome.status !== "unchanged") {
        await refreshOffenderCounters(this.deps, offenderId);
      }

      metrics.increment("records_processed_total", {
        agency: attrs.agencyCode,
        status: outcome.status,
      });

      return outcome.status === "unchanged" ? "existing" : outcome.status;
    } catch (error) {
      return this.recordFailure(summary, errorMessage(error));
    }
  }

  private recordFailure(summary: SummaryRecord, message: string): RecordOutcome {
    this.log.warn({ sourceId: summary.sourceId, error: message }, "Record failed");
    this.session.lastError = message;
    metrics.increment("records_processed_total", {
      agency: summary.agencyCode,
      status: "error",
    });
    return "error";
  }

  private tally(outcome: RecordOutcome): void {
    const counters = this.session.counters;
    switch (outcome) {
      case "created":
        counters.recordsCreated += 1;
        this.consecutiveExisting = 0;
        this.consecutiveErrors = 0;
        break;
      case "updated":
        counters.recordsUpdated += 1;
        this.consecutiveExisting += 1;
        this.consecutiveErrors = 0;
        break;
      case "existing":
        counters.recordsExisting += 1;
        this.consecutiveExisting += 1;
        this.consecutiveErrors = 0;
        break;
      case "error":
        counters.errorsCount += 1;
        this.consecutiveErrors += 1;
        break;
    }
  }

  private evaluate(page: SummaryPage): Verdict | null {
    const limits = this.session.limits;

    if (this.consecutiveErrors >= limits.maxConsecutiveErrors) {
      return { status: "failed", reason: "max_consecutive_errors" };
    }
    if (this.session.counters.pagesProcessed >= limits.maxPages) {
      return { status: "completed", reason: "max_pages" };
    }
    if (
      limits.stopOnExisting &&
      limits.consecutiveExistingThreshold > 0 &&
      this.consecutiveExisting >= limits.consecutiveExistingThreshold
    ) {
      return { status: "completed", reason: "consecutive_existing" };
    }
    // An empty page can still have more behind it (an EA action type with no hits)
    if (!page.hasMore) {
      return { status: "completed", reason: "range_exhausted" };
    }
    return null;
  }

  private finish(status: SessionStatus, reason: StopReason, error?: string): void {
    this.session.status = status;
    this.session.stopReason = reason;
    this.session.finishedAt = this.now();
    if (error !== undefined) {
      this.session.lastError = error;
    }
  }

  private terminalEventType(): SessionEventType {
    switch (this.session.status) {
      case "completed":
        return "completed";
      case "stopped":
        return "stopped";
      default:
        return "failed";
    }
  }

  private async persist(): Promise<void> {
    try {
      await this.deps.sessions.saveSession(this.snapshot());
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Failed to persist session state");
    }
  }

  private emit(type: SessionEventType): void {
    const { counters } = this.session;
    this.deps.channel.broadcast({
      type,
      sessionId: this.session.sessionId,
      status: this.session.status,
      pagesProcessed: counters.pagesProcessed,
      recordsFound: counters.recordsFound,
      recordsCreated: counters.recordsCreated,
      recordsUpdated: counters.recordsUpdated,
      errorsCount: counters.errorsCount,
      counters: { ...counters },
      stopReason: this.session.stopReason,
      at: this.now().toISOString(),
    });
  }
}
