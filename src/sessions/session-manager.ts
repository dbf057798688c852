/**
 * Session Manager
 *
 * Starts, stops and tracks scraping sessions. Each session gets its own
 * request pacer and agency source, so concurrent sessions never share
 * pacing state. Finished sessions drop out of the active map and are
 * served from the session store.
 */
import { v4 as uuidv4 } from "uuid";
import { logger } from "../monitoring/logger";
import type { OffenderStore, RecordStore, SessionStore } from "../persistence/stores";
import { validateSessionRequest } from "../processing/data-validator";
import { createAgencySource } from "../scraping/agencies";
import type { SourceFactory } from "../scraping/agencies";
import type { PageFetcher } from "../scraping/fetch/http-fetcher";
import { PacedFetcher, RequestPacer } from "../scraping/fetch/request-pacer";
import type { ScrapeSession } from "../shared/types/session.types";
import { emptyCounters } from "../shared/types/session.types";
import type { ProgressChannel, SessionListener } from "./progress-channel";
import { ScrapeSessionController } from "./session-controller";
import type { OffenderResolution } from "./session-controller";
import { buildSessionPlan } from "./session-plan";

export interface SessionManagerDependencies {
  records: RecordStore;
  offenders: OffenderStore;
  sessions: SessionStore;
  resolver: OffenderResolution;
  channel: ProgressChannel;
  fetcher: PageFetcher;
  sourceFactory?: SourceFactory;
  idGenerator?: () => string;
  now?: () => Date;
}

export interface SessionHandle {
  sessionId: string;
  /** Resolves with the final session state */
  done: Promise<ScrapeSession>;
}

export type StopResult = "ok" | "not_found";

interface ActiveSession {
  controller: ScrapeSessionController;
  done: Promise<ScrapeSession>;
}

export class SessionManager {
  private readonly deps: SessionManagerDependencies;
  private readonly active = new Map<string, ActiveSession>();

  constructor(deps: SessionManagerDependencies) {
    this.deps = deps;
  }

  /**
   * Validate the request, persist a pending session and start it.
   * Throws ValidationFailedError for a bad request.
   */
  async start(input: unknown): Promise<SessionHandle> {
    const plan = buildSessionPlan(validateSessionRequest(input));
    const now = this.deps.now ?? (() => new Date());
    const sessionId = (this.deps.idGenerator ?? uuidv4)();

    const session: ScrapeSession = {
      sessionId,
      agency: plan.target.agency,
      targetDatabase: plan.target.database,
      rangeParams: plan.range,
      limits: plan.limits,
      status: "pending",
      counters: emptyCounters(),
      currentPage: null,
      stopReason: null,
      lastError: null,
      startedAt: null,
      finishedAt: null,
      createdAt: now(),
    };

    const fetcher = new PacedFetcher(
      this.deps.fetcher,
      new RequestPacer(plan.limits.requestDelayMs)
    );
    const factory = this.deps.sourceFactory ?? createAgencySource;
    const source = factory(plan.target, plan.range, fetcher);

    const controller = new ScrapeSessionController(session, {
      source,
      records: this.deps.records,
      offenders: this.deps.offenders,
      sessions: this.deps.sessions,
      resolver: this.deps.resolver,
      channel: this.deps.channel,
      now,
    });

    await this.deps.sessions.saveSession(controller.snapshot());

    const done = controller.run().finally(() => {
      this.active.delete(sessionId);
    });
    this.active.set(sessionId, { controller, done });

    logger.info(
      { sessionId, agency: session.agency, database: session.targetDatabase },
      "Session queued to run"
    );

    return { sessionId, done };
  }

  /** Request a running session to stop */
  stop(sessionId: string): StopResult {
    const entry = this.active.get(sessionId);
    if (!entry) return "not_found";
    return entry.controller.requestStop() ? "ok" : "not_found";
  }

  /** Live state for active sessions, stored state otherwise */
  async get(sessionId: string): Promise<ScrapeSession | null> {
    const entry = this.active.get(sessionId);
    if (entry) return entry.controller.snapshot();
    return this.deps.sessions.findSession(sessionId);
  }

  subscribe(sessionId: string, listener: SessionListener): () => void {
    return this.deps.channel.subscribe(sessionId, listener);
  }

  listActive(): ScrapeSession[] {
    return [...this.active.values()].map((entry) => entry.controller.snapshot());
  }

  /** Whether the session is still running in this process */
  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  /** Stop every active session and wait for them to settle */
  async stopAll(): Promise<void> {
    const entries = [...this.active.values()];
    for (const entry of entries) {
      entry.controller.requestStop();
    }
    await Promise.all(entries.map((entry) => entry.done));
  }
}
