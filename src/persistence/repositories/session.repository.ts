/**
 * Scrape Session Repository
 *
 * Persists session state to SCRAPE_SESSION. Counters are stored as
 * columns so finished sessions can be queried without parsing JSON.
 */
import { ScrapeSessionModel } from "../db/models";
import type { ScrapeSession } from "../../shared/types/session.types";
import type { SessionStore } from "../stores";

function toSession(model: ScrapeSessionModel): ScrapeSession {
  const row = model.get({ plain: true });
  return {
    sessionId: row.sessionId,
    agency: row.agency,
    targetDatabase: row.targetDatabase,
    rangeParams: row.rangeParams,
    limits: row.limits,
    status: row.status,
    counters: {
      pagesProcessed: row.pagesProcessed,
      recordsFound: row.recordsFound,
      recordsCreated: row.recordsCreated,
      recordsUpdated: row.recordsUpdated,
      recordsExisting: row.recordsExisting,
      errorsCount: row.errorsCount,
    },
    currentPage: row.currentPage,
    stopReason: row.stopReason,
    lastError: row.lastError,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt,
    createdAt: row.createdAt,
  };
}

export async function saveSession(session: ScrapeSession): Promise<void> {
  const { counters, ...rest } = session;
  await ScrapeSessionModel.upsert({ ...rest, ...counters });
}

export async function findSession(sessionId: string): Promise<ScrapeSession | null> {
  const model = await ScrapeSessionModel.findByPk(sessionId);
  return model ? toSession(model) : null;
}

export async function listSessions(limit: number): Promise<ScrapeSession[]> {
  const models = await ScrapeSessionModel.findAll({
    order: [["createdAt", "DESC"]],
    limit,
  });
  return models.map(toSession);
}

export const sessionRepository: SessionStore = {
  saveSession,
  findSession,
  listSessions,
};
