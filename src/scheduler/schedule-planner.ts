/**
 * Schedule Planner
 *
 * Decides which sessions the nightly run queues. Targets come from
 * SCHEDULED_TARGETS ("agency:database" pairs). HSE listings are newest
 * first, so an HSE session starts at page 1 and stops once it reaches
 * records it already holds. EA sessions cover a look-back window ending
 * today.
 */
import { logger } from "../monitoring/logger";
import { isEaDatabase, isHseDatabase } from "../sessions/session-plan";
import type { ScrapeTarget, StartSessionRequest } from "../shared/types/session.types";
import { daysBefore } from "../shared/utils/date";

export interface SchedulePolicy {
  lookbackDays: number;
  maxPages: number;
}

/** Parse "hse:convictions,ea:cases"; unknown pairs are logged and skipped */
export function parseScheduledTargets(text: string): ScrapeTarget[] {
  const targets: ScrapeTarget[] = [];
  const seen = new Set<string>();

  for (const entry of text.split(",")) {
    const pair = entry.trim().toLowerCase();
    if (pair === "" || seen.has(pair)) continue;
    const [agency, database = ""] = pair.split(":");

    if (agency === "hse" && isHseDatabase(database)) {
      targets.push({ agency, database });
    } else if (agency === "ea" && isEaDatabase(database)) {
      targets.push({ agency, database });
    } else {
      logger.warn({ target: pair }, "Ignoring unknown scheduled target");
      continue;
    }
    seen.add(pair);
  }

  return targets;
}

/** Session requests for one scheduled run on `today` (YYYY-MM-DD) */
export function planScheduledSessions(
  today: string,
  targets: ScrapeTarget[],
  policy: SchedulePolicy
): StartSessionRequest[] {
  return targets.map((target): StartSessionRequest => {
    if (target.agency === "hse") {
      return {
        agency: "hse",
        database: target.database,
        startPage: 1,
        maxPages: policy.maxPages,
        stopOnExisting: true,
      };
    }
    return {
      agency: "ea",
      database: target.database,
      dateFrom: daysBefore(today, policy.lookbackDays),
      dateTo: today,
      stopOnExisting: false,
    };
  });
}
