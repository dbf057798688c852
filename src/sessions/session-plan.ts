/**
 * Session Plan
 *
 * Turns a validated start request into the target, range and limits a
 * session controller runs with, filling gaps from config.
 */
import config from "../config";
import { EA } from "../config/constants";
import { ValidationFailedError } from "../shared/errors/scrape.errors";
import type { EaActionType, EaDatabase, HseDatabase } from "../shared/types/record.types";
import type {
  RangeParams,
  ScrapeTarget,
  SessionLimits,
  StartSessionRequest,
} from "../shared/types/session.types";

export interface SessionPlan {
  target: ScrapeTarget;
  range: RangeParams;
  limits: SessionLimits;
}

export function isHseDatabase(value: string): value is HseDatabase {
  return value === "convictions" || value === "appeals" || value === "notices";
}

export function isEaDatabase(value: string): value is EaDatabase {
  return value === "cases" || value === "notices";
}

function baseLimits(request: StartSessionRequest, maxPages: number): SessionLimits {
  return {
    maxPages,
    stopOnExisting: request.stopOnExisting ?? true,
    consecutiveExistingThreshold:
      request.consecutiveExistingThreshold ?? config.consecutiveExistingThreshold,
    maxConsecutiveErrors: request.maxConsecutiveErrors ?? config.maxConsecutiveErrors,
    requestDelayMs: request.requestDelayMs ?? config.detailDelayMs,
  };
}

export function buildSessionPlan(request: StartSessionRequest): SessionPlan {
  if (request.agency === "hse") {
    if (!isHseDatabase(request.database)) {
      throw new ValidationFailedError(`Unknown HSE database "${request.database}"`);
    }
    const startPage = request.startPage ?? 1;
    const requested =
      request.endPage !== undefined
        ? request.endPage - startPage + 1
        : request.maxPages ?? config.maxPagesPerSession;
    const maxPages = Math.min(requested, config.maxPagesPerSession);

    return {
      target: { agency: "hse", database: request.database },
      range: {
        kind: "pages",
        startPage,
        maxPages,
        country: request.database === "notices" ? request.country ?? config.defaultHseCountry : undefined,
      },
      limits: baseLimits(request, maxPages),
    };
  }

  if (!isEaDatabase(request.database)) {
    throw new ValidationFailedError(`Unknown EA database "${request.database}"`);
  }
  if (!request.dateFrom || !request.dateTo) {
    throw new ValidationFailedError("EA sessions need dateFrom and dateTo");
  }
  const actionTypes: EaActionType[] =
    request.actionTypes ?? [...EA.DATABASE_ACTION_TYPES[request.database]];

  return {
    target: { agency: "ea", database: request.database },
    range: {
      kind: "dates",
      dateFrom: request.dateFrom,
      dateTo: request.dateTo,
      actionTypes,
    },
    // Each action type is one summary page
    limits: baseLimits(request, actionTypes.length),
  };
}
