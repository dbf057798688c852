/**
 * Data Validator
 *
 * Validates request bodies against Joi schemas before they reach a
 * session or the review workflow. Failures throw ValidationFailedError
 * carrying every Joi message, so the API can echo them back.
 */
import Joi from "joi";
import config from "../config";
import { logger } from "../monitoring/logger";
import { ValidationFailedError } from "../shared/errors/scrape.errors";
import type { EaActionType } from "../shared/types/record.types";
import type { StartSessionRequest } from "../shared/types/session.types";
import { isIsoDate } from "../shared/utils/date";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const EA_ACTION_TYPES: EaActionType[] = ["court_case", "caution", "enforcement_notice"];

const isoDate = Joi.string().pattern(ISO_DATE_PATTERN, "YYYY-MM-DD");

/**
 * Schema for POST /sessions.
 * HSE sessions are paged; EA sessions are bounded by dates.
 */
const sessionRequestSchema = Joi.object<StartSessionRequest>({
  agency: Joi.string().valid("hse", "ea").required(),
  database: Joi.when("agency", {
    is: "hse",
    then: Joi.string().valid("convictions", "appeals", "notices").required(),
    otherwise: Joi.string().valid("cases", "notices").required(),
  }),
  startPage: Joi.number().integer().min(1),
  maxPages: Joi.number().integer().min(1).max(config.maxPagesPerSession),
  endPage: Joi.number().integer().min(1),
  country: Joi.string().trim().max(64),
  dateFrom: Joi.when("agency", {
    is: "ea",
    then: isoDate.required(),
    otherwise: Joi.forbidden(),
  }),
  dateTo: Joi.when("agency", {
    is: "ea",
    then: isoDate.required(),
    otherwise: Joi.forbidden(),
  }),
  actionTypes: Joi.array()
    .items(Joi.string().valid(...EA_ACTION_TYPES))
    .min(1)
    .unique(),
  stopOnExisting: Joi.boolean(),
  consecutiveExistingThreshold: Joi.number().integer().min(0),
  maxConsecutiveErrors: Joi.number().integer().min(1),
  requestDelayMs: Joi.number().integer().min(0),
});

export interface ReviewActionBody {
  candidateIndex?: number;
  reviewedBy: string;
  notes?: string;
}

const reviewActionSchema = Joi.object<ReviewActionBody>({
  candidateIndex: Joi.number().integer().min(0),
  reviewedBy: Joi.string().trim().min(1).max(255).required(),
  notes: Joi.string().allow("").max(2000),
});

function validate<T>(schema: Joi.ObjectSchema<T>, input: unknown, label: string): T {
  const { error, value } = schema.validate(input, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const details = error.details.map((d) => d.message);
    logger.warn({ validationErrors: details }, `${label} validation failed`);
    throw new ValidationFailedError(`${label} validation failed: ${details.join("; ")}`, details);
  }

  return value;
}

/**
 * Validate a session start request.
 * Cross-field rules Joi can't express cleanly are checked afterwards.
 */
export function validateSessionRequest(input: unknown): StartSessionRequest {
  const request = validate(sessionRequestSchema, input, "Session request");
  const problems: string[] = [];

  if (request.dateFrom && !isIsoDate(request.dateFrom)) {
    problems.push(`"dateFrom" is not a calendar date`);
  }
  if (request.dateTo && !isIsoDate(request.dateTo)) {
    problems.push(`"dateTo" is not a calendar date`);
  }
  if (request.dateFrom && request.dateTo && request.dateFrom > request.dateTo) {
    problems.push(`"dateFrom" must not be after "dateTo"`);
  }
  if (request.endPage !== undefined && request.endPage < (request.startPage ?? 1)) {
    problems.push(`"endPage" must not be before "startPage"`);
  }
  if (request.agency === "ea" && request.actionTypes) {
    const allowed = request.database === "notices" ? ["enforcement_notice"] : ["court_case", "caution"];
    for (const actionType of request.actionTypes) {
      if (!allowed.includes(actionType)) {
        problems.push(`"${actionType}" is not listed in the ${request.database} register`);
      }
    }
  }

  if (problems.length > 0) {
    throw new ValidationFailedError(
      `Session request validation failed: ${problems.join("; ")}`,
      problems
    );
  }

  return request;
}

/** Validate the body of a review approve/skip/flag call */
export function validateReviewAction(input: unknown): ReviewActionBody {
  return validate(reviewActionSchema, input, "Review action");
}
