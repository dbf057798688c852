/**
 * Reviews Controller
 *
 * Lists match reviews and applies reviewer decisions.
 */
import type { NextFunction, Request, Response } from "express";
import { validateReviewAction } from "../../processing/data-validator";
import { ValidationFailedError } from "../../shared/errors/scrape.errors";
import type { ReviewStatus } from "../../shared/types/offender.types";
import type { ApiContext } from "../context";

const REVIEW_STATUSES: ReviewStatus[] = ["pending", "approved", "skipped", "flagged"];

function parseStatus(value: unknown): ReviewStatus | undefined {
  if (value === undefined) return undefined;
  const match = REVIEW_STATUSES.find((status) => status === value);
  if (!match) {
    throw new ValidationFailedError(`Unknown review status "${String(value)}"`, [
      `"status" must be one of ${REVIEW_STATUSES.join(", ")}`,
    ]);
  }
  return match;
}

export function reviewsController(ctx: ApiContext) {
  return {
    /** GET /reviews?status=pending */
    async list(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const reviews = await ctx.reviews.list(parseStatus(req.query.status));
        res.json({ reviews });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /reviews/:id/approve
     * Body: { candidateIndex, reviewedBy, notes? }
     */
    async approve(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = validateReviewAction(req.body);
        if (body.candidateIndex === undefined) {
          throw new ValidationFailedError("Review action validation failed", [
            `"candidateIndex" is required`,
          ]);
        }
        const result = await ctx.reviews.approve(
          req.params.id,
          body.candidateIndex,
          body.reviewedBy,
          body.notes ?? null
        );
        res.json(result);
      } catch (error) {
        next(error);
      }
    },

    /** POST /reviews/:id/skip */
    async skip(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = validateReviewAction(req.body);
        const review = await ctx.reviews.skip(req.params.id, body.reviewedBy, body.notes ?? null);
        res.json({ review });
      } catch (error) {
        next(error);
      }
    },

    /** POST /reviews/:id/flag */
    async flag(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = validateReviewAction(req.body);
        const review = await ctx.reviews.flag(req.params.id, body.reviewedBy, body.notes ?? null);
        res.json({ review });
      } catch (error) {
        next(error);
      }
    },
  };
}
