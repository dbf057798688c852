/**
 * Match Review Service
 *
 * Reviewer actions on ambiguous offender matches:
 * - approve: move the placeholder offender's records to the chosen candidate
 *   and mark the placeholder merged into it, so later scrapes of the same
 *   name resolve to the candidate (or stamp the chosen company number on
 *   the placeholder)
 * - skip: keep the placeholder as a separate offender
 * - flag: park the review for follow-up
 *
 * Reviews are never deleted. Approved and skipped are terminal.
 */
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import type { OffenderStore, RecordStore, ReviewStore } from "../persistence/stores";
import {
  CandidateNotFoundError,
  InvalidReviewTransitionError,
  ReviewNotFoundError,
} from "../shared/errors/scrape.errors";
import type { MatchCandidate, MatchReview, ReviewStatus } from "../shared/types/offender.types";
import { refreshOffenderCounters } from "./offender-counters";

export type ReviewAction = "approve" | "skip" | "flag";

const ALLOWED_FROM: Record<ReviewAction, readonly ReviewStatus[]> = {
  approve: ["pending", "flagged"],
  skip: ["pending", "flagged"],
  flag: ["pending"],
};

export interface ReviewServiceDependencies {
  reviews: ReviewStore;
  offenders: OffenderStore;
  records: RecordStore;
  now?: () => Date;
}

export interface ApproveResult {
  review: MatchReview;
  /** Offender the placeholder's records now belong to */
  offenderId: string;
  recordsMoved: number;
}

export class ReviewService {
  private readonly deps: ReviewServiceDependencies;
  private readonly now: () => Date;

  constructor(deps: ReviewServiceDependencies) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  list(status?: ReviewStatus): Promise<MatchReview[]> {
    return this.deps.reviews.listReviews(status);
  }

  async approve(
    reviewId: string,
    candidateIndex: number,
    reviewedBy: string,
    notes: string | null = null
  ): Promise<ApproveResult> {
    const review = await this.load(reviewId, "approve");
    const candidate: MatchCandidate | undefined = review.candidateCompanies[candidateIndex];
    if (!candidate) {
      throw new CandidateNotFoundError(reviewId, candidateIndex);
    }

    const placeholderId = review.offenderId;
    const targetId = await this.targetOffender(placeholderId, candidate);

    let recordsMoved = 0;
    if (targetId !== placeholderId) {
      recordsMoved = await this.deps.records.relinkOffender(placeholderId, targetId);
      await this.deps.offenders.markMerged(placeholderId, targetId);
      await refreshOffenderCounters(this.deps, placeholderId);
    }
    await refreshOffenderCounters(this.deps, targetId);

    const updated = await this.deps.reviews.updateReview(reviewId, {
      status: "approved",
      selectedCandidate: candidate,
      reviewNotes: notes,
      reviewedBy,
      reviewedAt: this.now(),
    });
    metrics.increment("match_reviews_total", { action: "approve" });

    logger.info(
      { reviewId, placeholderId, targetId, recordsMoved, reviewedBy },
      "Match review approved"
    );

    return { review: updated, offenderId: targetId, recordsMoved };
  }

  async skip(reviewId: string, reviewedBy: string, notes: string | null = null): Promise<MatchReview> {
    await this.load(reviewId, "skip");
    const updated = await this.deps.reviews.updateReview(reviewId, {
      status: "skipped",
      reviewNotes: notes,
      reviewedBy,
      reviewedAt: this.now(),
    });
    metrics.increment("match_reviews_total", { action: "skip" });
    logger.info({ reviewId, reviewedBy }, "Match review skipped");
    return updated;
  }

  async flag(reviewId: string, reviewedBy: string, notes: string | null = null): Promise<MatchReview> {
    await this.load(reviewId, "flag");
    const updated = await this.deps.reviews.updateReview(reviewId, {
      status: "flagged",
      reviewNotes: notes,
      reviewedBy,
      reviewedAt: this.now(),
    });
    metrics.increment("match_reviews_total", { action: "flag" });
    logger.info({ reviewId, reviewedBy }, "Match review flagged");
    return updated;
  }

  private async load(reviewId: string, action: ReviewAction): Promise<MatchReview> {
    const review = await this.deps.reviews.findReview(reviewId);
    if (!review) throw new ReviewNotFoundError(reviewId);
    if (!ALLOWED_FROM[action].includes(review.status)) {
      throw new InvalidReviewTransitionError(reviewId, review.status, action);
    }
    return review;
  }

  /**
   * An offender candidate is the target itself. A registry candidate maps to
   * whichever offender already holds that company number, else the number
   * is recorded on the placeholder.
   */
  private async targetOffender(placeholderId: string, candidate: MatchCandidate): Promise<string> {
    if (candidate.source === "offender" && candidate.offenderId) {
      return candidate.offenderId;
    }

    if (candidate.companyNumber) {
      const holder = await this.deps.offenders.findByRegistrationNumber(candidate.companyNumber);
      if (holder && holder.id !== placeholderId) return holder.id;
      await this.deps.offenders.updateOffender(placeholderId, {
        registrationNumber: candidate.companyNumber,
      });
    }

    return placeholderId;
  }
}
