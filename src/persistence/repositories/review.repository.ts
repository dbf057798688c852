/**
 * Match Review Repository
 *
 * Sequelize implementation of ReviewStore over MATCH_REVIEW.
 * An offender has at most one review; creating a second returns the first.
 */
import { MatchReviewModel } from "../db/models";
import { ReviewNotFoundError } from "../../shared/errors/scrape.errors";
import type {
  MatchReview,
  NewMatchReview,
  ReviewStatus,
} from "../../shared/types/offender.types";
import type { ReviewStore, ReviewUpdate } from "../stores";

function toReview(model: MatchReviewModel): MatchReview {
  return model.get({ plain: true });
}

export async function createMatchReview(input: NewMatchReview): Promise<MatchReview> {
  const [model] = await MatchReviewModel.findOrCreate({
    where: { offenderId: input.offenderId },
    defaults: { ...input, status: "pending" },
  });
  return toReview(model);
}

export async function findReview(id: string): Promise<MatchReview | null> {
  const model = await MatchReviewModel.findByPk(id);
  return model ? toReview(model) : null;
}

export async function listReviews(status?: ReviewStatus): Promise<MatchReview[]> {
  const models = await MatchReviewModel.findAll({
    where: status ? { status } : {},
    order: [["createdAt", "ASC"]],
  });
  return models.map(toReview);
}

export async function updateReview(id: string, update: ReviewUpdate): Promise<MatchReview> {
  const model = await MatchReviewModel.findByPk(id);
  if (!model) {
    throw new ReviewNotFoundError(id);
  }
  await model.update(update);
  return toReview(model);
}

export const reviewRepository: ReviewStore = {
  createMatchReview,
  findReview,
  listReviews,
  updateReview,
};
