/**
 * Offender Resolver
 *
 * Finds the offender a scraped organization belongs to:
 * 1. Exact Companies House number
 * 2. Exact normalized name
 * 3. Fuzzy name match against existing offenders
 *    - score >= high threshold: link to the best candidate
 *    - low <= score < high: create a placeholder offender, attach the record
 *      to it, and open a pending MatchReview listing the ranked candidates
 *      (existing offenders and registry companies)
 *    - score < low: create a new offender
 *
 * An offender a reviewer merged into another is never linked to directly;
 * resolution follows the merge to the offender that absorbed it.
 *
 * Registry lookups are best-effort; an unavailable registry only means the
 * review has no registry candidates.
 */
import config from "../config";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import type { OffenderStore, ReviewStore } from "../persistence/stores";
import { ResolveError, errorMessage } from "../shared/errors/scrape.errors";
import type {
  MatchCandidate,
  Offender,
  Resolution,
} from "../shared/types/offender.types";
import type { OffenderAttrs } from "../shared/types/record.types";
import { Result, err, ok } from "../shared/types/result.types";
import { cleanCompanyNumber, normalizeCompanyName } from "../shared/utils/company";
import { SimilarityScorer, significantTokens, trigramSimilarity } from "../shared/utils/similarity";
import type { CompanyRegistry } from "./registry/companies-house.client";

export interface ResolverOptions {
  highThreshold: number;
  lowThreshold: number;
  /** How many candidates a review lists */
  candidateLimit: number;
  /** Upper bound on offenders pulled from the store for fuzzy scoring */
  searchLimit: number;
  scorer: SimilarityScorer;
}

export interface ResolverDependencies {
  offenders: OffenderStore;
  reviews: ReviewStore;
  registry: CompanyRegistry | null;
}

interface ScoredOffender {
  offender: Offender;
  score: number;
}

const DEFAULT_OPTIONS: ResolverOptions = {
  highThreshold: config.matchHighThreshold,
  lowThreshold: config.matchLowThreshold,
  candidateLimit: config.reviewCandidateLimit,
  searchLimit: 500,
  scorer: trigramSimilarity,
};

export class OffenderResolver {
  private readonly deps: ResolverDependencies;
  private readonly options: ResolverOptions;

  constructor(deps: ResolverDependencies, options: Partial<ResolverOptions> = {}) {
    this.deps = deps;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async resolve(attrs: OffenderAttrs): Promise<Result<Resolution, ResolveError>> {
    try {
      return ok(await this.resolveOrThrow(attrs));
    } catch (error) {
      logger.error({ name: attrs.name, error: errorMessage(error) }, "Offender resolution failed");
      return err(new ResolveError(errorMessage(error)));
    }
  }

  private async resolveOrThrow(input: OffenderAttrs): Promise<Resolution> {
    const { offenders } = this.deps;
    const registrationNumber = cleanCompanyNumber(input.registrationNumber);
    const attrs: OffenderAttrs = { ...input, registrationNumber };

    if (registrationNumber) {
      const byNumber = await offenders.findByRegistrationNumber(registrationNumber);
      if (byNumber) {
        const offender = await this.followMerges(byNumber);
        return { offender, outcome: "linked", matchedBy: "registration_number", score: 1, review: null };
      }
    }

    const normalizedName = normalizeCompanyName(attrs.name);
    const byName = await offenders.findByNormalizedName(normalizedName);
    if (byName) {
      const canonical = await this.followMerges(byName);
      const offender =
        registrationNumber && !canonical.registrationNumber
          ? await offenders.updateOffender(canonical.id, { registrationNumber })
          : canonical;
      return { offender, outcome: "linked", matchedBy: "exact_name", score: 1, review: null };
    }

    const ranked = await this.rankOffenders(normalizedName);
    const best = ranked[0];

    if (best && best.score >= this.options.highThreshold) {
      logger.debug(
        { name: attrs.name, matched: best.offender.name, score: best.score },
        "Fuzzy match linked offender"
      );
      return { offender: best.offender, outcome: "linked", matchedBy: "fuzzy", score: best.score, review: null };
    }

    if (best && best.score >= this.options.lowThreshold) {
      return this.openReview(attrs, normalizedName, ranked, best.score);
    }

    const { offender: match, created } = await offenders.findOrCreateOffender(attrs);
    const offender = created ? match : await this.followMerges(match);
    return {
      offender,
      outcome: created ? "created" : "linked",
      matchedBy: created ? null : "exact_name",
      score: best ? best.score : null,
      review: null,
    };
  }

  private async rankOffenders(normalizedName: string): Promise<ScoredOffender[]> {
    const tokens = significantTokens(normalizedName);
    if (tokens.length === 0) return [];

    const { searchLimit } = this.options;
    const candidates = await this.deps.offenders.findNameCandidates({
      tokens,
      nameLength: normalizedName.length,
      limit: searchLimit,
    });
    if (candidates.length >= searchLimit) {
      logger.warn(
        { name: normalizedName, tokens, searchLimit },
        "Fuzzy candidate search hit its limit; only the nearest names were scored"
      );
    }

    return candidates
      .map((offender) => ({
        offender,
        score: this.options.scorer(normalizedName, offender.normalizedName),
      }))
      .sort((a, b) => b.score - a.score);
  }

  /** The offender a merge chain ends at */
  private async followMerges(offender: Offender): Promise<Offender> {
    let current = offender;
    const visited = new Set<string>([current.id]);
    while (current.mergedIntoId && !visited.has(current.mergedIntoId)) {
      const next = await this.deps.offenders.findOffender(current.mergedIntoId);
      if (!next) {
        logger.warn({ offenderId: current.id, mergedIntoId: current.mergedIntoId }, "Merge target missing");
        break;
      }
      visited.add(next.id);
      current = next;
    }
    return current;
  }

  private async openReview(
    attrs: OffenderAttrs,
    normalizedName: string,
    ranked: ScoredOffender[],
    confidenceScore: number
  ): Promise<Resolution> {
    const { offender: placeholder } = await this.deps.offenders.findOrCreateOffender(attrs);

    const offenderCandidates: MatchCandidate[] = ranked
      .filter((entry) => entry.offender.id !== placeholder.id)
      .map((entry): MatchCandidate => ({
        source: "offender",
        offenderId: entry.offender.id,
        companyNumber: entry.offender.registrationNumber,
        companyName: entry.offender.name,
        companyStatus: null,
        companyType: null,
        address: entry.offender.address,
        similarityScore: entry.score,
      }));

    const registryCandidates = await this.registryCandidates(attrs.name, normalizedName);
    const candidateCompanies = [...offenderCandidates, ...registryCandidates]
      .sort((a, b) => b.similarityScore - a.similarityScore)
      .slice(0, this.options.candidateLimit);

    const review = await this.deps.reviews.createMatchReview({
      offenderId: placeholder.id,
      confidenceScore,
      candidateCompanies,
    });
    metrics.increment("match_reviews_total", { action: "created" });

    logger.info(
      { name: attrs.name, offenderId: placeholder.id, reviewId: review.id, confidenceScore },
      "Ambiguous offender match sent for review"
    );

    return {
      offender: placeholder,
      outcome: "review_pending",
      matchedBy: "fuzzy",
      score: confidenceScore,
      review,
    };
  }

  private async registryCandidates(name: string, normalizedName: string): Promise<MatchCandidate[]> {
    const { registry } = this.deps;
    if (!registry) return [];

    try {
      const companies = await registry.lookupCompany(name);
      return companies.map((company): MatchCandidate => ({
        source: "registry",
        offenderId: null,
        companyNumber: company.companyNumber,
        companyName: company.companyName,
        companyStatus: company.companyStatus,
        companyType: company.companyType,
        address: company.address,
        similarityScore: this.options.scorer(normalizedName, normalizeCompanyName(company.companyName)),
      }));
    } catch (error) {
      logger.warn({ name, error: errorMessage(error) }, "Registry lookup unavailable, reviewing without it");
      return [];
    }
  }
}
