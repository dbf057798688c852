/**
 * Offender and Match Review Types
 */
import type { OffenderAttrs } from "./record.types";

export interface Offender extends OffenderAttrs {
  id: string;
  normalizedName: string;
  /** Set when a reviewer merged this offender into another */
  mergedIntoId: string | null;
  totalCases: number;
  totalNotices: number;
  totalFines: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface OffenderCounters {
  totalCases: number;
  totalNotices: number;
  totalFines: number;
}

export type ReviewStatus = "pending" | "approved" | "skipped" | "flagged";

export type CandidateSource = "offender" | "registry";

/** One ranked suggestion on a match review */
export interface MatchCandidate {
  source: CandidateSource;
  /** Existing offender id (source "offender") */
  offenderId: string | null;
  companyNumber: string | null;
  companyName: string;
  companyStatus: string | null;
  companyType: string | null;
  address: string | null;
  similarityScore: number;
}

export interface MatchReview {
  id: string;
  offenderId: string;
  status: ReviewStatus;
  confidenceScore: number;
  candidateCompanies: MatchCandidate[];
  selectedCandidate: MatchCandidate | null;
  reviewNotes: string | null;
  reviewedBy: string | null;
  reviewedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewMatchReview = Pick<
  MatchReview,
  "offenderId" | "confidenceScore" | "candidateCompanies"
>;

/** A company as returned by the external registry */
export interface CompanyCandidate {
  companyNumber: string;
  companyName: string;
  companyStatus: string | null;
  companyType: string | null;
  address: string | null;
}

export type ResolveOutcome = "linked" | "created" | "review_pending";
export type MatchStrategy = "registration_number" | "exact_name" | "fuzzy";

export interface Resolution {
  offender: Offender;
  outcome: ResolveOutcome;
  matchedBy: MatchStrategy | null;
  score: number | null;
  review: MatchReview | null;
}
