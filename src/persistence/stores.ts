/**
 * Store Contracts
 *
 * The pipeline talks to persistence only through these interfaces. The
 * Sequelize repositories implement them for MySQL; tests use in-memory
 * implementations. Every store must enforce:
 * - one record per (agencyCode, sourceId)
 * - one offender per identity key (normalized name + postcode)
 * - one match review per offender
 */
import type {
  AgencyCode,
  CanonicalRecord,
  OffenderAttrs,
  RecordFields,
  ResourceType,
  UpsertOutcome,
} from "../shared/types/record.types";
import type {
  MatchCandidate,
  MatchReview,
  NewMatchReview,
  Offender,
  OffenderCounters,
  ReviewStatus,
} from "../shared/types/offender.types";
import type { ScrapeSession } from "../shared/types/session.types";

export interface RecordUpsert extends RecordFields {
  resourceType: ResourceType;
  agencyCode: AgencyCode;
  sourceId: string;
  offenderId: string;
}

export interface RecordStore {
  findRecord(agencyCode: AgencyCode, sourceId: string): Promise<CanonicalRecord | null>;
  /** Insert, or compare and update changed fields of, the record with this identity */
  upsertCanonicalRecord(input: RecordUpsert): Promise<UpsertOutcome>;
  listRecords(resourceType: ResourceType): Promise<CanonicalRecord[]>;
  /** Point every record of one offender at another; returns the count moved */
  relinkOffender(fromOffenderId: string, toOffenderId: string): Promise<number>;
  offenderTotals(offenderId: string): Promise<OffenderCounters>;
}

export interface NameCandidateQuery {
  tokens: string[];
  /** Length of the normalized name being matched; closer lengths come first */
  nameLength: number;
  limit: number;
}

export interface OffenderStore {
  findOffender(id: string): Promise<Offender | null>;
  findByRegistrationNumber(registrationNumber: string): Promise<Offender | null>;
  findByNormalizedName(normalizedName: string): Promise<Offender | null>;
  /**
   * Unmerged offenders whose normalized name contains any of the tokens,
   * nearest name length first, then oldest first
   */
  findNameCandidates(query: NameCandidateQuery): Promise<Offender[]>;
  /** Insert-or-get on the identity key */
  findOrCreateOffender(attrs: OffenderAttrs): Promise<{ offender: Offender; created: boolean }>;
  updateOffender(id: string, patch: Partial<OffenderAttrs>): Promise<Offender>;
  updateCounters(id: string, counters: OffenderCounters): Promise<void>;
  /** Record that a reviewer merged one offender into another */
  markMerged(id: string, intoId: string): Promise<void>;
  listOffenders(): Promise<Offender[]>;
}

export interface ReviewUpdate {
  status: ReviewStatus;
  selectedCandidate?: MatchCandidate | null;
  reviewNotes?: string | null;
  reviewedBy: string;
  reviewedAt: Date;
}

export interface ReviewStore {
  /** Returns the existing review when the offender already has one */
  createMatchReview(input: NewMatchReview): Promise<MatchReview>;
  findReview(id: string): Promise<MatchReview | null>;
  listReviews(status?: ReviewStatus): Promise<MatchReview[]>;
  updateReview(id: string, update: ReviewUpdate): Promise<MatchReview>;
}

export interface SessionStore {
  saveSession(session: ScrapeSession): Promise<void>;
  findSession(sessionId: string): Promise<ScrapeSession | null>;
  listSessions(limit: number): Promise<ScrapeSession[]>;
}
