/**
 * Agency Source Contract
 *
 * A source knows how to list one page of summaries for its target and how
 * to enrich one summary into a detail record. Sessions drive sources; a
 * source never decides when to stop.
 */
import type { FetchError, ParseError } from "../../shared/errors/scrape.errors";
import type { AgencyCode, RawDetailRecord, SummaryRecord } from "../../shared/types/record.types";
import type { Result } from "../../shared/types/result.types";

export interface SummaryPage {
  pageNumber: number;
  url: string;
  records: SummaryRecord[];
  /** False once the source has nothing beyond this page */
  hasMore: boolean;
}

export type SourceError = FetchError | ParseError;

export interface AgencySource {
  readonly agencyCode: AgencyCode;
  readonly database: string;
  fetchSummaryPage(pageNumber: number): Promise<Result<SummaryPage, SourceError>>;
  enrich(summary: SummaryRecord): Promise<Result<RawDetailRecord, SourceError>>;
}
