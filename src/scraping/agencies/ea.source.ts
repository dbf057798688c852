/**
 * Environment Agency Source
 *
 * The register answers a date-window query for one action type with the
 * whole result set on a single page, so a session's "pages" are the
 * requested action types in order.
 */
import { EA } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import { ParseError } from "../../shared/errors/scrape.errors";
import type {
  EaActionType,
  EaDatabase,
  RawDetailRecord,
  SummaryRecord,
} from "../../shared/types/record.types";
import type { DateRange } from "../../shared/types/session.types";
import { Result, err, ok } from "../../shared/types/result.types";
import type { PageFetcher } from "../fetch/http-fetcher";
import { parseEaDetail, parseEaSummary } from "../parsers/ea.parser";
import type { AgencySource, SourceError, SummaryPage } from "./agency-source";
import { eaRegisterUrl } from "./urls";

const EA_ACTION_TYPES: readonly EaActionType[] = ["court_case", "caution", "enforcement_notice"];

export function isEaActionType(value: string): value is EaActionType {
  return EA_ACTION_TYPES.some((type) => type === value);
}

export class EaSource implements AgencySource {
  readonly agencyCode = "ea" as const;
  readonly database: EaDatabase;
  private readonly fetcher: PageFetcher;
  private readonly range: DateRange;

  constructor(fetcher: PageFetcher, database: EaDatabase, range: DateRange) {
    this.fetcher = fetcher;
    this.database = database;
    this.range = range;
  }

  async fetchSummaryPage(pageNumber: number): Promise<Result<SummaryPage, SourceError>> {
    const actionType = this.range.actionTypes[pageNumber - 1];
    const hasMore = pageNumber < this.range.actionTypes.length;
    if (actionType === undefined) {
      return ok({ pageNumber, url: "", records: [], hasMore: false });
    }

    const url = eaRegisterUrl(actionType, this.range.dateFrom, this.range.dateTo);
    const response = await this.fetcher.fetch(url);
    if (!response.ok) return response;

    const parsed = parseEaSummary(response.value.body, actionType);
    if (!parsed.ok) return parsed;

    if (parsed.value.length >= EA.RESULT_CAP) {
      // TODO: split the date window into quarters when the register caps a query
      logger.warn(
        { actionType, dateFrom: this.range.dateFrom, dateTo: this.range.dateTo, rows: parsed.value.length },
        "EA query hit the register result cap; narrow the date range"
      );
    }

    return ok({ pageNumber, url, records: parsed.value, hasMore });
  }

  async enrich(summary: SummaryRecord): Promise<Result<RawDetailRecord, SourceError>> {
    if (!isEaActionType(summary.actionType)) {
      return err(new ParseError(`Unknown EA action type: ${summary.actionType}`, summary.detailUrl));
    }

    const response = await this.fetcher.fetch(summary.detailUrl);
    if (!response.ok) return response;

    return parseEaDetail(response.value.body, summary, summary.actionType);
  }
}
