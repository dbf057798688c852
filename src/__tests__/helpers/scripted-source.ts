import { FetchError } from "../../shared/errors/scrape.errors";
import { err, ok } from "../../shared/types/result.types";
import type { Result } from "../../shared/types/result.types";
import type { AgencySource, SourceError, SummaryPage } from "../../scraping/agencies";
import type { HseCaseDetail, RawDetailRecord, SummaryRecord } from "../../shared/types/record.types";

const SCRAPED_AT = new Date("2024-03-01T09:00:00.000Z");

export function summary(sourceId: string): SummaryRecord {
  return {
    agencyCode: "hse",
    sourceId,
    displayName: `Company ${sourceId} Ltd`,
    rawAddress: null,
    eventDate: "14/03/2024",
    actionType: "court_case",
    detailUrl: `https://resources.hse.gov.uk/convictions/case/case_details.asp?SF=CN&SV=${sourceId}`,
    scrapedAt: SCRAPED_AT,
    listing: {},
  };
}

export function caseDetail(record: SummaryRecord, fine: number = 1000): HseCaseDetail {
  return {
    ...record,
    kind: "hse_case",
    database: "convictions",
    regulatorFunction: null,
    mainActivity: null,
    industry: null,
    localAuthority: null,
    address: null,
    postcode: null,
    fine,
    costs: 0,
    result: "Guilty",
    hearingDate: null,
    breaches: [],
    relatedCases: [],
  };
}

/** One entry per page: source ids to list, or "fail" for a page that cannot be fetched */
export type PageScript = string[] | "fail";

export interface ScriptedSourceOptions {
  /** hasMore on the last scripted page (earlier pages always have more) */
  lastPageHasMore?: boolean;
  /** Source ids whose detail page fails */
  failingDetails?: string[];
  /** Called before each detail fetch */
  onEnrich?: (record: SummaryRecord) => void;
  /** Awaited before each summary page is returned */
  beforePage?: (pageNumber: number) => Promise<void>;
}

/** Agency source that serves scripted pages without any HTTP */
export class ScriptedSource implements AgencySource {
  readonly agencyCode = "hse" as const;
  readonly database = "convictions";
  readonly pagesRequested: number[] = [];
  private readonly pages: PageScript[];
  private readonly options: ScriptedSourceOptions;

  constructor(pages: PageScript[], options: ScriptedSourceOptions = {}) {
    this.pages = pages;
    this.options = options;
  }

  async fetchSummaryPage(pageNumber: number): Promise<Result<SummaryPage, SourceError>> {
    this.pagesRequested.push(pageNumber);
    await this.options.beforePage?.(pageNumber);

    const url = `https://resources.hse.gov.uk/convictions/case/case_list.asp?PN=${pageNumber}`;
    const script = this.pages[pageNumber - 1];
    if (script === "fail") {
      return err(new FetchError("http", url, "HTTP 503", 503));
    }
    if (script === undefined) {
      return ok({ pageNumber, url, records: [], hasMore: false });
    }

    const isLast = pageNumber === this.pages.length;
    return ok({
      pageNumber,
      url,
      records: script.map(summary),
      hasMore: isLast ? (this.options.lastPageHasMore ?? true) : true,
    });
  }

  async enrich(record: SummaryRecord): Promise<Result<RawDetailRecord, SourceError>> {
    this.options.onEnrich?.(record);
    if (this.options.failingDetails?.includes(record.sourceId)) {
      return err(new FetchError("timeout", record.detailUrl, "timeout of 30000ms exceeded"));
    }
    return ok(caseDetail(record));
  }
}
