/**
 * HSE Sources
 *
 * Convictions and appeals share the case layout; notices have their own
 * listing filtered by country. Listings are paged with PN=1, 2, ... and run
 * out when a page comes back empty.
 */
import { logger } from "../../monitoring/logger";
import type {
  HseCaseDetail,
  HseDatabase,
  HseNoticeDetail,
  RawDetailRecord,
  SummaryRecord,
} from "../../shared/types/record.types";
import { Result, ok } from "../../shared/types/result.types";
import { absoluteUrl } from "../../shared/utils/text";
import type { PageFetcher } from "../fetch/http-fetcher";
import {
  parseHseCaseBreaches,
  parseHseCaseDetail,
  parseHseCaseList,
  parseHseNoticeBreaches,
  parseHseNoticeDetail,
  parseHseNoticeList,
  parseHseRelatedCases,
} from "../parsers/hse.parser";
import type { AgencySource, SourceError, SummaryPage } from "./agency-source";
import { hseCaseBreachesUrl, hseCaseListUrl, hseNoticeBreachesUrl, hseNoticeListUrl } from "./urls";

export class HseCaseSource implements AgencySource {
  readonly agencyCode = "hse" as const;
  readonly database: HseDatabase;
  private readonly fetcher: PageFetcher;

  constructor(fetcher: PageFetcher, database: HseDatabase) {
    this.fetcher = fetcher;
    this.database = database;
  }

  async fetchSummaryPage(pageNumber: number): Promise<Result<SummaryPage, SourceError>> {
    const url = hseCaseListUrl(this.database, pageNumber);
    const response = await this.fetcher.fetch(url);
    if (!response.ok) return response;

    const parsed = parseHseCaseList(response.value.body, this.database);
    if (!parsed.ok) return parsed;

    return ok({ pageNumber, url, records: parsed.value, hasMore: parsed.value.length > 0 });
  }

  async enrich(summary: SummaryRecord): Promise<Result<RawDetailRecord, SourceError>> {
    const response = await this.fetcher.fetch(summary.detailUrl);
    if (!response.ok) return response;

    const parsed = parseHseCaseDetail(response.value.body, summary.detailUrl);
    if (!parsed.ok) return parsed;
    const { fields, links } = parsed.value;

    let breaches: string[] = [];
    let hearingDate: string | null = null;
    let result = fields.result;
    if (links.breaches) {
      const page = await this.fetchOptional(hseCaseBreachesUrl(this.database, summary.sourceId), summary);
      if (page !== null) {
        const parsedBreaches = parseHseCaseBreaches(page);
        breaches = parsedBreaches.breaches;
        hearingDate = parsedBreaches.hearingDate;
        result = parsedBreaches.result ?? result;
      }
    }

    let relatedCases: string[] = [];
    const relatedUrl = links.relatedCases ? absoluteUrl(links.relatedCases, summary.detailUrl) : null;
    if (relatedUrl) {
      const page = await this.fetchOptional(relatedUrl, summary);
      if (page !== null) relatedCases = parseHseRelatedCases(page);
    }

    const detail: HseCaseDetail = {
      ...summary,
      ...fields,
      kind: "hse_case",
      database: this.database,
      result,
      hearingDate,
      breaches,
      relatedCases,
    };
    return ok(detail);
  }

  /** Secondary pages are optional: a failure leaves the fields empty */
  private async fetchOptional(url: string, summary: SummaryRecord): Promise<string | null> {
    const response = await this.fetcher.fetch(url);
    if (response.ok) return response.value.body;
    logger.warn(
      { sourceId: summary.sourceId, url, error: response.error.message },
      "Secondary HSE page unavailable"
    );
    return null;
  }
}

export class HseNoticeSource implements AgencySource {
  readonly agencyCode = "hse" as const;
  readonly database = "notices" as const;
  private readonly fetcher: PageFetcher;
  private readonly country: string;

  constructor(fetcher: PageFetcher, country: string) {
    this.fetcher = fetcher;
    this.country = country;
  }

  async fetchSummaryPage(pageNumber: number): Promise<Result<SummaryPage, SourceError>> {
    const url = hseNoticeListUrl(pageNumber, this.country);
    const response = await this.fetcher.fetch(url);
    if (!response.ok) return response;

    const parsed = parseHseNoticeList(response.value.body, this.country);
    if (!parsed.ok) return parsed;

    return ok({ pageNumber, url, records: parsed.value, hasMore: parsed.value.length > 0 });
  }

  async enrich(summary: SummaryRecord): Promise<Result<RawDetailRecord, SourceError>> {
    const response = await this.fetcher.fetch(summary.detailUrl);
    if (!response.ok) return response;

    const parsed = parseHseNoticeDetail(response.value.body, summary);
    if (!parsed.ok) return parsed;

    let breaches: string[] = [];
    const breachPage = await this.fetcher.fetch(hseNoticeBreachesUrl(summary.sourceId));
    if (breachPage.ok) {
      breaches = parseHseNoticeBreaches(breachPage.value.body);
    } else {
      logger.warn(
        { sourceId: summary.sourceId, error: breachPage.error.message },
        "HSE notice breaches unavailable"
      );
    }

    const detail: HseNoticeDetail = { ...summary, ...parsed.value, kind: "hse_notice", breaches };
    return ok(detail);
  }
}
