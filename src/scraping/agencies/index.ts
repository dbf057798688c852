/**
 * Source Factory
 *
 * Picks the agency source for a session target and checks that the range
 * kind suits it (HSE is paged, EA is date-windowed).
 */
import config from "../../config";
import { ValidationFailedError } from "../../shared/errors/scrape.errors";
import type { RangeParams, ScrapeTarget } from "../../shared/types/session.types";
import type { PageFetcher } from "../fetch/http-fetcher";
import type { AgencySource } from "./agency-source";
import { EaSource } from "./ea.source";
import { HseCaseSource, HseNoticeSource } from "./hse.source";

export type SourceFactory = (
  target: ScrapeTarget,
  range: RangeParams,
  fetcher: PageFetcher
) => AgencySource;

export const createAgencySource: SourceFactory = (target, range, fetcher) => {
  if (target.agency === "hse") {
    if (range.kind !== "pages") {
      throw new ValidationFailedError("HSE sessions take a page range");
    }
    if (target.database === "notices") {
      return new HseNoticeSource(fetcher, range.country ?? config.defaultHseCountry);
    }
    return new HseCaseSource(fetcher, target.database);
  }

  if (range.kind !== "dates") {
    throw new ValidationFailedError("EA sessions take a date range");
  }
  return new EaSource(fetcher, target.database, range);
};

export type { AgencySource, SummaryPage, SourceError } from "./agency-source";
