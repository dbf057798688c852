/**
 * HSE Parsers
 *
 * Case listings:   [case id (link), defendant, date, local authority, main activity]
 *                  falling back to [case id (link), defendant, date]
 * Notice listings: [notice number (link), recipient, notice type, issue date,
 *                  local authority, SIC] falling back to the first four cells
 *
 * Detail pages lay out label/value pairs across table rows. Breach and
 * related-case pages are plain tables parsed by cell position.
 */
import { HSE } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import { ParseError } from "../../shared/errors/scrape.errors";
import type {
  HseCaseDetail,
  HseDatabase,
  HseNoticeDetail,
  SummaryRecord,
} from "../../shared/types/record.types";
import { Result, err, ok } from "../../shared/types/result.types";
import { extractPostcode } from "../../shared/utils/company";
import { parseMoney } from "../../shared/utils/text";
import { hseCaseDetailUrl, hseNoticeDetailUrl } from "../agencies/urls";
import { Cell, extractLabelledFields, field, isEmptyResultPage, linkHref, loadHtml, tableRows } from "./html";
import { deriveSourceId, uniqueBySourceId } from "./source-id";

interface ListingRow {
  id: string;
  name: string;
  date: string;
  localAuthority?: string;
  mainActivity?: string;
  noticeType?: string;
  sicCode?: string;
}

function present(cell: Cell | undefined): string | undefined {
  return cell?.text ?? undefined;
}

function caseRow(cells: Cell[]): ListingRow | null {
  if (cells.length < 3) return null;
  const [idCell, nameCell, dateCell] = cells;
  if (!idCell.text || !idCell.href || !nameCell.text || !dateCell.text) return null;
  const row: ListingRow = { id: idCell.text, name: nameCell.text, date: dateCell.text };
  if (cells.length >= 5) {
    row.localAuthority = present(cells[3]);
    row.mainActivity = present(cells[4]);
  }
  return row;
}

function noticeRow(cells: Cell[]): ListingRow | null {
  if (cells.length < 4) return null;
  const [idCell, nameCell, typeCell, dateCell] = cells;
  if (!idCell.text || !idCell.href || !nameCell.text || !dateCell.text) return null;
  const row: ListingRow = {
    id: idCell.text,
    name: nameCell.text,
    date: dateCell.text,
    noticeType: present(typeCell),
  };
  if (cells.length >= 6) {
    row.localAuthority = present(cells[4]);
    row.sicCode = present(cells[5]);
  }
  return row;
}

function parseListing(
  html: string,
  toRow: (cells: Cell[]) => ListingRow | null,
  toDetailUrl: (id: string) => string,
  actionType: string,
  scrapedAt: Date,
  country?: string
): Result<SummaryRecord[], ParseError> {
  const $ = loadHtml(html);

  if ($("table").length === 0) {
    if (isEmptyResultPage($)) return ok([]);
    return err(new ParseError("HSE listing page has no results table"));
  }

  const records: SummaryRecord[] = [];
  tableRows($).forEach((cells, index) => {
    const row = toRow(cells);
    if (!row) {
      logger.debug({ index, cellCount: cells.length }, "Skipping HSE row without id, name, date or link");
      return;
    }

    const detailUrl = toDetailUrl(row.id);
    records.push({
      agencyCode: "hse",
      sourceId: deriveSourceId("hse", detailUrl),
      displayName: row.name,
      rawAddress: null,
      eventDate: row.date,
      actionType,
      detailUrl,
      scrapedAt,
      listing: {
        localAuthority: row.localAuthority,
        mainActivity: row.mainActivity,
        noticeType: row.noticeType,
        sicCode: row.sicCode,
        country,
      },
    });
  });

  return ok(uniqueBySourceId(records));
}

export function parseHseCaseList(
  html: string,
  database: HseDatabase,
  scrapedAt: Date = new Date()
): Result<SummaryRecord[], ParseError> {
  return parseListing(html, caseRow, (id) => hseCaseDetailUrl(database, id), "court_case", scrapedAt);
}

export function parseHseNoticeList(
  html: string,
  country: string,
  scrapedAt: Date = new Date()
): Result<SummaryRecord[], ParseError> {
  return parseListing(
    html,
    noticeRow,
    hseNoticeDetailUrl,
    "enforcement_notice",
    scrapedAt,
    country
  );
}

/** Links on a case detail page that lead to secondary listings */
export interface CaseDetailLinks {
  breaches: string | null;
  relatedCases: string | null;
}

export type CaseDetailFields = Omit<HseCaseDetail, keyof SummaryRecord | "kind" | "database" | "breaches" | "relatedCases" | "hearingDate">;

export function parseHseCaseDetail(
  html: string,
  url: string
): Result<{ fields: CaseDetailFields; links: CaseDetailLinks }, ParseError> {
  const $ = loadHtml(html);
  const fields = extractLabelledFields($);
  if (fields.size === 0) {
    return err(new ParseError("HSE case page has no labelled fields", url));
  }

  const L = HSE.LABELS;
  const address = field(fields, L.ADDRESS);
  return ok({
    fields: {
      regulatorFunction: field(fields, L.DIRECTORATE),
      mainActivity: field(fields, L.MAIN_ACTIVITY),
      industry: field(fields, L.INDUSTRY),
      localAuthority: field(fields, L.LOCAL_AUTHORITY),
      address,
      postcode: field(fields, L.POSTCODE) ?? extractPostcode(address),
      fine: parseMoney(field(fields, L.TOTAL_FINE)),
      costs: parseMoney(field(fields, L.TOTAL_COSTS)),
      result: field(fields, L.RESULT),
    },
    links: {
      breaches: linkHref($, HSE.LINKS.BREACHES),
      relatedCases: linkHref($, HSE.LINKS.RELATED_CASES),
    },
  });
}

export type NoticeDetailFields = Omit<HseNoticeDetail, keyof SummaryRecord | "kind" | "breaches">;

export function parseHseNoticeDetail(
  html: string,
  summary: SummaryRecord
): Result<NoticeDetailFields, ParseError> {
  const $ = loadHtml(html);
  const fields = extractLabelledFields($);
  if (fields.size === 0) {
    return err(new ParseError("HSE notice page has no labelled fields", summary.detailUrl));
  }

  const L = HSE.LABELS;
  const address = field(fields, L.ADDRESS);
  return ok({
    noticeType: summary.listing.noticeType ?? null,
    regulatorFunction: field(fields, L.DIRECTORATE),
    mainActivity: field(fields, L.MAIN_ACTIVITY) ?? summary.listing.mainActivity ?? null,
    industry: field(fields, L.INDUSTRY),
    localAuthority: field(fields, L.LOCAL_AUTHORITY) ?? summary.listing.localAuthority ?? null,
    sicCode: summary.listing.sicCode ?? null,
    country: summary.listing.country ?? null,
    address,
    postcode: field(fields, L.POSTCODE) ?? extractPostcode(address),
    complianceDate: field(fields, L.COMPLIANCE_DATE),
    revisedComplianceDate: field(fields, L.REVISED_COMPLIANCE_DATE),
    description: field(fields, L.DESCRIPTION),
    result: field(fields, L.RESULT),
  });
}

export interface CaseBreaches {
  breaches: string[];
  hearingDate: string | null;
  result: string | null;
}

/**
 * Case breach list: six cells per offence, hearing date in the third,
 * result in the fourth, breach text in the sixth. The last offence's
 * hearing date and result describe the case.
 */
export function parseHseCaseBreaches(html: string): CaseBreaches {
  const $ = loadHtml(html);
  const summary: CaseBreaches = { breaches: [], hearingDate: null, result: null };

  for (const cells of tableRows($)) {
    if (cells.length !== 6) continue;
    const breach = cells[5].text;
    if (!breach) continue;
    summary.breaches.push(breach);
    summary.hearingDate = cells[2].text ?? summary.hearingDate;
    summary.result = cells[3].text ?? summary.result;
  }

  return summary;
}

/** Notice breach list: five cells per breach, breach text in the fourth */
export function parseHseNoticeBreaches(html: string): string[] {
  const $ = loadHtml(html);
  const breaches: string[] = [];
  for (const cells of tableRows($)) {
    if (cells.length !== 5) continue;
    const breach = cells[3].text;
    if (breach) breaches.push(breach);
  }
  return breaches;
}

/** Related case ids (five-cell rows with a linked case number) */
export function parseHseRelatedCases(html: string): string[] {
  const $ = loadHtml(html);
  const related: string[] = [];
  for (const cells of tableRows($)) {
    if (cells.length !== 5) continue;
    const [idCell] = cells;
    if (!idCell.text || !idCell.href) continue;
    related.push(`${HSE.RELATED_CASE_PREFIX}${idCell.text}`);
  }
  return related;
}
