/**
 * Environment Agency Parsers
 *
 * The public register lists actions in `table tbody tr` rows:
 * - full layout:    [name (link), address, date]
 * - minimal layout: [name (link), date]
 *
 * Detail pages are definition lists (dt/dd) on current pages and
 * label/value table rows on older ones.
 */
import { EA } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import { ParseError } from "../../shared/errors/scrape.errors";
import type { EaActionType, EaDetail, SummaryRecord } from "../../shared/types/record.types";
import { Result, err, ok } from "../../shared/types/result.types";
import { absoluteUrl, parseMoney } from "../../shared/utils/text";
import { Cell, extractLabelledFields, field, isEmptyResultPage, loadHtml, tableRows } from "./html";
import { deriveSourceId, uniqueBySourceId } from "./source-id";

interface RowFields {
  name: string;
  href: string;
  address: string | null;
  date: string;
}

function fullLayout(cells: Cell[]): RowFields | null {
  if (cells.length < 3) return null;
  const [nameCell, addressCell, dateCell] = cells;
  if (!nameCell.text || !nameCell.href || !dateCell.text) return null;
  return { name: nameCell.text, href: nameCell.href, address: addressCell.text, date: dateCell.text };
}

function minimalLayout(cells: Cell[]): RowFields | null {
  if (cells.length !== 2) return null;
  const [nameCell, dateCell] = cells;
  if (!nameCell.text || !nameCell.href || !dateCell.text) return null;
  return { name: nameCell.text, href: nameCell.href, address: null, date: dateCell.text };
}

/**
 * Parse one register results page.
 * Rows without a name, date or detail link are skipped.
 */
export function parseEaSummary(
  html: string,
  actionType: EaActionType,
  scrapedAt: Date = new Date()
): Result<SummaryRecord[], ParseError> {
  const $ = loadHtml(html);

  if ($("table").length === 0) {
    if (isEmptyResultPage($)) return ok([]);
    return err(new ParseError("EA register page has no results table"));
  }

  const records: SummaryRecord[] = [];
  const rows = tableRows($, "table tbody tr");

  rows.forEach((cells, index) => {
    const row = fullLayout(cells) ?? minimalLayout(cells);
    if (!row) {
      logger.debug({ index, cellCount: cells.length }, "Skipping EA row without name, date or link");
      return;
    }

    const detailUrl = absoluteUrl(row.href, EA.BASE_URL);
    if (!detailUrl) {
      logger.debug({ index, href: row.href }, "Skipping EA row with unusable link");
      return;
    }

    records.push({
      agencyCode: "ea",
      sourceId: deriveSourceId("ea", detailUrl),
      displayName: row.name,
      rawAddress: row.address,
      eventDate: row.date,
      actionType,
      detailUrl,
      scrapedAt,
      listing: {},
    });
  });

  return ok(uniqueBySourceId(records));
}

/** Parse an enforcement action detail page into the EA detail variant */
export function parseEaDetail(
  html: string,
  summary: SummaryRecord,
  actionType: EaActionType
): Result<EaDetail, ParseError> {
  const $ = loadHtml(html);
  const fields = extractLabelledFields($);

  if (fields.size === 0) {
    return err(new ParseError("EA detail page has no labelled fields", summary.detailUrl));
  }

  const L = EA.LABELS;
  const detail: EaDetail = {
    ...summary,
    kind: "ea",
    eaActionType: actionType,
    companyRegistrationNumber: field(fields, L.COMPANY_NUMBER),
    industrySector: field(fields, L.INDUSTRY_SECTOR),
    address: field(fields, L.ADDRESS) ?? summary.rawAddress,
    town: field(fields, L.TOWN),
    county: field(fields, L.COUNTY),
    postcode: field(fields, L.POSTCODE),
    totalFine: parseMoney(field(fields, L.TOTAL_FINE)),
    offenceDescription: field(fields, L.OFFENCE),
    caseReference: field(fields, L.CASE_REFERENCE),
    eventReference: field(fields, L.EVENT_REFERENCE),
    agencyFunction: field(fields, L.AGENCY_FUNCTION),
    waterImpact: field(fields, L.WATER_IMPACT),
    landImpact: field(fields, L.LAND_IMPACT),
    airImpact: field(fields, L.AIR_IMPACT),
    act: field(fields, L.ACT),
    section: field(fields, L.SECTION),
  };
  return ok(detail);
}
