/**
 * HTML Helpers (cheerio)
 *
 * Turns listing tables and label/value detail layouts into plain data so the
 * agency parsers never touch DOM nodes directly.
 */
import * as cheerio from "cheerio";
import { cleanText } from "../../shared/utils/text";

export interface Cell {
  text: string | null;
  /** href of the first link inside the cell */
  href: string | null;
}

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload);
}

/** Rows of `<td>` cells under the selector; header-only rows are dropped */
export function tableRows($: cheerio.CheerioAPI, selector: string = "table tr"): Cell[][] {
  const rows: Cell[][] = [];

  $(selector).each((_, row) => {
    const cells: Cell[] = [];
    $(row)
      .children("td")
      .each((_, td) => {
        const $td = $(td);
        const href = $td.find("a").first().attr("href");
        cells.push({ text: cleanText($td.text()), href: href ? href.trim() : null });
      });
    if (cells.length > 0) rows.push(cells);
  });

  return rows;
}

/** True when the page says the query matched nothing */
export function isEmptyResultPage($: cheerio.CheerioAPI): boolean {
  return /no (matching )?(results|records|cases|notices)( were)? found/i.test($("body").text());
}

export function normalizeLabel(label: string): string {
  return label.replace(/:\s*$/, "").replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Collect label → value pairs from definition lists and from table rows
 * laid out as label, value, label, value. The first occurrence of a label wins.
 */
export function extractLabelledFields($: cheerio.CheerioAPI): Map<string, string> {
  const fields = new Map<string, string>();

  const add = (label: string | null, value: string | null): void => {
    if (!label || !value) return;
    const key = normalizeLabel(label);
    if (!fields.has(key)) fields.set(key, value);
  };

  $("dt").each((_, dt) => {
    add(cleanText($(dt).text()), cleanText($(dt).nextAll("dd").first().text()));
  });

  $("tr").each((_, tr) => {
    const cells = $(tr)
      .children("td, th")
      .toArray()
      .map((cell) => cleanText($(cell).text()));
    for (let i = 0; i + 1 < cells.length; i += 2) {
      add(cells[i], cells[i + 1]);
    }
  });

  return fields;
}

/** Value for a label, or null when the page does not carry it */
export function field(fields: Map<string, string>, label: string): string | null {
  return fields.get(normalizeLabel(label)) ?? null;
}

/** href of the first link whose text matches */
export function linkHref($: cheerio.CheerioAPI, text: RegExp): string | null {
  const link = $("a")
    .toArray()
    .find((a) => text.test($(a).text()));
  if (!link) return null;
  return $(link).attr("href")?.trim() || null;
}
