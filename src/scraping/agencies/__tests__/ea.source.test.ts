import { describe, it, expect } from "vitest";
import type { DateRange } from "../../../shared/types/session.types";
import { FakeFetcher, html } from "../../../__tests__/helpers/fake-fetcher";
import { EaSource, isEaActionType } from "../ea.source";
import { eaRegisterUrl } from "../urls";

const RANGE: DateRange = {
  kind: "dates",
  dateFrom: "2024-01-01",
  dateTo: "2024-03-31",
  actionTypes: ["court_case", "caution"],
};

const DETAIL_URL = "https://environment.data.gov.uk/public-register/enforcement-action/registration/10001";

const LISTING = html(`
  <table><tbody>
    <tr>
      <td><a href="/public-register/enforcement-action/registration/10001">Riverside Farms Ltd</a></td>
      <td>Mill Lane, Ashford</td>
      <td>12/02/2024</td>
    </tr>
  </tbody></table>
`);

describe("EaSource", () => {
  it("queries one action type per page", async () => {
    const fetcher = new FakeFetcher({
      [eaRegisterUrl("court_case", "2024-01-01", "2024-03-31")]: LISTING,
      [eaRegisterUrl("caution", "2024-01-01", "2024-03-31")]: html("<p>No results found</p>"),
    });
    const source = new EaSource(fetcher, "cases", RANGE);

    const first = await source.fetchSummaryPage(1);
    const second = await source.fetchSummaryPage(2);

    expect(first.ok && first.value.records.map((record) => record.actionType)).toEqual(["court_case"]);
    expect(first.ok && first.value.hasMore).toBe(true);
    expect(second.ok && second.value.records).toEqual([]);
    expect(second.ok && second.value.hasMore).toBe(false);
  });

  it("returns an empty last page past the requested action types", async () => {
    const source = new EaSource(new FakeFetcher(), "cases", RANGE);

    expect(await source.fetchSummaryPage(3)).toEqual({
      ok: true,
      value: { pageNumber: 3, url: "", records: [], hasMore: false },
    });
  });

  it("enriches a summary from its detail page", async () => {
    const fetcher = new FakeFetcher({
      [eaRegisterUrl("court_case", "2024-01-01", "2024-03-31")]: LISTING,
      [DETAIL_URL]: html("<dl><dt>Company No.</dt><dd>1234567</dd><dt>Total Fine</dt><dd>£2,000</dd></dl>"),
    });
    const source = new EaSource(fetcher, "cases", RANGE);
    const page = await source.fetchSummaryPage(1);
    if (!page.ok) throw page.error;

    const detail = await source.enrich(page.value.records[0]);

    expect(detail.ok).toBe(true);
    if (!detail.ok || detail.value.kind !== "ea") throw new Error("expected an EA detail");
    expect(detail.value.eaActionType).toBe("court_case");
    expect(detail.value.companyRegistrationNumber).toBe("1234567");
    expect(detail.value.totalFine).toBe(2000);
    expect(fetcher.requested).toEqual([eaRegisterUrl("court_case", "2024-01-01", "2024-03-31"), DETAIL_URL]);
  });

  it("rejects summaries with an unknown action type", async () => {
    const source = new EaSource(new FakeFetcher(), "cases", RANGE);

    const detail = await source.enrich({
      agencyCode: "ea",
      sourceId: "1",
      displayName: "X Ltd",
      rawAddress: null,
      eventDate: "01/01/2024",
      actionType: "warning_letter",
      detailUrl: DETAIL_URL,
      scrapedAt: new Date("2024-03-01T09:00:00.000Z"),
      listing: {},
    });

    expect(detail.ok).toBe(false);
    if (detail.ok) return;
    expect(detail.error.message).toBe("Unknown EA action type: warning_letter");
  });
});

describe("isEaActionType", () => {
  it("accepts only register action types", () => {
    expect(isEaActionType("caution")).toBe(true);
    expect(isEaActionType("court-case")).toBe(false);
  });
});
