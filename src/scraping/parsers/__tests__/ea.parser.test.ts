import { describe, it, expect } from "vitest";
import { ParseError } from "../../../shared/errors/scrape.errors";
import type { SummaryRecord } from "../../../shared/types/record.types";
import { html } from "../../../__tests__/helpers/fake-fetcher";
import { parseEaDetail, parseEaSummary } from "../ea.parser";

const SCRAPED_AT = new Date("2024-03-01T09:00:00.000Z");
const REGISTER = "https://environment.data.gov.uk/public-register/enforcement-action/registration";

const SUMMARY_PAGE = html(`
  <table>
    <thead><tr><th>Name</th><th>Address</th><th>Date</th></tr></thead>
    <tbody>
      <tr>
        <td><a href="/public-register/enforcement-action/registration/10001">Riverside Farms Ltd</a></td>
        <td>Mill Lane, Ashford</td>
        <td>12/02/2024</td>
      </tr>
      <tr>
        <td><a href="/public-register/enforcement-action/registration/10002">Northgate Waste Ltd</a></td>
        <td>03/01/2024</td>
      </tr>
      <tr>
        <td>Unlinked Haulage Ltd</td>
        <td>Somewhere</td>
        <td>01/01/2024</td>
      </tr>
      <tr>
        <td><a href="/public-register/enforcement-action/registration/10001">Riverside Farms Ltd</a></td>
        <td>Mill Lane, Ashford</td>
        <td>12/02/2024</td>
      </tr>
    </tbody>
  </table>
`);

describe("parseEaSummary", () => {
  it("reads full and minimal rows, skipping unlinked and repeated ones", () => {
    const result = parseEaSummary(SUMMARY_PAGE, "court_case", SCRAPED_AT);

    expect(result).toEqual({
      ok: true,
      value: [
        {
          agencyCode: "ea",
          sourceId: "10001",
          displayName: "Riverside Farms Ltd",
          rawAddress: "Mill Lane, Ashford",
          eventDate: "12/02/2024",
          actionType: "court_case",
          detailUrl: `${REGISTER}/10001`,
          scrapedAt: SCRAPED_AT,
          listing: {},
        },
        {
          agencyCode: "ea",
          sourceId: "10002",
          displayName: "Northgate Waste Ltd",
          rawAddress: null,
          eventDate: "03/01/2024",
          actionType: "court_case",
          detailUrl: `${REGISTER}/10002`,
          scrapedAt: SCRAPED_AT,
          listing: {},
        },
      ],
    });
  });

  it("treats a no-results page as an empty listing", () => {
    expect(parseEaSummary(html("<p>No results found</p>"), "caution")).toEqual({ ok: true, value: [] });
  });

  it("rejects a page without a results table", () => {
    const result = parseEaSummary(html("<p>Service unavailable</p>"), "caution");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.message).toBe("EA register page has no results table");
  });
});

describe("parseEaDetail", () => {
  const summary: SummaryRecord = {
    agencyCode: "ea",
    sourceId: "10001",
    displayName: "Riverside Farms Ltd",
    rawAddress: "Mill Lane, Ashford",
    eventDate: "12/02/2024",
    actionType: "court_case",
    detailUrl: `${REGISTER}/10001`,
    scrapedAt: SCRAPED_AT,
    listing: {},
  };

  const DETAIL_PAGE = html(`
    <dl>
      <dt>Company No.</dt><dd>01234567</dd>
      <dt>Industry Sector</dt><dd>Agriculture</dd>
      <dt>Address</dt><dd>Mill Lane</dd>
      <dt>Town</dt><dd>Ashford</dd>
      <dt>County</dt><dd>Kent</dd>
      <dt>Postcode</dt><dd>tn23 1ab</dd>
      <dt>Total Fine</dt><dd>£12,500.00</dd>
      <dt>Offence</dt><dd>Causing polluting matter to enter a watercourse</dd>
      <dt>Case Reference</dt><dd>CR-77</dd>
      <dt>Event Reference</dt><dd>EV-1</dd>
      <dt>Agency Function</dt><dd>Water Quality</dd>
      <dt>Water Impact</dt><dd>Major</dd>
      <dt>Land Impact</dt><dd>None</dd>
      <dt>Air Impact</dt><dd>-</dd>
      <dt>Act</dt><dd>Environmental Permitting Regulations 2016</dd>
      <dt>Section</dt><dd>Regulation 38(1)(a)</dd>
    </dl>
  `);

  it("maps the labelled fields onto the EA detail variant", () => {
    const result = parseEaDetail(DETAIL_PAGE, summary, "court_case");

    expect(result).toEqual({
      ok: true,
      value: {
        ...summary,
        kind: "ea",
        eaActionType: "court_case",
        companyRegistrationNumber: "01234567",
        industrySector: "Agriculture",
        address: "Mill Lane",
        town: "Ashford",
        county: "Kent",
        postcode: "tn23 1ab",
        totalFine: 12500,
        offenceDescription: "Causing polluting matter to enter a watercourse",
        caseReference: "CR-77",
        eventReference: "EV-1",
        agencyFunction: "Water Quality",
        waterImpact: "Major",
        landImpact: "None",
        airImpact: null,
        act: "Environmental Permitting Regulations 2016",
        section: "Regulation 38(1)(a)",
      },
    });
  });

  it("reads older label/value table layouts and falls back to the listed address", () => {
    const page = html(`
      <table>
        <tr><th>Company No.:</th><td>SC123456</td></tr>
        <tr><th>Total Fine:</th><td>£800</td></tr>
      </table>
    `);

    const result = parseEaDetail(page, summary, "caution");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.companyRegistrationNumber).toBe("SC123456");
    expect(result.value.totalFine).toBe(800);
    expect(result.value.address).toBe("Mill Lane, Ashford");
    expect(result.value.town).toBeNull();
  });

  it("rejects a page with no labelled fields", () => {
    const result = parseEaDetail(html("<p>Not found</p>"), summary, "court_case");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("EA detail page has no labelled fields");
    expect(result.error.url).toBe(`${REGISTER}/10001`);
  });
});
