import { describe, it, expect } from "vitest";
import { ValidationFailedError } from "../../shared/errors/scrape.errors";
import { validateReviewAction, validateSessionRequest } from "../data-validator";

function validationDetails(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationFailedError) return error.details;
    throw error;
  }
  throw new Error("expected a validation failure");
}

describe("validateSessionRequest", () => {
  it("accepts a paged HSE request and strips unknown keys", () => {
    expect(
      validateSessionRequest({ agency: "hse", database: "convictions", startPage: 2, maxPages: 5, extra: true })
    ).toEqual({ agency: "hse", database: "convictions", startPage: 2, maxPages: 5 });
  });

  it("accepts a dated EA request", () => {
    expect(
      validateSessionRequest({
        agency: "ea",
        database: "cases",
        dateFrom: "2024-01-01",
        dateTo: "2024-01-31",
        actionTypes: ["caution"],
      })
    ).toEqual({
      agency: "ea",
      database: "cases",
      dateFrom: "2024-01-01",
      dateTo: "2024-01-31",
      actionTypes: ["caution"],
    });
  });

  it("reports every schema problem at once", () => {
    const details = validationDetails(() => validateSessionRequest({ database: "convictions", maxPages: 0 }));

    expect(details).toContain('"agency" is required');
    expect(details).toContain('"maxPages" must be greater than or equal to 1');
  });

  it("checks the database against the agency", () => {
    const details = validationDetails(() => validateSessionRequest({ agency: "hse", database: "cases" }));

    expect(details).toEqual(['"database" must be one of [convictions, appeals, notices]']);
  });

  it("forbids dates on HSE requests and requires them on EA ones", () => {
    expect(
      validationDetails(() =>
        validateSessionRequest({ agency: "hse", database: "notices", dateFrom: "2024-01-01" })
      )
    ).toEqual(['"dateFrom" is not allowed']);

    expect(validationDetails(() => validateSessionRequest({ agency: "ea", database: "cases" }))).toEqual([
      '"dateFrom" is required',
      '"dateTo" is required',
    ]);
  });

  it("rejects impossible and reversed dates", () => {
    expect(
      validationDetails(() =>
        validateSessionRequest({ agency: "ea", database: "cases", dateFrom: "2024-02-30", dateTo: "2024-03-01" })
      )
    ).toEqual(['"dateFrom" is not a calendar date']);

    expect(
      validationDetails(() =>
        validateSessionRequest({ agency: "ea", database: "cases", dateFrom: "2024-03-02", dateTo: "2024-03-01" })
      )
    ).toEqual(['"dateFrom" must not be after "dateTo"']);
  });

  it("rejects an end page before the start page", () => {
    expect(
      validationDetails(() =>
        validateSessionRequest({ agency: "hse", database: "appeals", startPage: 4, endPage: 3 })
      )
    ).toEqual(['"endPage" must not be before "startPage"']);
  });

  it("rejects action types the register does not hold", () => {
    expect(
      validationDetails(() =>
        validateSessionRequest({
          agency: "ea",
          database: "notices",
          dateFrom: "2024-01-01",
          dateTo: "2024-01-31",
          actionTypes: ["court_case"],
        })
      )
    ).toEqual(['"court_case" is not listed in the notices register']);
  });

  it("throws with a readable message", () => {
    expect(() => validateSessionRequest({ agency: "fsa", database: "x" })).toThrow(
      /^Session request validation failed: "agency" must be one of \[hse, ea\]/
    );
  });
});

describe("validateReviewAction", () => {
  it("accepts an approval body", () => {
    expect(validateReviewAction({ candidateIndex: 1, reviewedBy: " analyst ", notes: "" })).toEqual({
      candidateIndex: 1,
      reviewedBy: "analyst",
      notes: "",
    });
  });

  it("requires a reviewer", () => {
    expect(validationDetails(() => validateReviewAction({ candidateIndex: 0 }))).toEqual([
      '"reviewedBy" is required',
    ]);
  });
});
