import { describe, it, expect } from "vitest";
import { ValidationFailedError } from "../../shared/errors/scrape.errors";
import { buildSessionPlan, isEaDatabase, isHseDatabase } from "../session-plan";

describe("buildSessionPlan", () => {
  it("fills HSE defaults from config", () => {
    expect(buildSessionPlan({ agency: "hse", database: "convictions" })).toEqual({
      target: { agency: "hse", database: "convictions" },
      range: { kind: "pages", startPage: 1, maxPages: 100, country: undefined },
      limits: {
        maxPages: 100,
        stopOnExisting: true,
        consecutiveExistingThreshold: 10,
        maxConsecutiveErrors: 3,
        requestDelayMs: 3000,
      },
    });
  });

  it("turns an end page into a page count", () => {
    const plan = buildSessionPlan({ agency: "hse", database: "appeals", startPage: 3, endPage: 7 });

    expect(plan.range).toEqual({ kind: "pages", startPage: 3, maxPages: 5, country: undefined });
    expect(plan.limits.maxPages).toBe(5);
  });

  it("caps the page count", () => {
    expect(buildSessionPlan({ agency: "hse", database: "convictions", maxPages: 500 }).limits.maxPages).toBe(100);
  });

  it("filters HSE notices by country", () => {
    expect(buildSessionPlan({ agency: "hse", database: "notices" }).range).toMatchObject({ country: "England" });
    expect(buildSessionPlan({ agency: "hse", database: "notices", country: "Scotland" }).range).toMatchObject({
      country: "Scotland",
    });
  });

  it("keeps caller limits", () => {
    const plan = buildSessionPlan({
      agency: "hse",
      database: "convictions",
      stopOnExisting: false,
      consecutiveExistingThreshold: 0,
      maxConsecutiveErrors: 5,
      requestDelayMs: 0,
    });

    expect(plan.limits).toEqual({
      maxPages: 100,
      stopOnExisting: false,
      consecutiveExistingThreshold: 0,
      maxConsecutiveErrors: 5,
      requestDelayMs: 0,
    });
  });

  it("plans one EA page per action type", () => {
    const plan = buildSessionPlan({ agency: "ea", database: "cases", dateFrom: "2024-01-01", dateTo: "2024-01-31" });

    expect(plan.target).toEqual({ agency: "ea", database: "cases" });
    expect(plan.range).toEqual({
      kind: "dates",
      dateFrom: "2024-01-01",
      dateTo: "2024-01-31",
      actionTypes: ["court_case", "caution"],
    });
    expect(plan.limits.maxPages).toBe(2);
  });

  it("requires dates for EA", () => {
    expect(() => buildSessionPlan({ agency: "ea", database: "notices" })).toThrow(ValidationFailedError);
  });

  it("rejects databases the agency does not have", () => {
    expect(() => buildSessionPlan({ agency: "hse", database: "cases" })).toThrow('Unknown HSE database "cases"');
  });
});

describe("database guards", () => {
  it("know each agency's databases", () => {
    expect(isHseDatabase("notices")).toBe(true);
    expect(isHseDatabase("cases")).toBe(false);
    expect(isEaDatabase("cases")).toBe(true);
    expect(isEaDatabase("appeals")).toBe(false);
  });
});
