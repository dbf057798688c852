import { describe, it, expect, vi } from "vitest";
import { RegistryUnavailableError } from "../../shared/errors/scrape.errors";
import { CompaniesHouseClient } from "../registry/companies-house.client";

const BASE_URL = "https://registry.test";

function clientWith(get: ReturnType<typeof vi.fn>, apiKey: string = "test-key") {
  return new CompaniesHouseClient({ apiKey, baseUrl: BASE_URL, timeoutMs: 1000, client: { get } });
}

describe("CompaniesHouseClient", () => {
  it("searches by name", async () => {
    const get = vi.fn().mockResolvedValue({
      status: 200,
      data: {
        kind: "search#companies",
        items: [
          {
            kind: "searchresults#company",
            company_number: "01234567",
            title: "ACME CONSTRUCTION LIMITED",
            company_status: "active",
            company_type: "ltd",
            address_snippet: "1 Park Row, Leeds, LS1 5AB",
          },
          { company_number: "SC654321", title: "ACME CONSTRUCTION (SCOTLAND) LTD" },
        ],
      },
    });

    const companies = await clientWith(get).lookupCompany("Acme Construction Ltd");

    expect(companies).toEqual([
      {
        companyNumber: "01234567",
        companyName: "ACME CONSTRUCTION LIMITED",
        companyStatus: "active",
        companyType: "ltd",
        address: "1 Park Row, Leeds, LS1 5AB",
      },
      {
        companyNumber: "SC654321",
        companyName: "ACME CONSTRUCTION (SCOTLAND) LTD",
        companyStatus: null,
        companyType: null,
        address: null,
      },
    ]);
    expect(get).toHaveBeenCalledWith(
      `${BASE_URL}/search/companies`,
      expect.objectContaining({
        params: { q: "Acme Construction Ltd", items_per_page: 10 },
        auth: { username: "test-key", password: "" },
      })
    );
  });

  it("fetches the company profile for a company number", async () => {
    const get = vi.fn().mockResolvedValue({
      status: 200,
      data: {
        company_number: "01234567",
        company_name: "ACME CONSTRUCTION LIMITED",
        company_status: "active",
        type: "ltd",
        registered_office_address: { address_line_1: "1 Park Row", locality: "Leeds", postal_code: "LS1 5AB" },
      },
    });

    const companies = await clientWith(get).lookupCompany("1234567");

    expect(get.mock.calls[0][0]).toBe(`${BASE_URL}/company/01234567`);
    expect(companies).toEqual([
      {
        companyNumber: "01234567",
        companyName: "ACME CONSTRUCTION LIMITED",
        companyStatus: "active",
        companyType: "ltd",
        address: "1 Park Row, Leeds, LS1 5AB",
      },
    ]);
  });

  it("returns nothing for an unknown company", async () => {
    const get = vi.fn().mockResolvedValue({ status: 404, data: {} });

    expect(await clientWith(get).lookupCompany("01234567")).toEqual([]);
  });

  it("reports client errors as an unavailable registry", async () => {
    const get = vi.fn().mockResolvedValue({ status: 401, data: {} });

    await expect(clientWith(get).lookupCompany("Acme")).rejects.toThrow("Companies House answered HTTP 401");
    expect(get).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed responses", async () => {
    const get = vi.fn().mockResolvedValue({ status: 200, data: { items: [{ title: "NO NUMBER LTD" }] } });

    await expect(clientWith(get).lookupCompany("No Number Ltd")).rejects.toBeInstanceOf(RegistryUnavailableError);
  });

  it("refuses to call out without an API key", async () => {
    const get = vi.fn();

    await expect(clientWith(get, "").lookupCompany("Acme")).rejects.toThrow(
      "Companies House API key not configured"
    );
    expect(get).not.toHaveBeenCalled();
  });
});
