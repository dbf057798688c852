/**
 * Companies House Client
 *
 * Looks companies up by name (search endpoint) or by number (profile
 * endpoint). Authentication is HTTP basic with the API key as user name.
 * Any failure surfaces as RegistryUnavailableError; callers decide whether
 * that matters.
 */
import axios, { AxiosInstance } from "axios";
import Joi from "joi";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { RegistryUnavailableError, errorMessage } from "../../shared/errors/scrape.errors";
import type { CompanyCandidate } from "../../shared/types/offender.types";
import { cleanCompanyNumber } from "../../shared/utils/company";
import { retryWithBackoff } from "../../shared/utils/retry";

export interface CompanyRegistry {
  lookupCompany(nameOrNumber: string): Promise<CompanyCandidate[]>;
}

export interface CompaniesHouseOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxResults?: number;
  client?: Pick<AxiosInstance, "get">;
}

interface SearchItem {
  company_number: string;
  title: string;
  company_status?: string;
  company_type?: string;
  address_snippet?: string;
}

interface SearchResponse {
  items: SearchItem[];
}

interface ProfileResponse {
  company_number: string;
  company_name: string;
  company_status?: string;
  type?: string;
  registered_office_address?: {
    address_line_1?: string;
    address_line_2?: string;
    locality?: string;
    postal_code?: string;
  };
}

const searchSchema = Joi.object<SearchResponse>({
  items: Joi.array()
    .items(
      Joi.object({
        company_number: Joi.string().required(),
        title: Joi.string().required(),
        company_status: Joi.string(),
        company_type: Joi.string(),
        address_snippet: Joi.string(),
      }).unknown(true)
    )
    .default([]),
}).unknown(true);

const profileSchema = Joi.object<ProfileResponse>({
  company_number: Joi.string().required(),
  company_name: Joi.string().required(),
  company_status: Joi.string(),
  type: Joi.string(),
  registered_office_address: Joi.object({
    address_line_1: Joi.string(),
    address_line_2: Joi.string(),
    locality: Joi.string(),
    postal_code: Joi.string(),
  }).unknown(true),
}).unknown(true);

/** Company numbers are eight characters with at least six digits */
function looksLikeCompanyNumber(value: string): string | null {
  const cleaned = cleanCompanyNumber(value);
  return cleaned && /\d{6}$/.test(cleaned) ? cleaned : null;
}

export class CompaniesHouseClient implements CompanyRegistry {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxResults: number;
  private readonly client: Pick<AxiosInstance, "get">;

  constructor(options: CompaniesHouseOptions = {}) {
    this.apiKey = options.apiKey ?? config.companiesHouseApiKey;
    this.baseUrl = options.baseUrl ?? config.companiesHouseBaseUrl;
    this.timeoutMs = options.timeoutMs ?? config.companiesHouseTimeoutMs;
    this.maxResults = options.maxResults ?? 10;
    this.client = options.client ?? axios.create();
  }

  async lookupCompany(nameOrNumber: string): Promise<CompanyCandidate[]> {
    if (!this.apiKey) {
      throw new RegistryUnavailableError("Companies House API key not configured");
    }

    const companyNumber = looksLikeCompanyNumber(nameOrNumber);
    return companyNumber ? this.profile(companyNumber) : this.search(nameOrNumber);
  }

  private async search(name: string): Promise<CompanyCandidate[]> {
    const data = await this.get("/search/companies", { q: name, items_per_page: this.maxResults });
    if (data === null) return [];

    const { value, error } = searchSchema.validate(data);
    if (error) {
      throw new RegistryUnavailableError(`Unexpected search response: ${error.message}`);
    }

    return value.items.map((item) => ({
      companyNumber: item.company_number,
      companyName: item.title,
      companyStatus: item.company_status ?? null,
      companyType: item.company_type ?? null,
      address: item.address_snippet ?? null,
    }));
  }

  private async profile(companyNumber: string): Promise<CompanyCandidate[]> {
    const data = await this.get(`/company/${encodeURIComponent(companyNumber)}`, {});
    if (data === null) return [];

    const { value, error } = profileSchema.validate(data);
    if (error) {
      throw new RegistryUnavailableError(`Unexpected profile response: ${error.message}`);
    }

    const office = value.registered_office_address;
    const address = office
      ? [office.address_line_1, office.address_line_2, office.locality, office.postal_code]
          .filter((part): part is string => Boolean(part))
          .join(", ")
      : "";

    return [
      {
        companyNumber: value.company_number,
        companyName: value.company_name,
        companyStatus: value.company_status ?? null,
        companyType: value.type ?? null,
        address: address || null,
      },
    ];
  }

  /** GET a JSON document; null when the registry answers 404 */
  private async get(path: string, params: Record<string, string | number>): Promise<unknown> {
    try {
      const response = await retryWithBackoff(
        () =>
          this.client.get<unknown>(`${this.baseUrl}${path}`, {
            params,
            timeout: this.timeoutMs,
            auth: { username: this.apiKey, password: "" },
            validateStatus: (status) => status < 500,
          }),
        { maxAttempts: 2, initialDelayMs: 1000, label: `Companies House ${path}` }
      );

      if (response.status === 404) return null;
      if (response.status >= 400) {
        throw new RegistryUnavailableError(`Companies House answered HTTP ${response.status}`);
      }
      return response.data;
    } catch (error) {
      if (error instanceof RegistryUnavailableError) throw error;
      logger.warn({ path, error: errorMessage(error) }, "Companies House request failed");
      throw new RegistryUnavailableError(errorMessage(error));
    }
  }
}
