/**
 * Agency Repository
 *
 * Seeds the AGENCY table with the agencies this service scrapes.
 */
import { AgencyModel } from "../db/models";
import { AGENCIES } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import type { AgencyCode } from "../../shared/types/record.types";

const AGENCY_CODES: AgencyCode[] = ["hse", "ea"];

/** Insert any agency rows that are missing */
export async function ensureAgencies(): Promise<void> {
  for (const code of AGENCY_CODES) {
    const [, created] = await AgencyModel.findOrCreate({
      where: { code },
      defaults: { code, name: AGENCIES[code].name, baseUrl: AGENCIES[code].baseUrl },
    });
    if (created) {
      logger.info({ agency: code }, "Agency registered");
    }
  }
}
