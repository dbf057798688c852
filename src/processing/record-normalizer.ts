/**
 * Record Normalizer
 *
 * Maps each detail-record variant onto the canonical case/notice attributes.
 * Pure: no I/O, no clock, no randomness. Unparsable dates become null and the
 * record is kept.
 */
import { ACTION_TYPE_LABELS, DATE_FORMATS } from "../config/constants";
import type {
  AgencyCode,
  CanonicalAttrs,
  EaDetail,
  HseCaseDetail,
  HseNoticeDetail,
  OffenderAttrs,
  RawDetailRecord,
  RecordFields,
} from "../shared/types/record.types";
import {
  cleanCompanyNumber,
  detectBusinessType,
  extractPostcode,
} from "../shared/utils/company";
import { parseAgencyDate } from "../shared/utils/date";
import { cleanText, toTitleCase } from "../shared/utils/text";
import { assessImpact, impactFlags, primaryReceptor } from "./environmental";

/** "act - section" when both exist, the act alone, otherwise null */
export function legalCitation(act: string | null, section: string | null): string | null {
  const cleanAct = cleanText(act);
  const cleanSection = cleanText(section);
  if (cleanAct && cleanSection) return `${cleanAct} - ${cleanSection}`;
  return cleanAct;
}

function dateFor(agency: AgencyCode, text: string | null): string | null {
  return parseAgencyDate(text, DATE_FORMATS[agency]);
}

function joinOrNull(values: string[], separator: string): string | null {
  const kept = values.map((value) => cleanText(value)).filter((value): value is string => value !== null);
  return kept.length > 0 ? kept.join(separator) : null;
}

/** Record fields shared by every variant before agency specifics */
function baseFields(detail: RawDetailRecord): RecordFields {
  return {
    actionType: detail.actionType,
    actionDate: dateFor(detail.agencyCode, detail.eventDate),
    regulatorFunction: null,
    regulatorUrl: detail.detailUrl,
    description: null,
    breaches: null,
    result: null,
    fine: null,
    costs: null,
    hearingDate: null,
    relatedCases: null,
    complianceDate: null,
    revisedComplianceDate: null,
    caseReference: null,
    eventReference: null,
    legalCitation: null,
    environmentalImpact: null,
    environmentalReceptor: null,
    waterImpact: false,
    landImpact: false,
    airImpact: false,
  };
}

function offenderFrom(
  detail: RawDetailRecord,
  overrides: Partial<OffenderAttrs>
): OffenderAttrs {
  const name = cleanText(detail.displayName) ?? detail.displayName;
  const address = overrides.address ?? cleanText(detail.rawAddress);
  return {
    name,
    registrationNumber: null,
    address,
    town: null,
    county: null,
    postcode: extractPostcode(address),
    localAuthority: cleanText(detail.listing.localAuthority),
    country: cleanText(detail.listing.country),
    mainActivity: cleanText(detail.listing.mainActivity),
    industry: null,
    sicCode: cleanText(detail.listing.sicCode),
    businessType: detectBusinessType(name),
    ...overrides,
  };
}

function normalizeHseCase(detail: HseCaseDetail): CanonicalAttrs {
  return {
    ...baseFields(detail),
    resourceType: "case",
    agencyCode: "hse",
    sourceId: detail.sourceId,
    actionType: ACTION_TYPE_LABELS.court_case,
    regulatorFunction: detail.regulatorFunction ? toTitleCase(detail.regulatorFunction) : null,
    breaches: joinOrNull(detail.breaches, "; "),
    result: cleanText(detail.result),
    fine: detail.fine,
    costs: detail.costs,
    hearingDate: dateFor("hse", detail.hearingDate),
    relatedCases: joinOrNull(detail.relatedCases, ","),
    offender: offenderFrom(detail, {
      address: cleanText(detail.address),
      postcode: cleanText(detail.postcode) ?? extractPostcode(detail.address),
      localAuthority: cleanText(detail.localAuthority ?? detail.listing.localAuthority),
      mainActivity: cleanText(detail.mainActivity ?? detail.listing.mainActivity),
      industry: cleanText(detail.industry),
    }),
  };
}

function normalizeHseNotice(detail: HseNoticeDetail): CanonicalAttrs {
  return {
    ...baseFields(detail),
    resourceType: "notice",
    agencyCode: "hse",
    sourceId: detail.sourceId,
    actionType: cleanText(detail.noticeType) ?? ACTION_TYPE_LABELS.enforcement_notice,
    regulatorFunction: detail.regulatorFunction ? toTitleCase(detail.regulatorFunction) : null,
    description: cleanText(detail.description),
    breaches: joinOrNull(detail.breaches, "; "),
    result: cleanText(detail.result),
    complianceDate: dateFor("hse", detail.complianceDate),
    revisedComplianceDate: dateFor("hse", detail.revisedComplianceDate),
    offender: offenderFrom(detail, {
      address: cleanText(detail.address),
      postcode: cleanText(detail.postcode) ?? extractPostcode(detail.address),
      localAuthority: cleanText(detail.localAuthority),
      mainActivity: cleanText(detail.mainActivity),
      industry: cleanText(detail.industry),
      sicCode: cleanText(detail.sicCode),
      country: cleanText(detail.country),
    }),
  };
}

function normalizeEa(detail: EaDetail): CanonicalAttrs {
  const impacts = { water: detail.waterImpact, land: detail.landImpact, air: detail.airImpact };
  const flags = impactFlags(impacts);
  const isNotice = detail.eaActionType === "enforcement_notice";
  const address = cleanText(detail.address) ?? cleanText(detail.rawAddress);

  return {
    ...baseFields(detail),
    resourceType: isNotice ? "notice" : "case",
    agencyCode: "ea",
    sourceId: detail.sourceId,
    actionType: ACTION_TYPE_LABELS[detail.eaActionType],
    regulatorFunction: cleanText(detail.agencyFunction),
    description: cleanText(detail.offenceDescription),
    fine: isNotice ? null : detail.totalFine,
    caseReference: cleanText(detail.caseReference),
    eventReference: cleanText(detail.eventReference),
    legalCitation: legalCitation(detail.act, detail.section),
    environmentalImpact: assessImpact(impacts),
    environmentalReceptor: primaryReceptor(impacts),
    waterImpact: flags.water,
    landImpact: flags.land,
    airImpact: flags.air,
    offender: offenderFrom(detail, {
      registrationNumber: cleanCompanyNumber(detail.companyRegistrationNumber),
      address,
      town: cleanText(detail.town),
      county: cleanText(detail.county),
      postcode: cleanText(detail.postcode)?.toUpperCase() ?? extractPostcode(address),
      industry: cleanText(detail.industrySector),
    }),
  };
}

/** Dispatch on the detail variant */
export function normalizeRecord(detail: RawDetailRecord): CanonicalAttrs {
  switch (detail.kind) {
    case "hse_case":
      return normalizeHseCase(detail);
    case "hse_notice":
      return normalizeHseNotice(detail);
    case "ea":
      return normalizeEa(detail);
  }
}
