/**
 * Record Types
 *
 * Shapes that flow through the pipeline:
 * listing row (SummaryRecord) → detail page (RawDetailRecord variant)
 * → normalized attributes (CanonicalAttrs) → persisted CanonicalRecord.
 */

export type AgencyCode = "hse" | "ea";
export type HseDatabase = "convictions" | "appeals" | "notices";
export type EaDatabase = "cases" | "notices";
export type EaActionType = "court_case" | "caution" | "enforcement_notice";
export type ResourceType = "case" | "notice";

/** Optional columns some listings carry next to the core fields */
export interface ListingExtras {
  localAuthority?: string;
  mainActivity?: string;
  noticeType?: string;
  sicCode?: string;
  country?: string;
}

/** One row of a listing page */
export interface SummaryRecord {
  agencyCode: AgencyCode;
  sourceId: string;
  displayName: string;
  rawAddress: string | null;
  /** Date text exactly as listed; parsed by the normalizer */
  eventDate: string;
  actionType: string;
  detailUrl: string;
  scrapedAt: Date;
  listing: ListingExtras;
}

export interface HseCaseDetail extends SummaryRecord {
  kind: "hse_case";
  database: HseDatabase;
  regulatorFunction: string | null;
  mainActivity: string | null;
  industry: string | null;
  localAuthority: string | null;
  address: string | null;
  postcode: string | null;
  fine: number;
  costs: number;
  result: string | null;
  hearingDate: string | null;
  breaches: string[];
  relatedCases: string[];
}

export interface HseNoticeDetail extends SummaryRecord {
  kind: "hse_notice";
  noticeType: string | null;
  regulatorFunction: string | null;
  mainActivity: string | null;
  industry: string | null;
  localAuthority: string | null;
  sicCode: string | null;
  country: string | null;
  address: string | null;
  postcode: string | null;
  complianceDate: string | null;
  revisedComplianceDate: string | null;
  description: string | null;
  result: string | null;
  breaches: string[];
}

export interface EaDetail extends SummaryRecord {
  kind: "ea";
  eaActionType: EaActionType;
  companyRegistrationNumber: string | null;
  industrySector: string | null;
  address: string | null;
  town: string | null;
  county: string | null;
  postcode: string | null;
  totalFine: number;
  offenceDescription: string | null;
  caseReference: string | null;
  eventReference: string | null;
  agencyFunction: string | null;
  waterImpact: string | null;
  landImpact: string | null;
  airImpact: string | null;
  act: string | null;
  section: string | null;
}

export type RawDetailRecord = HseCaseDetail | HseNoticeDetail | EaDetail;

export type BusinessType =
  | "limited_company"
  | "plc"
  | "llp"
  | "partnership"
  | "sole_trader"
  | "other";

/** Organization attributes handed to the offender resolver */
export interface OffenderAttrs {
  name: string;
  registrationNumber: string | null;
  address: string | null;
  town: string | null;
  county: string | null;
  postcode: string | null;
  localAuthority: string | null;
  country: string | null;
  mainActivity: string | null;
  industry: string | null;
  sicCode: string | null;
  businessType: BusinessType;
}

export type EnvironmentalImpact = "major" | "minor" | "none";
export type EnvironmentalReceptor = "water" | "land" | "air";

export interface ImpactFlags {
  water: boolean;
  land: boolean;
  air: boolean;
}

/** Fields persisted on ENFORCEMENT_RECORD (both cases and notices) */
export interface RecordFields {
  actionType: string;
  actionDate: string | null;
  regulatorFunction: string | null;
  regulatorUrl: string;
  description: string | null;
  breaches: string | null;
  result: string | null;
  fine: number | null;
  costs: number | null;
  hearingDate: string | null;
  relatedCases: string | null;
  complianceDate: string | null;
  revisedComplianceDate: string | null;
  caseReference: string | null;
  eventReference: string | null;
  legalCitation: string | null;
  environmentalImpact: EnvironmentalImpact | null;
  environmentalReceptor: EnvironmentalReceptor | null;
  waterImpact: boolean;
  landImpact: boolean;
  airImpact: boolean;
}

/** Normalizer output: record fields plus the offender to resolve */
export interface CanonicalAttrs extends RecordFields {
  resourceType: ResourceType;
  agencyCode: AgencyCode;
  sourceId: string;
  offender: OffenderAttrs;
}

export interface CanonicalRecord extends RecordFields {
  id: string;
  resourceType: ResourceType;
  agencyCode: AgencyCode;
  sourceId: string;
  offenderId: string;
  createdAt: Date;
  updatedAt: Date;
}

export type UpsertStatus = "created" | "updated" | "unchanged";

export interface FieldChange {
  field: keyof RecordFields;
  oldValue: unknown;
  newValue: unknown;
}

export interface UpsertOutcome {
  status: UpsertStatus;
  record: CanonicalRecord;
  changes: FieldChange[];
}

/** Reference returned by the duplicate detector */
export interface RecordRef {
  id: string;
  resourceType: ResourceType | "offender";
  label: string;
}
