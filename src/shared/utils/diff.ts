/**
 * Field-level Record Diff
 *
 * Re-scraping a record compares the incoming fields with the stored ones.
 * Only fields whose incoming value is non-null and different are reported,
 * so a detail page that lost a field never erases stored data.
 */
import type { FieldChange, RecordFields } from "../types/record.types";

/** Persisted record fields compared on every re-scrape */
export const RECORD_FIELD_NAMES = [
  "actionType",
  "actionDate",
  "regulatorFunction",
  "regulatorUrl",
  "description",
  "breaches",
  "result",
  "fine",
  "costs",
  "hearingDate",
  "relatedCases",
  "complianceDate",
  "revisedComplianceDate",
  "caseReference",
  "eventReference",
  "legalCitation",
  "environmentalImpact",
  "environmentalReceptor",
  "waterImpact",
  "landImpact",
  "airImpact",
] as const satisfies readonly (keyof RecordFields)[];

export function diffRecordFields(
  existing: RecordFields,
  incoming: RecordFields
): FieldChange[] {
  const changes: FieldChange[] = [];

  for (const field of RECORD_FIELD_NAMES) {
    const newValue = incoming[field];
    const oldValue = existing[field];
    if (newValue === null) continue;
    if (newValue !== oldValue) {
      changes.push({ field, oldValue, newValue });
    }
  }

  return changes;
}

/** Pick only the record fields out of a wider object */
export function pickRecordFields(source: RecordFields): RecordFields {
  return {
    actionType: source.actionType,
    actionDate: source.actionDate,
    regulatorFunction: source.regulatorFunction,
    regulatorUrl: source.regulatorUrl,
    description: source.description,
    breaches: source.breaches,
    result: source.result,
    fine: source.fine,
    costs: source.costs,
    hearingDate: source.hearingDate,
    relatedCases: source.relatedCases,
    complianceDate: source.complianceDate,
    revisedComplianceDate: source.revisedComplianceDate,
    caseReference: source.caseReference,
    eventReference: source.eventReference,
    legalCitation: source.legalCitation,
    environmentalImpact: source.environmentalImpact,
    environmentalReceptor: source.environmentalReceptor,
    waterImpact: source.waterImpact,
    landImpact: source.landImpact,
    airImpact: source.airImpact,
  };
}

function copyField<K extends keyof RecordFields>(
  target: Partial<RecordFields>,
  source: RecordFields,
  key: K
): void {
  target[key] = source[key];
}

/** Patch holding only the changed fields, with their incoming values */
export function changesToPatch(
  incoming: RecordFields,
  changes: FieldChange[]
): Partial<RecordFields> {
  const patch: Partial<RecordFields> = {};
  for (const change of changes) {
    copyField(patch, incoming, change.field);
  }
  return patch;
}
