/**
 * Enforcement Record Repository
 *
 * Sequelize implementation of RecordStore over ENFORCEMENT_RECORD.
 * Re-scrapes compare field by field and only write what changed.
 */
import { UniqueConstraintError } from "sequelize";
import { EnforcementRecordModel } from "../db/models";
import { logger } from "../../monitoring/logger";
import type { OffenderCounters } from "../../shared/types/offender.types";
import type {
  AgencyCode,
  CanonicalRecord,
  ResourceType,
  UpsertOutcome,
} from "../../shared/types/record.types";
import { changesToPatch, diffRecordFields } from "../../shared/utils/diff";
import type { RecordStore, RecordUpsert } from "../stores";

function toRecord(model: EnforcementRecordModel): CanonicalRecord {
  return model.get({ plain: true });
}

export async function findRecord(
  agencyCode: AgencyCode,
  sourceId: string
): Promise<CanonicalRecord | null> {
  const model = await EnforcementRecordModel.findOne({ where: { agencyCode, sourceId } });
  return model ? toRecord(model) : null;
}

/**
 * Insert the record, or update the fields that changed since the last
 * scrape. The unique (agency_code, source_id) index settles races between
 * sessions: the loser re-reads and takes the update path.
 */
export async function upsertCanonicalRecord(input: RecordUpsert): Promise<UpsertOutcome> {
  const existing = await EnforcementRecordModel.findOne({
    where: { agencyCode: input.agencyCode, sourceId: input.sourceId },
  });

  if (!existing) {
    try {
      const created = await EnforcementRecordModel.create({ ...input });
      return { status: "created", record: toRecord(created), changes: [] };
    } catch (error) {
      if (!(error instanceof UniqueConstraintError)) throw error;
      logger.debug(
        { agencyCode: input.agencyCode, sourceId: input.sourceId },
        "Record inserted concurrently, retrying as update"
      );
      return upsertCanonicalRecord(input);
    }
  }

  const current = toRecord(existing);
  const changes = diffRecordFields(current, input);
  if (changes.length === 0) {
    return { status: "unchanged", record: current, changes };
  }

  await existing.update(changesToPatch(input, changes));
  return { status: "updated", record: toRecord(existing), changes };
}

export async function listRecords(resourceType: ResourceType): Promise<CanonicalRecord[]> {
  const models = await EnforcementRecordModel.findAll({
    where: { resourceType },
    order: [["actionDate", "ASC"]],
  });
  return models.map(toRecord);
}

export async function relinkOffender(fromOffenderId: string, toOffenderId: string): Promise<number> {
  const [moved] = await EnforcementRecordModel.update(
    { offenderId: toOffenderId },
    { where: { offenderId: fromOffenderId } }
  );
  return moved;
}

export async function offenderTotals(offenderId: string): Promise<OffenderCounters> {
  const [totalCases, totalNotices, totalFines] = await Promise.all([
    EnforcementRecordModel.count({ where: { offenderId, resourceType: "case" } }),
    EnforcementRecordModel.count({ where: { offenderId, resourceType: "notice" } }),
    EnforcementRecordModel.sum("fine", { where: { offenderId } }),
  ]);
  return { totalCases, totalNotices, totalFines: Number(totalFines) || 0 };
}

export const recordRepository: RecordStore = {
  findRecord,
  upsertCanonicalRecord,
  listRecords,
  relinkOffender,
  offenderTotals,
};
