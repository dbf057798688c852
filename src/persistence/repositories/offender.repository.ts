/**
 * Offender Repository
 *
 * Sequelize implementation of OffenderStore over OFFENDER.
 * Offenders are unique on their identity key (normalized name + postcode).
 */
import { Op, literal } from "sequelize";
import { OffenderModel } from "../db/models";
import { ResolveError } from "../../shared/errors/scrape.errors";
import type { Offender, OffenderCounters } from "../../shared/types/offender.types";
import type { OffenderAttrs } from "../../shared/types/record.types";
import { normalizeCompanyName, offenderIdentityKey } from "../../shared/utils/company";
import type { NameCandidateQuery, OffenderStore } from "../stores";

function toOffender(model: OffenderModel): Offender {
  const { identityKey: _identityKey, ...offender } = model.get({ plain: true });
  return offender;
}

/** Escape LIKE wildcards in a user-derived token */
function likeContains(token: string): string {
  return `%${token.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export async function findOffender(id: string): Promise<Offender | null> {
  const model = await OffenderModel.findByPk(id);
  return model ? toOffender(model) : null;
}

export async function findByRegistrationNumber(registrationNumber: string): Promise<Offender | null> {
  const model = await OffenderModel.findOne({
    where: { registrationNumber },
    order: [["createdAt", "ASC"]],
  });
  return model ? toOffender(model) : null;
}

export async function findByNormalizedName(normalizedName: string): Promise<Offender | null> {
  const model = await OffenderModel.findOne({
    where: { normalizedName },
    order: [["createdAt", "ASC"]],
  });
  return model ? toOffender(model) : null;
}

/**
 * Prefilter for fuzzy matching: unmerged offenders whose normalized name
 * contains any of the tokens, nearest name length first, then oldest.
 * Scoring happens in the resolver.
 */
export async function findNameCandidates({
  tokens,
  nameLength,
  limit,
}: NameCandidateQuery): Promise<Offender[]> {
  if (tokens.length === 0) return [];
  const length = Math.max(0, Math.trunc(nameLength));
  const models = await OffenderModel.findAll({
    where: {
      mergedIntoId: null,
      [Op.or]: tokens.map((token) => ({ normalizedName: { [Op.like]: likeContains(token) } })),
    },
    order: [
      [literal(`ABS(CHAR_LENGTH(normalized_name) - ${length})`), "ASC"],
      ["createdAt", "ASC"],
    ],
    limit,
  });
  return models.map(toOffender);
}

export async function findOrCreateOffender(
  attrs: OffenderAttrs
): Promise<{ offender: Offender; created: boolean }> {
  const identityKey = offenderIdentityKey(attrs.name, attrs.postcode);
  const [model, created] = await OffenderModel.findOrCreate({
    where: { identityKey },
    defaults: {
      ...attrs,
      normalizedName: normalizeCompanyName(attrs.name),
      identityKey,
    },
  });
  return { offender: toOffender(model), created };
}

export async function updateOffender(id: string, patch: Partial<OffenderAttrs>): Promise<Offender> {
  const model = await OffenderModel.findByPk(id);
  if (!model) {
    throw new ResolveError(`Offender ${id} not found`);
  }
  await model.update(patch);
  return toOffender(model);
}

export async function updateCounters(id: string, counters: OffenderCounters): Promise<void> {
  await OffenderModel.update(counters, { where: { id } });
}

export async function markMerged(id: string, intoId: string): Promise<void> {
  await OffenderModel.update({ mergedIntoId: intoId }, { where: { id } });
}

export async function listOffenders(): Promise<Offender[]> {
  const models = await OffenderModel.findAll({ order: [["createdAt", "ASC"]] });
  return models.map(toOffender);
}

export const offenderRepository: OffenderStore = {
  findOffender,
  findByRegistrationNumber,
  findByNormalizedName,
  findNameCandidates,
  findOrCreateOffender,
  updateOffender,
  updateCounters,
  markMerged,
  listOffenders,
};
