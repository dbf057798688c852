/**
 * Duplicate Detector
 *
 * On-demand scan for records an operator may want to merge or delete.
 * Offenders group on a shared company number, then on an identical
 * normalized name; overlapping groups keep the larger one.
 * Cases and notices group within the same agency and offender when their
 * dates are close and their descriptions (or breaches) read alike.
 * Only groups are returned; nothing is changed.
 */
import config from "../config";
import type { OffenderStore, RecordStore } from "../persistence/stores";
import type { Offender } from "../shared/types/offender.types";
import type { CanonicalRecord, RecordRef, ResourceType } from "../shared/types/record.types";
import { cleanCompanyNumber } from "../shared/utils/company";
import { daysBetween } from "../shared/utils/date";
import { SimilarityScorer, trigramSimilarity } from "../shared/utils/similarity";

export type DuplicateResource = ResourceType | "offender";

export interface DuplicateDetectorOptions {
  dateWindowDays: number;
  descriptionThreshold: number;
  scorer: SimilarityScorer;
}

const DEFAULT_OPTIONS: DuplicateDetectorOptions = {
  dateWindowDays: config.duplicateDateWindowDays,
  descriptionThreshold: config.duplicateDescriptionThreshold,
  scorer: trigramSimilarity,
};

/** Disjoint-set over array indexes */
class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    while (this.parent[i] !== i) {
      this.parent[i] = this.parent[this.parent[i]];
      i = this.parent[i];
    }
    return i;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA !== rootB) this.parent[Math.max(rootA, rootB)] = Math.min(rootA, rootB);
  }
}

function groupBy<T>(items: T[], key: (item: T) => string | null): T[][] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    if (k === null) continue;
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return [...groups.values()];
}

/** HSE cases carry their wording in the breach list rather than a description */
function describe(record: CanonicalRecord): string | null {
  return record.description ?? record.breaches;
}

/** Keep the largest groups first; drop any group sharing an id with a kept one */
function removeOverlapping(groups: RecordRef[][]): RecordRef[][] {
  const claimed = new Set<string>();
  const kept: RecordRef[][] = [];
  const bySize = [...groups].sort((a, b) => b.length - a.length);
  for (const group of bySize) {
    if (group.some((ref) => claimed.has(ref.id))) continue;
    group.forEach((ref) => claimed.add(ref.id));
    kept.push(group);
  }
  return kept;
}

export class DuplicateDetector {
  private readonly deps: { records: RecordStore; offenders: OffenderStore };
  private readonly options: DuplicateDetectorOptions;

  constructor(
    deps: { records: RecordStore; offenders: OffenderStore },
    options: Partial<DuplicateDetectorOptions> = {}
  ) {
    this.deps = deps;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async findDuplicates(resourceType: DuplicateResource): Promise<RecordRef[][]> {
    if (resourceType === "offender") {
      const offenders = await this.deps.offenders.listOffenders();
      return this.offenderGroups(offenders.filter((offender) => offender.mergedIntoId === null));
    }
    return this.recordGroups(await this.deps.records.listRecords(resourceType), resourceType);
  }

  private offenderGroups(offenders: Offender[]): RecordRef[][] {
    const toRef = (offender: Offender): RecordRef => ({
      id: offender.id,
      resourceType: "offender",
      label: offender.name,
    });

    const byNumber = groupBy(offenders, (o) => cleanCompanyNumber(o.registrationNumber));
    const byName = groupBy(offenders, (o) => o.normalizedName || null);

    return removeOverlapping(
      [...byNumber, ...byName].filter((group) => group.length >= 2).map((group) => group.map(toRef))
    );
  }

  private recordGroups(records: CanonicalRecord[], resourceType: ResourceType): RecordRef[][] {
    const groups: RecordRef[][] = [];
    const buckets = groupBy(records, (record) => `${record.agencyCode}|${record.offenderId}`);

    for (const bucket of buckets) {
      if (bucket.length < 2) continue;
      const sets = new UnionFind(bucket.length);

      for (let i = 0; i < bucket.length; i++) {
        for (let j = i + 1; j < bucket.length; j++) {
          if (this.isNearDuplicate(bucket[i], bucket[j])) sets.union(i, j);
        }
      }

      const components = new Map<number, RecordRef[]>();
      bucket.forEach((record, index) => {
        const root = sets.find(index);
        const ref: RecordRef = {
          id: record.id,
          resourceType,
          label: `${record.agencyCode}:${record.sourceId}`,
        };
        const component = components.get(root);
        if (component) component.push(ref);
        else components.set(root, [ref]);
      });

      for (const component of components.values()) {
        if (component.length >= 2) groups.push(component);
      }
    }

    return groups;
  }

  private isNearDuplicate(a: CanonicalRecord, b: CanonicalRecord): boolean {
    const textA = describe(a);
    const textB = describe(b);
    if (!a.actionDate || !b.actionDate || !textA || !textB) return false;
    if (daysBetween(a.actionDate, b.actionDate) > this.options.dateWindowDays) return false;
    return this.options.scorer(textA, textB) >= this.options.descriptionThreshold;
  }
}
