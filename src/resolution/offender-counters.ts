/**
 * Offender Counters
 *
 * Case/notice counts and fine totals are recomputed from the record store
 * whenever an offender gains or loses records.
 */
import type { OffenderStore, RecordStore } from "../persistence/stores";

export async function refreshOffenderCounters(
  stores: { records: RecordStore; offenders: OffenderStore },
  offenderId: string
): Promise<void> {
  const totals = await stores.records.offenderTotals(offenderId);
  await stores.offenders.updateCounters(offenderId, totals);
}
