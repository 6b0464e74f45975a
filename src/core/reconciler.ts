import { HistoryStore } from "../storage/history-store.js";
import type { CaseRecord, ClassifiedRecord, HistoryEntry, RecordStatus, RunMode } from "./types.js";

export interface ReconcileResult {
	history: HistoryStore;
	mode: RunMode;
}

/** Baseline exactly when nothing has been recorded yet. */
export function runModeOf(history: HistoryStore): RunMode {
	return history.isEmpty() ? "baseline" : "incremental";
}

/**
 * Merge the current snapshot into a new history store.
 *
 * Every snapshot record is written, including new records held back by
 * the intake limit. Entries for ids missing from the snapshot are carried
 * over unchanged. `history` itself is left as it was.
 */
export function reconcile(
	snapshot: readonly CaseRecord[],
	classified: readonly ClassifiedRecord[],
	history: HistoryStore,
	now: Date,
): ReconcileResult {
	const timestamp = now.toISOString();
	const statusById = new Map<string, RecordStatus>(classified.map((c) => [c.record.id, c.status]));
	const merged = new Map<string, HistoryEntry>(history.entries().map((e) => [e.record.id, e]));

	for (const record of snapshot) {
		const previous = history.get(record.id);
		const status = statusById.get(record.id) ?? (previous ? "updated" : "new");

		if (!previous) {
			merged.set(record.id, {
				record,
				firstSeenAt: timestamp,
				lastSeenAt: timestamp,
				lastUpdatedAt: timestamp,
			});
			continue;
		}

		merged.set(record.id, {
			record,
			firstSeenAt: previous.firstSeenAt,
			lastSeenAt: timestamp,
			lastUpdatedAt: status === "unchanged" ? previous.lastUpdatedAt : timestamp,
		});
	}

	return { history: HistoryStore.fromEntries(merged.values()), mode: runModeOf(history) };
}
