import { SnapshotError } from "../utils/errors.js";
import type { HistoryStore } from "../storage/history-store.js";
import { compareIds, diffFields } from "./fingerprint.js";
import type { CaseRecord, ChangedField, ClassifiedRecord } from "./types.js";

/**
 * Classify every record of the current snapshot against history.
 *
 * Records only present in history are not reported: the registry is
 * append-mostly and a missing record is not treated as a deletion.
 * The result is sorted by id; admission under the new-record limit
 * depends on that order.
 */
export function classify(snapshot: readonly CaseRecord[], history: HistoryStore): ClassifiedRecord[] {
	const seen = new Set<string>();
	const classified: ClassifiedRecord[] = [];

	for (const record of snapshot) {
		if (seen.has(record.id)) {
			throw new SnapshotError(`Duplicate record id in snapshot: ${record.id}`);
		}
		seen.add(record.id);

		const previous = history.get(record.id);
		if (!previous) {
			classified.push(unannotated(record, "new", []));
			continue;
		}

		if (previous.record.fingerprint === record.fingerprint) {
			classified.push(unannotated(record, "unchanged", []));
			continue;
		}

		const changed: ChangedField[] = diffFields(previous.record, record);
		classified.push(unannotated(record, "updated", changed.length > 0 ? changed : ["fingerprint"]));
	}

	return classified.sort((a, b) => compareIds(a.record.id, b.record.id));
}

function unannotated(
	record: CaseRecord,
	status: ClassifiedRecord["status"],
	changeDetails: ChangedField[],
): ClassifiedRecord {
	return { record, status, changeDetails, admitted: false, skipReason: null };
}
