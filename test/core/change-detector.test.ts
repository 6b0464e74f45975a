import { describe, expect, it } from "vitest";
import { classify } from "../../src/core/change-detector.js";
import { HistoryStore } from "../../src/storage/history-store.js";
import { SnapshotError } from "../../src/utils/errors.js";
import { makeHistory, makeIds, makeRecord } from "../helpers.js";

describe("classify", () => {
	it("marks every record new when history is empty", () => {
		const snapshot = makeIds(105).map((id) => makeRecord(id));

		const result = classify(snapshot, HistoryStore.empty());

		expect(result).toHaveLength(105);
		expect(result.every((r) => r.status === "new")).toBe(true);
	});

	it("separates new, updated and unchanged records", () => {
		const existing = makeIds(105).map((id) => makeRecord(id));
		const history = makeHistory(existing);
		const changedIds = new Set(["case-004", "case-010", "case-050", "case-077", "case-104"]);
		const snapshot = [
			...existing.map((r) => (changedIds.has(r.id) ? makeRecord(r.id, { documentCount: 2 }) : r)),
			...makeIds(3, 200).map((id) => makeRecord(id)),
		];

		const result = classify(snapshot, history);
		const count = (status: string) => result.filter((r) => r.status === status).length;

		expect(count("new")).toBe(3);
		expect(count("updated")).toBe(5);
		expect(count("unchanged")).toBe(100);
		expect(result.filter((r) => r.status === "updated").map((r) => r.record.id)).toEqual([...changedIds]);
	});

	it("sorts output by id regardless of snapshot order", () => {
		const snapshot = ["b-2", "a-10", "a-9", "B-1"].map((id) => makeRecord(id));

		const result = classify(snapshot, HistoryStore.empty());

		expect(result.map((r) => r.record.id)).toEqual(["B-1", "a-10", "a-9", "b-2"]);
	});

	it("records which fields changed", () => {
		const before = makeRecord("case-1");
		const after = makeRecord("case-1", { tags: ["pending", "signed"], documentIds: ["doc-1", "doc-2"], documentCount: 2 });

		const [result] = classify([after], makeHistory([before]));

		expect(result.status).toBe("updated");
		expect(result.changeDetails).toEqual(["tags", "documentIds", "documentCount"]);
	});

	it("reports a digest-only difference as a fingerprint change", () => {
		const before = { ...makeRecord("case-1"), fingerprint: "legacy-digest" };

		const [result] = classify([makeRecord("case-1")], makeHistory([before]));

		expect(result.status).toBe("updated");
		expect(result.changeDetails).toEqual(["fingerprint"]);
	});

	it("treats descriptive-only changes as unchanged", () => {
		const before = makeRecord("case-1");
		const after = makeRecord("case-1", { title: "Renamed case" });

		const [result] = classify([after], makeHistory([before]));

		expect(result.status).toBe("unchanged");
		expect(result.changeDetails).toEqual([]);
	});

	it("leaves records missing from the snapshot out of the output", () => {
		const history = makeHistory([makeRecord("case-1"), makeRecord("case-2")]);

		const result = classify([makeRecord("case-2")], history);

		expect(result.map((r) => r.record.id)).toEqual(["case-2"]);
	});

	it("starts every record unadmitted with no skip reason", () => {
		const [result] = classify([makeRecord("case-1")], HistoryStore.empty());

		expect(result.admitted).toBe(false);
		expect(result.skipReason).toBeNull();
		expect(result.fetchOutcome).toBeUndefined();
	});

	it("rejects a snapshot with duplicate ids", () => {
		const snapshot = [makeRecord("case-1"), makeRecord("case-1")];

		expect(() => classify(snapshot, HistoryStore.empty())).toThrow(SnapshotError);
	});

	it("does not mutate its inputs", () => {
		const snapshot = [makeRecord("b"), makeRecord("a")];
		const history = makeHistory([makeRecord("a")]);

		classify(snapshot, history);

		expect(snapshot.map((r) => r.id)).toEqual(["b", "a"]);
		expect(history.ids()).toEqual(["a"]);
	});
});
