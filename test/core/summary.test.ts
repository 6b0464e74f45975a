import { describe, expect, it } from "vitest";
import { summarize } from "../../src/core/summary.js";
import type { ClassifiedRecord } from "../../src/core/types.js";
import { makeRecord } from "../helpers.js";

function item(id: string, overrides: Partial<ClassifiedRecord>): ClassifiedRecord {
	return {
		record: makeRecord(id),
		status: "new",
		changeDetails: [],
		admitted: false,
		skipReason: null,
		...overrides,
	};
}

describe("summarize", () => {
	it("counts statuses, limits and fetch outcomes", () => {
		const records = [
			item("a", { admitted: true, fetchOutcome: "fetched" }),
			item("b", { skipReason: "new-record-limit-exceeded" }),
			item("c", { status: "updated", admitted: true, fetchOutcome: "skipped-too-large", skipReason: "artifact-exceeds-size-limit" }),
			item("d", { status: "updated", admitted: true, fetchOutcome: "fetch-error", skipReason: "artifact-probe-failed" }),
			item("e", { status: "unchanged", record: makeRecord("e", { category: "Generated" }) }),
		];

		expect(summarize(records)).toEqual({
			total: 5,
			inboundCount: 4,
			generatedCount: 1,
			newCount: 2,
			updatedCount: 2,
			unchangedCount: 1,
			limitedCount: 1,
			fetchedCount: 1,
			skippedTooLargeCount: 1,
			fetchErrorCount: 1,
		});
	});

	it("is all zeros for an empty run", () => {
		expect(summarize([]).total).toBe(0);
		expect(summarize([]).newCount).toBe(0);
	});
});
