import { SKIP_REASONS, type ClassifiedRecord, type RunSummary } from "./types.js";

export function summarize(records: readonly ClassifiedRecord[]): RunSummary {
	const summary: RunSummary = {
		total: records.length,
		inboundCount: 0,
		generatedCount: 0,
		newCount: 0,
		updatedCount: 0,
		unchangedCount: 0,
		limitedCount: 0,
		fetchedCount: 0,
		skippedTooLargeCount: 0,
		fetchErrorCount: 0,
	};

	for (const item of records) {
		if (item.record.category === "Inbound") summary.inboundCount++;
		else summary.generatedCount++;

		if (item.status === "new") summary.newCount++;
		else if (item.status === "updated") summary.updatedCount++;
		else summary.unchangedCount++;

		if (item.skipReason === SKIP_REASONS.newRecordLimit) summary.limitedCount++;

		if (item.fetchOutcome === "fetched") summary.fetchedCount++;
		else if (item.fetchOutcome === "skipped-too-large") summary.skippedTooLargeCount++;
		else if (item.fetchOutcome === "fetch-error") summary.fetchErrorCount++;
	}

	return summary;
}
