import type { ClassifiedRecord, RunMode, RunSummary } from "../core/types.js";
import type { RunResult } from "../etl/case-run.js";

/** Not-analysed entries listed before the rest is collapsed into a count */
const MAX_LISTED_SKIPS = 10;

export interface RunReport {
	unit: string;
	mode: RunMode;
	generatedAt: string;
	summary: RunSummary;
	records: ClassifiedRecord[];
}

export function buildReport(result: RunResult, unit: string): RunReport {
	return {
		unit,
		mode: result.mode,
		generatedAt: result.finishedAt,
		summary: result.summary,
		records: result.records,
	};
}

export function reportSubject(report: RunReport): string {
	const date = report.generatedAt.slice(0, 10);
	return report.mode === "baseline"
		? `[casewatch] Initial registration complete - ${report.unit}`
		: `[casewatch] Daily report - ${report.unit} - ${date}`;
}

/** Plain-text report body for chat and mail notifiers. */
export function formatReportText(report: RunReport): string {
	return report.mode === "baseline" ? formatBaseline(report) : formatIncremental(report);
}

function formatBaseline(report: RunReport): string {
	const { summary } = report;
	return [
		reportSubject(report),
		"",
		`Initial history for unit ${report.unit} has been recorded.`,
		"",
		`Records registered: ${summary.total}`,
		`- Inbound: ${summary.inboundCount}`,
		`- Generated: ${summary.generatedCount}`,
		`Artifacts fetched: ${summary.fetchedCount}`,
		"",
		"From the next run on, reports list only new and updated records.",
	].join("\n");
}

function formatIncremental(report: RunReport): string {
	const admittedNew = report.records.filter((r) => r.status === "new" && r.admitted);
	const updated = report.records.filter((r) => r.status === "updated");
	const skipped = report.records.filter((r) => r.skipReason !== null);

	const lines = [reportSubject(report), ""];

	lines.push(`1. New records (${report.summary.newCount}, ${admittedNew.length} analysed):`);
	if (admittedNew.length === 0) {
		lines.push("   (none)");
	}
	for (const item of admittedNew) {
		const tags = item.record.tags.length > 0 ? item.record.tags.join(", ") : "(none)";
		lines.push(
			`   - ${item.record.number} | ${item.record.category} | Title: ${item.record.title || "(untitled)"} | Tags: ${tags}${artifactNote(item)}`,
		);
	}
	lines.push("");

	lines.push(`2. Updated records (${updated.length}):`);
	if (updated.length === 0) {
		lines.push("   (none)");
	}
	for (const item of updated) {
		lines.push(`   - ${item.record.number} | Changed: ${item.changeDetails.join(", ")}${artifactNote(item)}`);
	}

	if (skipped.length > 0) {
		lines.push("");
		lines.push(`3. Not analysed (limit/size/error) (${skipped.length}):`);
		for (const item of skipped.slice(0, MAX_LISTED_SKIPS)) {
			lines.push(`   - ${item.record.number} | Reason: ${item.skipReason}`);
		}
		if (skipped.length > MAX_LISTED_SKIPS) {
			lines.push(`   ... and ${skipped.length - MAX_LISTED_SKIPS} more`);
		}
	}

	return lines.join("\n");
}

function artifactNote(item: ClassifiedRecord): string {
	return item.fetchOutcome === "fetched" && item.artifactLocation ? ` | Artifact: ${item.artifactLocation}` : "";
}
