export const CASE_CATEGORIES = ["Inbound", "Generated"] as const;
export type CaseCategory = (typeof CASE_CATEGORIES)[number];

/** Fields that make up a record's fingerprint. */
export const MUTABLE_FIELDS = [
	"tags",
	"documentIds",
	"signers",
	"documentCount",
	"lastMovementTimestamp",
] as const;
export type MutableField = (typeof MUTABLE_FIELDS)[number];

export interface MutableFields {
	tags: string[];
	documentIds: string[];
	signers: string[];
	documentCount: number;
	lastMovementTimestamp: string | null;
}

/** One tracked case as observed in the registry. */
export interface CaseRecord extends MutableFields {
	id: string;
	/** Human-facing case number, e.g. "0001234-56.2025" */
	number: string;
	category: CaseCategory;
	title: string;
	url?: string;
	fingerprint: string;
}

export interface HistoryEntry {
	record: CaseRecord;
	firstSeenAt: string;
	lastSeenAt: string;
	lastUpdatedAt: string;
}

export type RecordStatus = "new" | "updated" | "unchanged";

export type FetchOutcome = "fetched" | "skipped-too-large" | "fetch-error";

/** `fingerprint` appears when the digests differ but no tracked field does. */
export type ChangedField = MutableField | "fingerprint";

export const SKIP_REASONS = {
	newRecordLimit: "new-record-limit-exceeded",
	artifactTooLarge: "artifact-exceeds-size-limit",
	probeFailed: "artifact-probe-failed",
	fetchFailed: "artifact-fetch-failed",
} as const;
export type SkipReason = (typeof SKIP_REASONS)[keyof typeof SKIP_REASONS];

export interface ClassifiedRecord {
	record: CaseRecord;
	status: RecordStatus;
	changeDetails: ChangedField[];
	admitted: boolean;
	skipReason: SkipReason | null;
	fetchOutcome?: FetchOutcome;
	probedSizeBytes?: number;
	artifactLocation?: string;
	fetchError?: string;
}

export type RunMode = "baseline" | "incremental";

export interface LimitPolicy {
	readonly maxNewPerRun: number;
	readonly maxArtifactSizeBytes: number;
}

export interface RunSummary {
	total: number;
	inboundCount: number;
	generatedCount: number;
	newCount: number;
	updatedCount: number;
	unchangedCount: number;
	limitedCount: number;
	fetchedCount: number;
	skippedTooLargeCount: number;
	fetchErrorCount: number;
}

export type RunPhase =
	| "start"
	| "loaded"
	| "classified"
	| "limit-applied"
	| "planned"
	| "reconciled"
	| "persisted"
	| "aborted";

export function createLimitPolicy(maxNewPerRun: number, maxArtifactSizeBytes: number): LimitPolicy {
	return Object.freeze({ maxNewPerRun, maxArtifactSizeBytes });
}
