import { createHash } from "node:crypto";
import { MUTABLE_FIELDS, type CaseRecord, type MutableField, type MutableFields } from "./types.js";

/** Trim, drop blanks, de-duplicate and sort; order and empty markers never count as change. */
export function normalizeSet(values: readonly string[]): string[] {
	const set = new Set<string>();
	for (const value of values) {
		const trimmed = value.trim();
		if (trimmed) set.add(trimmed);
	}
	return [...set].sort(compareIds);
}

/** Code-unit order, independent of locale. */
export function compareIds(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

function normalizeFields(fields: MutableFields): MutableFields {
	return {
		tags: normalizeSet(fields.tags),
		documentIds: normalizeSet(fields.documentIds),
		signers: normalizeSet(fields.signers),
		documentCount: fields.documentCount,
		lastMovementTimestamp: fields.lastMovementTimestamp,
	};
}

export function computeFingerprint(fields: MutableFields): string {
	const normalized = normalizeFields(fields);
	// Key order is fixed by MUTABLE_FIELDS so the digest is stable
	const canonical = JSON.stringify(MUTABLE_FIELDS.map((field) => [field, normalized[field]]));
	return createHash("sha256").update(canonical, "utf-8").digest("hex");
}

export function withFingerprint(record: Omit<CaseRecord, "fingerprint">): CaseRecord {
	return { ...record, fingerprint: computeFingerprint(record) };
}

/** Mutable fields whose normalized values differ between two observations. */
export function diffFields(previous: MutableFields, current: MutableFields): MutableField[] {
	const a = normalizeFields(previous);
	const b = normalizeFields(current);
	return MUTABLE_FIELDS.filter((field) => JSON.stringify(a[field]) !== JSON.stringify(b[field]));
}
