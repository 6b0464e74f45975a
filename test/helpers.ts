import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CollectContext, SnapshotCollector } from "../src/collector/types.js";
import { withFingerprint } from "../src/core/fingerprint.js";
import type { CaseRecord, HistoryEntry, RunMode } from "../src/core/types.js";
import type { ArtifactFetcher } from "../src/fetch/types.js";
import { HistoryStore } from "../src/storage/history-store.js";
import { ArtifactTooLargeError } from "../src/utils/errors.js";

export function makeRecord(id: string, overrides: Partial<Omit<CaseRecord, "fingerprint">> = {}): CaseRecord {
	return withFingerprint({
		id,
		number: `N-${id}`,
		category: "Inbound",
		title: `Case ${id}`,
		tags: ["pending"],
		documentIds: ["doc-1"],
		signers: [],
		documentCount: 1,
		lastMovementTimestamp: "2026-01-10T09:00:00.000Z",
		...overrides,
	});
}

/** Ids "case-000" .. "case-(n-1)", zero-padded so string order matches numeric order. */
export function makeIds(count: number, start = 0): string[] {
	return Array.from({ length: count }, (_, i) => `case-${String(start + i).padStart(3, "0")}`);
}

export const SEEN_AT = "2026-01-01T08:00:00.000Z";

export function makeEntry(record: CaseRecord, at: string = SEEN_AT): HistoryEntry {
	return { record, firstSeenAt: at, lastSeenAt: at, lastUpdatedAt: at };
}

export function makeHistory(records: CaseRecord[], at: string = SEEN_AT): HistoryStore {
	return HistoryStore.fromEntries(records.map((r) => makeEntry(r, at)));
}

export class FakeCollector implements SnapshotCollector {
	readonly contexts: CollectContext[] = [];

	constructor(public snapshot: CaseRecord[]) {}

	async collect(context: CollectContext): Promise<CaseRecord[]> {
		this.contexts.push(context);
		return this.snapshot;
	}

	get lastMode(): RunMode | undefined {
		return this.contexts[this.contexts.length - 1]?.mode;
	}
}

export interface FakeFetcherOptions {
	sizes?: Record<string, number>;
	defaultSize?: number;
	probeFailures?: Set<string>;
	materializeFailures?: Set<string>;
	/** Per-id delay before materialize resolves */
	delays?: Record<string, number>;
	/** Per-id size of the transferred body, when it differs from the probe */
	bodySizes?: Record<string, number>;
}

export class FakeFetcher implements ArtifactFetcher {
	readonly probed: string[] = [];
	readonly materialized: string[] = [];
	readonly limits: Array<number | undefined> = [];

	constructor(private readonly options: FakeFetcherOptions = {}) {}

	async probeSize(id: string): Promise<number> {
		this.probed.push(id);
		if (this.options.probeFailures?.has(id)) {
			throw new Error("registry returned 503");
		}
		return this.options.sizes?.[id] ?? this.options.defaultSize ?? 1_000;
	}

	async materialize(id: string, maxBytes?: number): Promise<string> {
		this.materialized.push(id);
		this.limits.push(maxBytes);
		const delay = this.options.delays?.[id];
		if (delay) {
			await new Promise((resolve) => setTimeout(resolve, delay));
		}
		if (this.options.materializeFailures?.has(id)) {
			throw new Error("connection reset");
		}
		const bodySize = this.options.bodySizes?.[id];
		if (bodySize !== undefined && maxBytes !== undefined && bodySize > maxBytes) {
			throw new ArtifactTooLargeError(id, maxBytes, bodySize);
		}
		return `/artifacts/${id}.pdf`;
	}
}

export async function makeTempDir(): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), "casewatch-test-"));
}

export async function removeDir(dir: string): Promise<void> {
	await fs.rm(dir, { recursive: true, force: true });
}
