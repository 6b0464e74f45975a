import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { compareIds } from "../core/fingerprint.js";
import { CASE_CATEGORIES, type HistoryEntry } from "../core/types.js";
import { StorageError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("history-store");

export const HISTORY_FORMAT_VERSION = 1;

/**
 * Keyed snapshot of every record observed so far. Instances never change;
 * a run builds a new store and persists it in one replacement.
 */
export class HistoryStore {
	private readonly entriesById: ReadonlyMap<string, HistoryEntry>;

	private constructor(entries: Iterable<readonly [string, HistoryEntry]>) {
		this.entriesById = new Map(entries);
	}

	static empty(): HistoryStore {
		return new HistoryStore([]);
	}

	static fromEntries(entries: Iterable<HistoryEntry>): HistoryStore {
		const pairs: Array<[string, HistoryEntry]> = [];
		const seen = new Set<string>();
		for (const entry of entries) {
			if (seen.has(entry.record.id)) {
				throw new StorageError(`Duplicate history entry: ${entry.record.id}`);
			}
			seen.add(entry.record.id);
			pairs.push([entry.record.id, entry]);
		}
		return new HistoryStore(pairs);
	}

	get size(): number {
		return this.entriesById.size;
	}

	isEmpty(): boolean {
		return this.entriesById.size === 0;
	}

	has(id: string): boolean {
		return this.entriesById.has(id);
	}

	get(id: string): HistoryEntry | undefined {
		return this.entriesById.get(id);
	}

	ids(): string[] {
		return [...this.entriesById.keys()].sort(compareIds);
	}

	/** Entries in id order. */
	entries(): HistoryEntry[] {
		return this.ids().map((id) => this.entriesById.get(id)).filter((e): e is HistoryEntry => e !== undefined);
	}
}

// Fields added after version 1 must be optional with a default so older files still load
const CaseRecordSchema = z.object({
	id: z.string().min(1),
	number: z.string().optional(),
	category: z.enum(CASE_CATEGORIES),
	title: z.string().default(""),
	tags: z.array(z.string()).default([]),
	documentIds: z.array(z.string()).default([]),
	signers: z.array(z.string()).default([]),
	documentCount: z.number().int().nonnegative().default(0),
	lastMovementTimestamp: z.string().nullable().default(null),
	url: z.string().optional(),
	fingerprint: z.string().min(1),
});

const HistoryEntrySchema = z.object({
	record: CaseRecordSchema,
	firstSeenAt: z.string(),
	lastSeenAt: z.string(),
	lastUpdatedAt: z.string(),
});

const HistoryFileSchema = z.object({
	version: z.number().int().positive(),
	entries: z.record(z.string(), HistoryEntrySchema),
});

type StoredEntry = z.infer<typeof HistoryEntrySchema>;

function toHistoryEntry(stored: StoredEntry): HistoryEntry {
	const { number, url, ...rest } = stored.record;
	return {
		record: { ...rest, number: number ?? rest.id, ...(url !== undefined ? { url } : {}) },
		firstSeenAt: stored.firstSeenAt,
		lastSeenAt: stored.lastSeenAt,
		lastUpdatedAt: stored.lastUpdatedAt,
	};
}

/**
 * Durable location of the history store: a versioned JSON document
 * replaced atomically (temp file, fsync, rename) on every persist.
 */
export class HistoryFile {
	constructor(readonly filePath: string) {}

	/** Missing file means no history yet. Anything unreadable is fatal. */
	async load(): Promise<HistoryStore> {
		let content: string;
		try {
			content = await fs.readFile(this.filePath, "utf-8");
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code === "ENOENT") {
				log.info({ file: this.filePath }, "No history file yet, starting empty");
				return HistoryStore.empty();
			}
			throw new StorageError(`Failed to read history ${this.filePath}`, err);
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (err) {
			throw new StorageError(`History ${this.filePath} is not valid JSON: ${errorMessage(err)}`, err);
		}

		const parsed = HistoryFileSchema.safeParse(raw);
		if (!parsed.success) {
			throw new StorageError(`History ${this.filePath} is corrupt: ${parsed.error.message}`, parsed.error);
		}
		if (parsed.data.version > HISTORY_FORMAT_VERSION) {
			throw new StorageError(
				`History ${this.filePath} has format version ${parsed.data.version}, newer than supported ${HISTORY_FORMAT_VERSION}`,
			);
		}

		const entries: HistoryEntry[] = [];
		for (const [key, stored] of Object.entries(parsed.data.entries)) {
			if (key !== stored.record.id) {
				throw new StorageError(`History ${this.filePath} is corrupt: key ${key} holds record ${stored.record.id}`);
			}
			entries.push(toHistoryEntry(stored));
		}

		const store = HistoryStore.fromEntries(entries);
		log.debug({ file: this.filePath, entries: store.size }, "History loaded");
		return store;
	}

	/** Either the whole store is on disk afterwards, or the previous file is untouched. */
	async persist(store: HistoryStore): Promise<void> {
		const dir = path.dirname(this.filePath);
		const tempPath = path.join(
			dir,
			`.${path.basename(this.filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
		);

		try {
			await fs.mkdir(dir, { recursive: true });
			const handle = await fs.open(tempPath, "w");
			try {
				await handle.writeFile(serializeHistory(store), "utf-8");
				await handle.sync();
			} finally {
				await handle.close();
			}
			await fs.rename(tempPath, this.filePath);
		} catch (err) {
			await fs.rm(tempPath, { force: true });
			throw new StorageError(`Failed to persist history ${this.filePath}`, err);
		}

		log.info({ file: this.filePath, entries: store.size }, "History persisted");
	}
}

/** Fixed key layout so identical stores serialize to identical bytes. */
export function serializeHistory(store: HistoryStore): string {
	const entries: Record<string, StoredEntry> = {};
	for (const { record, firstSeenAt, lastSeenAt, lastUpdatedAt } of store.entries()) {
		entries[record.id] = {
			record: {
				id: record.id,
				number: record.number,
				category: record.category,
				title: record.title,
				tags: record.tags,
				documentIds: record.documentIds,
				signers: record.signers,
				documentCount: record.documentCount,
				lastMovementTimestamp: record.lastMovementTimestamp,
				...(record.url !== undefined ? { url: record.url } : {}),
				fingerprint: record.fingerprint,
			},
			firstSeenAt,
			lastSeenAt,
			lastUpdatedAt,
		};
	}
	return JSON.stringify({ version: HISTORY_FORMAT_VERSION, entries }, null, 2) + "\n";
}
