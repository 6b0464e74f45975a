import fs from "node:fs/promises";
import { z } from "zod";
import { withFingerprint } from "../core/fingerprint.js";
import { CASE_CATEGORIES, type CaseRecord } from "../core/types.js";
import { SnapshotError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { CollectContext, SnapshotCollector } from "./types.js";

const log = createChildLogger("json-snapshot");

const ObservationSchema = z.object({
	id: z.string().trim().min(1),
	number: z.string().optional(),
	category: z.enum(CASE_CATEGORIES),
	title: z.string().default(""),
	tags: z.array(z.string()).default([]),
	documentIds: z.array(z.string()).default([]),
	signers: z.array(z.string()).default([]),
	documentCount: z.number().int().nonnegative().optional(),
	lastMovementTimestamp: z.string().nullable().default(null),
	url: z.string().optional(),
});

const SnapshotSchema = z.array(ObservationSchema);

export function toCaseRecord(observation: z.output<typeof ObservationSchema>): CaseRecord {
	return withFingerprint({
		id: observation.id,
		number: observation.number ?? observation.id,
		category: observation.category,
		title: observation.title,
		tags: observation.tags,
		documentIds: observation.documentIds,
		signers: observation.signers,
		documentCount: observation.documentCount ?? observation.documentIds.length,
		lastMovementTimestamp: observation.lastMovementTimestamp,
		...(observation.url !== undefined ? { url: observation.url } : {}),
	});
}

export interface JsonSnapshotOptions {
	/**
	 * Only the first N observations are returned on a baseline run.
	 * Meant for quick trial runs against a large registry.
	 */
	baselineLimit?: number;
}

/**
 * Reads the snapshot exported by the registry scraper: a JSON array of
 * case observations. Fingerprints are derived here.
 */
export class JsonSnapshotCollector implements SnapshotCollector {
	constructor(
		private readonly filePath: string,
		private readonly options: JsonSnapshotOptions = {},
	) {}

	async collect(context: CollectContext): Promise<CaseRecord[]> {
		let raw: unknown;
		try {
			raw = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
		} catch (err) {
			throw new SnapshotError(`Failed to read snapshot ${this.filePath}: ${errorMessage(err)}`, err);
		}

		const parsed = SnapshotSchema.safeParse(raw);
		if (!parsed.success) {
			throw new SnapshotError(`Invalid snapshot ${this.filePath}: ${parsed.error.message}`, parsed.error);
		}

		let observations = parsed.data;
		const { baselineLimit } = this.options;
		if (baselineLimit !== undefined && context.mode === "baseline" && baselineLimit < observations.length) {
			log.info({ baselineLimit, total: observations.length }, "Limiting baseline snapshot");
			observations = observations.slice(0, baselineLimit);
		}

		const records = observations.map(toCaseRecord);
		log.info(
			{
				total: records.length,
				inbound: records.filter((r) => r.category === "Inbound").length,
				generated: records.filter((r) => r.category === "Generated").length,
			},
			"Snapshot collected",
		);
		return records;
	}
}
