import type { ArtifactFetcher, ProbeResult } from "../fetch/types.js";
import { ArtifactTooLargeError, FetchError, RunCancelledError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { mapWithConcurrency } from "../utils/pool.js";
import { SKIP_REASONS, type ClassifiedRecord, type LimitPolicy } from "./types.js";

const log = createChildLogger("fetch-planner");

export const DEFAULT_FETCH_CONCURRENCY = 4;

export interface PlanOptions {
	concurrency?: number;
	signal?: AbortSignal;
}

/**
 * Decide and carry out artifact retrieval for every admitted record.
 *
 * Each admitted record is probed once; artifacts over the size limit are
 * skipped without transfer, the rest are materialized. Failures stay on
 * the record they belong to. Non-admitted records pass through untouched
 * and the output keeps the input order.
 */
export async function plan(
	annotated: readonly ClassifiedRecord[],
	fetcher: ArtifactFetcher,
	policy: LimitPolicy,
	options: PlanOptions = {},
): Promise<ClassifiedRecord[]> {
	const { concurrency = DEFAULT_FETCH_CONCURRENCY, signal } = options;

	try {
		return await mapWithConcurrency(
			annotated,
			concurrency,
			(item) => (item.admitted ? planOne(item, fetcher, policy) : Promise.resolve(item)),
			signal,
		);
	} catch (err) {
		if (signal?.aborted) {
			throw new RunCancelledError("Run cancelled during fetch planning", err);
		}
		throw err;
	}
}

async function planOne(
	item: ClassifiedRecord,
	fetcher: ArtifactFetcher,
	policy: LimitPolicy,
): Promise<ClassifiedRecord> {
	const id = item.record.id;
	const probe = await probeSize(fetcher, id);

	if (!probe.ok) {
		log.warn({ id, err: probe.error }, "Artifact size probe failed");
		return {
			...item,
			fetchOutcome: "fetch-error",
			skipReason: SKIP_REASONS.probeFailed,
			fetchError: probe.error.message,
		};
	}

	if (probe.sizeBytes > policy.maxArtifactSizeBytes) {
		log.warn(
			{ id, sizeBytes: probe.sizeBytes, limitBytes: policy.maxArtifactSizeBytes },
			"Artifact exceeds size limit, not fetched",
		);
		return {
			...item,
			fetchOutcome: "skipped-too-large",
			skipReason: SKIP_REASONS.artifactTooLarge,
			probedSizeBytes: probe.sizeBytes,
		};
	}

	try {
		const location = await fetcher.materialize(id, policy.maxArtifactSizeBytes);
		log.info({ id, sizeBytes: probe.sizeBytes, location }, "Artifact fetched");
		return {
			...item,
			fetchOutcome: "fetched",
			probedSizeBytes: probe.sizeBytes,
			artifactLocation: location,
		};
	} catch (err) {
		if (err instanceof ArtifactTooLargeError) {
			log.warn(
				{ id, probedBytes: probe.sizeBytes, receivedBytes: err.receivedBytes, limitBytes: err.limitBytes },
				"Artifact outgrew its probed size, transfer dropped",
			);
			return {
				...item,
				fetchOutcome: "skipped-too-large",
				skipReason: SKIP_REASONS.artifactTooLarge,
				probedSizeBytes: err.receivedBytes,
			};
		}
		const failure = new FetchError(`Failed to fetch artifact for ${id}: ${errorMessage(err)}`, id, err);
		log.warn({ id, err: failure }, "Artifact fetch failed");
		return {
			...item,
			fetchOutcome: "fetch-error",
			skipReason: SKIP_REASONS.fetchFailed,
			probedSizeBytes: probe.sizeBytes,
			fetchError: failure.message,
		};
	}
}

async function probeSize(fetcher: ArtifactFetcher, id: string): Promise<ProbeResult> {
	try {
		const sizeBytes = await fetcher.probeSize(id);
		if (!Number.isFinite(sizeBytes) || sizeBytes < 0) {
			return { ok: false, error: new FetchError(`Invalid artifact size for ${id}: ${sizeBytes}`, id) };
		}
		return { ok: true, sizeBytes };
	} catch (err) {
		return { ok: false, error: new FetchError(`Size probe failed for ${id}: ${errorMessage(err)}`, id, err) };
	}
}
