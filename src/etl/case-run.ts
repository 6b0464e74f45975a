import type { SnapshotCollector } from "../collector/types.js";
import { classify } from "../core/change-detector.js";
import { DEFAULT_FETCH_CONCURRENCY, plan } from "../core/fetch-planner.js";
import { enforce } from "../core/limit-enforcer.js";
import { reconcile, runModeOf } from "../core/reconciler.js";
import { summarize } from "../core/summary.js";
import type { ClassifiedRecord, LimitPolicy, RunMode, RunPhase, RunSummary } from "../core/types.js";
import type { ArtifactFetcher } from "../fetch/types.js";
import type { HistoryFile } from "../storage/history-store.js";
import { RunLock } from "../storage/run-lock.js";
import { CaseWatchError, RunAbortedError, RunCancelledError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("case-run");

export interface CaseRunDeps {
	collector: SnapshotCollector;
	fetcher: ArtifactFetcher;
	historyFile: HistoryFile;
	lockPath: string;
	policy: LimitPolicy;
	concurrency?: number;
	clock?: () => Date;
	signal?: AbortSignal;
	/** Observes every phase the run enters; for progress reporting */
	onPhase?: (phase: RunPhase) => void;
}

export interface RunResult {
	mode: RunMode;
	records: ClassifiedRecord[];
	summary: RunSummary;
	startedAt: string;
	finishedAt: string;
}

/**
 * One complete run: load history, classify the current snapshot, apply
 * limits, fetch artifacts, then replace the history in a single write.
 *
 * Nothing durable changes before the final persist. Any failure or
 * cancellation before it surfaces as RunAbortedError and leaves the
 * previous history in place, so retrying reclassifies the same way.
 */
export async function runCaseCheck(deps: CaseRunDeps): Promise<RunResult> {
	const clock = deps.clock ?? (() => new Date());
	const startedAt = clock().toISOString();
	const state: { phase: RunPhase } = { phase: "start" };

	const enter = (next: RunPhase, details: Record<string, unknown> = {}) => {
		state.phase = next;
		log.info({ phase: next, ...details }, `Run ${next}`);
		deps.onPhase?.(next);
	};
	const checkCancelled = () => {
		if (deps.signal?.aborted) {
			throw new RunCancelledError(`Run cancelled after ${state.phase}`, deps.signal.reason);
		}
	};

	enter("start");
	let lock: RunLock | undefined;
	try {
		lock = await RunLock.acquire(deps.lockPath);

		const history = await deps.historyFile.load();
		const mode = runModeOf(history);
		enter("loaded", { mode, entries: history.size });
		checkCancelled();

		const snapshot = await deps.collector.collect({ mode });
		checkCancelled();
		const classified = classify(snapshot, history);
		enter("classified", { records: classified.length });

		const limited = enforce(classified, deps.policy);
		enter("limit-applied", {
			admitted: limited.filter((r) => r.admitted).length,
			maxNewPerRun: deps.policy.maxNewPerRun,
		});
		checkCancelled();

		const planned = await plan(limited, deps.fetcher, deps.policy, {
			concurrency: deps.concurrency ?? DEFAULT_FETCH_CONCURRENCY,
			signal: deps.signal,
		});
		enter("planned");
		checkCancelled();

		const reconciled = reconcile(snapshot, planned, history, clock());
		enter("reconciled", { entries: reconciled.history.size });
		checkCancelled();

		await deps.historyFile.persist(reconciled.history);
		const summary = summarize(planned);
		enter("persisted", { ...summary });

		return {
			mode: reconciled.mode,
			records: planned,
			summary,
			startedAt,
			finishedAt: clock().toISOString(),
		};
	} catch (err) {
		const failedIn = state.phase;
		enter("aborted", { failedIn, err });
		if (err instanceof RunAbortedError) throw err;
		const reason = err instanceof CaseWatchError ? err.code : "UNEXPECTED";
		throw new RunAbortedError(`Run aborted after ${failedIn} (${reason}): ${errorMessage(err)}`, failedIn, err);
	} finally {
		await lock?.release();
	}
}
