import type { CaseRecord, RunMode } from "../core/types.js";

export interface CollectContext {
	/** Fixed when history is loaded, before collection starts */
	mode: RunMode;
}

/** Supplies the current snapshot. How it was gathered is not our concern. */
export interface SnapshotCollector {
	collect(context: CollectContext): Promise<CaseRecord[]>;
}
