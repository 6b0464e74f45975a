import { Cron } from "croner";
import type { CaseWatchConfig } from "../config.js";
import { createChildLogger } from "../utils/logger.js";
import type { RunResult } from "./case-run.js";

const log = createChildLogger("scheduler");

const jobs: Cron[] = [];
const stopHooks = new Map<Cron, () => void>();

export type ScheduledRun = (signal: AbortSignal) => Promise<RunResult>;

/**
 * Start the periodic case check. A tick that fires while the previous run
 * is still going is skipped; the run lock guards against other processes.
 */
export function startScheduler(config: CaseWatchConfig, run: ScheduledRun): Cron {
	let controller: AbortController | undefined;

	const job = new Cron(
		config.schedule.cron,
		{
			protect: true,
			...(config.schedule.timezone ? { timezone: config.schedule.timezone } : {}),
		},
		async () => {
			controller = new AbortController();
			log.info({ unit: config.unit }, "Running scheduled case check");
			try {
				const result = await run(controller.signal);
				log.info({ mode: result.mode, ...result.summary }, "Scheduled case check complete");
			} catch (err) {
				log.error({ err }, "Scheduled case check failed");
			} finally {
				controller = undefined;
			}
		},
	);

	jobs.push(job);
	// Cancels an in-flight run when the job is stopped
	stopHooks.set(job, () => controller?.abort());
	log.info({ cron: config.schedule.cron, next: job.nextRun()?.toISOString() }, "Case check scheduled");
	return job;
}

/** Stop all scheduled jobs and cancel any run in progress. */
export function stopScheduler(): void {
	for (const job of jobs) {
		job.stop();
		stopHooks.get(job)?.();
	}
	jobs.length = 0;
	stopHooks.clear();
	log.info("All jobs stopped");
}
