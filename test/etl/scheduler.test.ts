import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../src/config.js";
import { summarize } from "../../src/core/summary.js";
import type { RunResult } from "../../src/etl/case-run.js";
import { startScheduler, stopScheduler } from "../../src/etl/scheduler.js";

const config = loadConfig(path.join("does-not-exist", "casewatch.json"), { CASEWATCH_CRON: "0 7 * * 1-5" });

const result: RunResult = {
	mode: "incremental",
	records: [],
	summary: summarize([]),
	startedAt: "2026-05-04T07:00:00.000Z",
	finishedAt: "2026-05-04T07:00:01.000Z",
};

afterEach(() => {
	stopScheduler();
});

describe("startScheduler", () => {
	it("schedules the configured cron and passes a signal to each run", async () => {
		const run = vi.fn().mockResolvedValue(result);

		const job = startScheduler(config, run);
		expect(job.getPattern()).toBe("0 7 * * 1-5");
		expect(job.nextRun()).toBeInstanceOf(Date);

		await job.trigger();
		expect(run).toHaveBeenCalledTimes(1);
		expect(run.mock.calls[0][0]).toBeInstanceOf(AbortSignal);
	});

	it("survives a failing run", async () => {
		const run = vi.fn().mockRejectedValue(new Error("registry unreachable"));

		const job = startScheduler(config, run);

		await expect(job.trigger()).resolves.toBeUndefined();
		expect(job.isStopped()).toBe(false);
	});

	it("stops every job", () => {
		const job = startScheduler(config, vi.fn().mockResolvedValue(result));

		stopScheduler();

		expect(job.isStopped()).toBe(true);
	});
});
