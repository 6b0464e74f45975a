#!/usr/bin/env node

import { runFromConfig } from "./app.js";
import { loadConfig } from "./config.js";
import { startScheduler, stopScheduler } from "./etl/scheduler.js";
import { HistoryFile } from "./storage/history-store.js";
import { DataPaths } from "./storage/paths.js";
import { readOwner } from "./storage/run-lock.js";
import { logger } from "./utils/logger.js";

const command = process.argv[2];

try {
	switch (command) {
		case "run":
			await runOnce();
			break;
		case "schedule":
			runSchedule();
			break;
		case "status":
			await runStatus();
			break;
		default:
			printUsage();
			break;
	}
} catch (err) {
	logger.fatal({ err }, "casewatch failed");
	process.exitCode = 1;
}

async function runOnce(): Promise<void> {
	const config = loadConfig();
	const controller = new AbortController();
	const cancel = () => controller.abort();
	process.once("SIGINT", cancel);
	process.once("SIGTERM", cancel);

	try {
		const result = await runFromConfig(config, controller.signal);
		console.log(`Run complete (${result.mode})`);
		for (const [key, value] of Object.entries(result.summary)) {
			console.log(`  ${key}: ${value}`);
		}
	} finally {
		process.off("SIGINT", cancel);
		process.off("SIGTERM", cancel);
	}
}

function runSchedule(): void {
	const config = loadConfig();
	startScheduler(config, (signal) => runFromConfig(config, signal));

	const shutdown = () => {
		logger.info("Shutting down...");
		stopScheduler();
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

async function runStatus(): Promise<void> {
	const config = loadConfig();
	const paths = new DataPaths(config.data_dir);

	console.log("casewatch status");
	console.log("---");
	console.log(`Unit: ${config.unit}`);
	console.log(`Data directory: ${paths.root}`);

	const history = await new HistoryFile(paths.historyFile).load();
	console.log(`History entries: ${history.size}${history.isEmpty() ? " (next run is a baseline)" : ""}`);

	const owner = await readOwner(paths.lockFile);
	console.log(owner ? `Locked by pid ${owner.pid} since ${owner.acquiredAt}` : "Not locked");
}

function printUsage(): void {
	console.log(`
casewatch - case registry change tracking

Usage:
  casewatch run        Run one case check and send the report
  casewatch schedule   Run case checks on the configured cron schedule
  casewatch status     Show history and lock state

Environment:
  See .env.example for configuration.
`);
}
