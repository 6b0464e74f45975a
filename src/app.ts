import { JsonSnapshotCollector } from "./collector/json-snapshot.js";
import { toLimitPolicy, type CaseWatchConfig } from "./config.js";
import { runCaseCheck, type RunResult } from "./etl/case-run.js";
import { HttpArtifactFetcher } from "./fetch/http-fetcher.js";
import { FileReportNotifier, SlackNotifier, sendReport, type Notifier } from "./notify/notify.js";
import { buildReport } from "./notify/report.js";
import { HistoryFile } from "./storage/history-store.js";
import { DataPaths } from "./storage/paths.js";
import { ConfigError } from "./utils/errors.js";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger("app");

export function createNotifiers(config: CaseWatchConfig, paths: DataPaths): Notifier[] {
	const notifiers: Notifier[] = [];

	if (config.notify.report_file) {
		notifiers.push(new FileReportNotifier((report) => paths.reportFile(new Date(report.generatedAt))));
	}

	const slack = config.notify.slack;
	if (slack.enabled) {
		if (!slack.bot_token || !slack.channel_id) {
			throw new ConfigError("Slack notifications require SLACK_BOT_TOKEN and SLACK_CHANNEL_ID");
		}
		notifiers.push(new SlackNotifier(slack.channel_id, slack.bot_token));
	}

	return notifiers;
}

/** Run once with collaborators built from configuration, then report. */
export async function runFromConfig(config: CaseWatchConfig, signal?: AbortSignal): Promise<RunResult> {
	const urlTemplate = config.fetch.url_template;
	if (!urlTemplate) {
		throw new ConfigError("fetch.url_template (CASEWATCH_ARTIFACT_URL_TEMPLATE) is required");
	}

	const paths = new DataPaths(config.data_dir);
	const historyFile = new HistoryFile(paths.historyFile);
	const notifiers = createNotifiers(config, paths);

	const result = await runCaseCheck({
		collector: new JsonSnapshotCollector(config.collector.snapshot_file, {
			baselineLimit: config.collector.baseline_limit,
		}),
		fetcher: new HttpArtifactFetcher({
			urlTemplate,
			targetFile: (id) => paths.artifactFile(id),
			timeoutMs: config.fetch.timeout_ms,
		}),
		historyFile,
		lockPath: paths.lockFile,
		policy: toLimitPolicy(config),
		concurrency: config.fetch.concurrency,
		signal,
	});

	const failed = await sendReport(buildReport(result, config.unit), notifiers);
	if (failed.length > 0) {
		log.warn({ failed }, "Run persisted but some notifiers failed");
	}
	return result;
}
