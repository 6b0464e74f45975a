import fs from "node:fs/promises";
import path from "node:path";
import { WebClient } from "@slack/web-api";
import { createChildLogger } from "../utils/logger.js";
import { formatReportText, type RunReport } from "./report.js";

const log = createChildLogger("notify");

/** Consumes a finished run's report. Never feeds anything back into the run. */
export interface Notifier {
	readonly name: string;
	send(report: RunReport): Promise<void>;
}

/** The part of Slack's WebClient used here */
export interface SlackPoster {
	chat: {
		postMessage(args: { channel: string; text: string }): Promise<unknown>;
	};
}

function slackPoster(client: WebClient): SlackPoster {
	return {
		chat: {
			postMessage: ({ channel, text }) => client.chat.postMessage({ channel, text }),
		},
	};
}

export class SlackNotifier implements Notifier {
	readonly name = "slack";
	private readonly web: SlackPoster;

	constructor(
		private readonly channelId: string,
		botToken: string,
		web?: SlackPoster,
	) {
		this.web = web ?? slackPoster(new WebClient(botToken));
	}

	async send(report: RunReport): Promise<void> {
		await this.web.chat.postMessage({ channel: this.channelId, text: formatReportText(report) });
	}
}

/** Keeps the full report, every record with its annotations, as JSON. */
export class FileReportNotifier implements Notifier {
	readonly name = "report-file";

	constructor(private readonly fileFor: (report: RunReport) => string) {}

	async send(report: RunReport): Promise<void> {
		const filePath = this.fileFor(report);
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, JSON.stringify(report, null, 2) + "\n", "utf-8");
		log.info({ filePath }, "Report written");
	}
}

/**
 * Deliver the report through every notifier. A failing notifier is logged
 * and skipped; the run's results are already persisted by now.
 * Returns the names of notifiers that failed.
 */
export async function sendReport(report: RunReport, notifiers: readonly Notifier[]): Promise<string[]> {
	const failed: string[] = [];
	for (const notifier of notifiers) {
		try {
			await notifier.send(report);
			log.info({ notifier: notifier.name }, "Report delivered");
		} catch (err) {
			log.error({ err, notifier: notifier.name }, "Failed to deliver report");
			failed.push(notifier.name);
		}
	}
	return failed;
}
