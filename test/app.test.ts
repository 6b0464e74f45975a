import path from "node:path";
import { describe, expect, it } from "vitest";
import { createNotifiers, runFromConfig } from "../src/app.js";
import { loadConfig } from "../src/config.js";
import { DataPaths } from "../src/storage/paths.js";
import { ConfigError } from "../src/utils/errors.js";

const configPath = path.join("does-not-exist", "casewatch.json");
const paths = new DataPaths("./data");

describe("createNotifiers", () => {
	it("writes report files by default", () => {
		const notifiers = createNotifiers(loadConfig(configPath, {}), paths);

		expect(notifiers.map((n) => n.name)).toEqual(["report-file"]);
	});

	it("adds Slack when enabled with credentials", () => {
		const config = loadConfig(configPath, { SLACK_BOT_TOKEN: "test-token", SLACK_CHANNEL_ID: "C123" });
		config.notify.slack.enabled = true;

		expect(createNotifiers(config, paths).map((n) => n.name)).toEqual(["report-file", "slack"]);
	});

	it("refuses Slack without credentials", () => {
		const config = loadConfig(configPath, {});
		config.notify.slack.enabled = true;

		expect(() => createNotifiers(config, paths)).toThrow(ConfigError);
	});
});

describe("runFromConfig", () => {
	it("requires an artifact URL template", async () => {
		await expect(runFromConfig(loadConfig(configPath, {}))).rejects.toThrow("fetch.url_template");
	});
});
