import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import "dotenv/config";
import { z } from "zod";
import { createLimitPolicy, type LimitPolicy } from "./core/types.js";
import { ConfigError } from "./utils/errors.js";

const MB = 1024 * 1024;

const ConfigSchema = z.object({
	data_dir: z.string().min(1),
	/** Registry unit whose cases are tracked; used in report headings */
	unit: z.string().min(1),

	limits: z.object({
		/** 0 pauses intake of new records */
		max_new_per_run: z.number().int().nonnegative(),
		max_artifact_size_bytes: z.number().int().positive(),
	}),

	collector: z.object({
		snapshot_file: z.string().min(1),
		/** Truncate a baseline snapshot to this many records; for trial runs */
		baseline_limit: z.number().int().positive().optional(),
	}),

	fetch: z.object({
		/** Artifact URL with an `{id}` placeholder */
		url_template: z.string().optional(),
		concurrency: z.number().int().positive(),
		timeout_ms: z.number().int().positive(),
	}),

	schedule: z.object({
		cron: z.string().min(1),
		timezone: z.string().optional(),
	}),

	notify: z.object({
		slack: z.object({
			enabled: z.boolean(),
			bot_token: z.string().optional(),
			channel_id: z.string().optional(),
		}),
		report_file: z.boolean(),
	}),
});

export type CaseWatchConfig = z.infer<typeof ConfigSchema>;

const DEFAULTS: CaseWatchConfig = {
	data_dir: "./data",
	unit: "default",
	limits: {
		max_new_per_run: 10,
		max_artifact_size_bytes: 100 * MB,
	},
	collector: {
		snapshot_file: "./data/snapshot.json",
	},
	fetch: {
		concurrency: 4,
		timeout_ms: 60_000,
	},
	schedule: {
		cron: "0 7 * * 1-5",
	},
	notify: {
		slack: { enabled: false },
		report_file: true,
	},
};

export function loadConfig(
	configPath?: string,
	env: NodeJS.ProcessEnv = process.env,
): CaseWatchConfig {
	const path = configPath ?? env.CASEWATCH_CONFIG ?? "./config/casewatch.json";
	const resolved = resolve(path);

	let fileConfig: Record<string, unknown> = {};
	if (existsSync(resolved)) {
		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(resolved, "utf-8"));
		} catch (err) {
			throw new ConfigError(`Invalid JSON in config file ${resolved}`, err);
		}
		if (!isPlainObject(parsed)) {
			throw new ConfigError(`Config file ${resolved} must contain a JSON object`);
		}
		fileConfig = parsed;
	}

	const merged = deepMerge(DEFAULTS, fileConfig);
	applyEnvOverrides(merged, env);

	const result = ConfigSchema.safeParse(merged);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
	}

	const config = result.data;
	config.data_dir = resolve(config.data_dir);
	config.collector.snapshot_file = resolve(config.collector.snapshot_file);
	return config;
}

/** Immutable per-run limits derived once from configuration */
export function toLimitPolicy(config: CaseWatchConfig): LimitPolicy {
	return createLimitPolicy(config.limits.max_new_per_run, config.limits.max_artifact_size_bytes);
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
	const set = (keyPath: string[], value: unknown) => {
		let target = config;
		for (const key of keyPath.slice(0, -1)) {
			const next = target[key];
			if (!isPlainObject(next)) {
				const created: Record<string, unknown> = {};
				target[key] = created;
				target = created;
			} else {
				target = next;
			}
		}
		target[keyPath[keyPath.length - 1]] = value;
	};

	if (env.CASEWATCH_DATA_DIR) set(["data_dir"], env.CASEWATCH_DATA_DIR);
	if (env.CASEWATCH_UNIT) set(["unit"], env.CASEWATCH_UNIT);
	if (env.CASEWATCH_MAX_NEW_PER_RUN) {
		set(["limits", "max_new_per_run"], parseInteger("CASEWATCH_MAX_NEW_PER_RUN", env.CASEWATCH_MAX_NEW_PER_RUN));
	}
	if (env.CASEWATCH_MAX_ARTIFACT_SIZE_MB) {
		const mb = parseInteger("CASEWATCH_MAX_ARTIFACT_SIZE_MB", env.CASEWATCH_MAX_ARTIFACT_SIZE_MB);
		set(["limits", "max_artifact_size_bytes"], mb * MB);
	}
	if (env.CASEWATCH_SNAPSHOT_FILE) set(["collector", "snapshot_file"], env.CASEWATCH_SNAPSHOT_FILE);
	if (env.CASEWATCH_BASELINE_LIMIT) {
		set(["collector", "baseline_limit"], parseInteger("CASEWATCH_BASELINE_LIMIT", env.CASEWATCH_BASELINE_LIMIT));
	}
	if (env.CASEWATCH_ARTIFACT_URL_TEMPLATE) set(["fetch", "url_template"], env.CASEWATCH_ARTIFACT_URL_TEMPLATE);
	if (env.CASEWATCH_FETCH_CONCURRENCY) {
		set(["fetch", "concurrency"], parseInteger("CASEWATCH_FETCH_CONCURRENCY", env.CASEWATCH_FETCH_CONCURRENCY));
	}
	if (env.CASEWATCH_CRON) set(["schedule", "cron"], env.CASEWATCH_CRON);
	if (env.CASEWATCH_TIMEZONE) set(["schedule", "timezone"], env.CASEWATCH_TIMEZONE);
	if (env.SLACK_BOT_TOKEN) set(["notify", "slack", "bot_token"], env.SLACK_BOT_TOKEN);
	if (env.SLACK_CHANNEL_ID) set(["notify", "slack", "channel_id"], env.SLACK_CHANNEL_ID);
}

function parseInteger(name: string, raw: string): number {
	const value = Number(raw.trim());
	if (!Number.isInteger(value)) {
		throw new ConfigError(`${name} must be an integer, got "${raw}"`);
	}
	return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(target: object, source: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	// Nested objects are copied so overrides never write into DEFAULTS
	for (const [key, value] of Object.entries(target)) {
		result[key] = isPlainObject(value) ? deepMerge(value, {}) : value;
	}
	for (const key of Object.keys(source)) {
		const sv = source[key];
		const tv = result[key];
		if (isPlainObject(sv) && isPlainObject(tv)) {
			result[key] = deepMerge(tv, sv);
		} else {
			result[key] = sv;
		}
	}
	return result;
}
