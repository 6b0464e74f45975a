import { createHash } from "node:crypto";
import path from "node:path";

/**
 * Resolve paths within the data directory.
 * Everything a run reads or writes lives under it.
 */
export class DataPaths {
	constructor(private readonly dataDir: string) {}

	get root(): string {
		return path.resolve(this.dataDir);
	}

	get historyFile(): string {
		return path.join(this.root, "history.json");
	}

	get lockFile(): string {
		return path.join(this.root, "history.lock");
	}

	get artifactsDir(): string {
		return path.join(this.root, "artifacts");
	}

	get reportsDir(): string {
		return path.join(this.root, "reports");
	}

	/**
	 * Artifact file for a record. The readable part is sanitized for the
	 * filesystem; the digest of the raw id keeps distinct ids apart.
	 */
	artifactFile(id: string): string {
		const safe = id.replace(/[^a-zA-Z0-9_.-]/g, "_");
		const digest = createHash("sha256").update(id).digest("hex").slice(0, 12);
		return path.join(this.artifactsDir, `${safe}-${digest}.pdf`);
	}

	/** Daily report file */
	reportFile(date: Date = new Date()): string {
		const dateStr = date.toISOString().slice(0, 10); // YYYY-MM-DD
		return path.join(this.reportsDir, `${dateStr}.json`);
	}
}
