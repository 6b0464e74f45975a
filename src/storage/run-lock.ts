import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { LockError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("run-lock");

interface LockOwner {
	pid: number;
	acquiredAt: string;
}

/**
 * Advisory single-writer lock over the history store's location.
 * A second run fails fast instead of waiting. A lock left behind by a
 * process that no longer exists is taken over.
 */
export class RunLock {
	private released = false;

	private constructor(readonly lockPath: string) {}

	static async acquire(lockPath: string): Promise<RunLock> {
		await fs.mkdir(path.dirname(lockPath), { recursive: true });

		if (await tryCreate(lockPath)) {
			return new RunLock(lockPath);
		}

		const seen = await readRaw(lockPath);
		if (seen === null) {
			// Released between our create and read
			if (await tryCreate(lockPath)) return new RunLock(lockPath);
			throw new LockError(`History lock ${lockPath} was taken by another run`);
		}

		const owner = parseOwner(seen);
		if (owner && isProcessAlive(owner.pid)) {
			throw new LockError(
				`History is locked by run pid ${owner.pid} since ${owner.acquiredAt} (${lockPath})`,
			);
		}
		if (!owner && !(await olderThan(lockPath, LOCK_WRITE_GRACE_MS))) {
			throw new LockError(`History lock ${lockPath} is being written by another run`);
		}

		log.warn({ lockPath, owner }, "Taking over stale run lock");
		await takeOver(lockPath, seen);
		if (await tryCreate(lockPath)) {
			return new RunLock(lockPath);
		}
		throw new LockError(`History lock ${lockPath} was taken by another run`);
	}

	async release(): Promise<void> {
		if (this.released) return;
		this.released = true;
		await fs.rm(this.lockPath, { force: true });
	}
}

async function tryCreate(lockPath: string): Promise<boolean> {
	const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
	try {
		await fs.writeFile(lockPath, JSON.stringify(owner), { encoding: "utf-8", flag: "wx" });
		return true;
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "EEXIST") return false;
		throw new LockError(`Failed to create lock ${lockPath}`, err);
	}
}

/** An unreadable lock only counts as stale once it is this old. */
export const LOCK_WRITE_GRACE_MS = 5_000;

/**
 * Move the stale lock aside. Only one contender's rename can succeed; if
 * what it moved is no longer the lock it judged stale, that lock is put
 * back and the takeover is abandoned.
 */
async function takeOver(lockPath: string, stale: string): Promise<void> {
	const tomb = `${lockPath}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
	try {
		await fs.rename(lockPath, tomb);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			throw new LockError(`History lock ${lockPath} was taken over by another run`, err);
		}
		throw new LockError(`Failed to remove stale lock ${lockPath}`, err);
	}

	const moved = await readRaw(tomb);
	if (moved !== stale) {
		await restore(tomb, lockPath);
		throw new LockError(`History lock ${lockPath} was taken over by another run`);
	}
	await fs.rm(tomb, { force: true });
}

async function restore(tomb: string, lockPath: string): Promise<void> {
	try {
		await fs.link(tomb, lockPath);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") {
			throw new LockError(`Failed to restore lock ${lockPath}`, err);
		}
	} finally {
		await fs.rm(tomb, { force: true });
	}
}

async function readRaw(filePath: string): Promise<string | null> {
	try {
		return await fs.readFile(filePath, "utf-8");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
		throw new LockError(`Failed to read lock ${filePath}`, err);
	}
}

async function olderThan(filePath: string, ageMs: number): Promise<boolean> {
	try {
		const { mtimeMs } = await fs.stat(filePath);
		return Date.now() - mtimeMs > ageMs;
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") return true;
		throw new LockError(`Failed to inspect lock ${filePath}`, err);
	}
}

function parseOwner(raw: string): LockOwner | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return null;
	}
	if (
		typeof parsed === "object" &&
		parsed !== null &&
		"pid" in parsed &&
		typeof parsed.pid === "number" &&
		"acquiredAt" in parsed &&
		typeof parsed.acquiredAt === "string"
	) {
		return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
	}
	return null;
}

/** Returns null when there is no lock or it is not one we wrote. */
export async function readOwner(lockPath: string): Promise<LockOwner | null> {
	const raw = await readRaw(lockPath);
	return raw === null ? null : parseOwner(raw);
}

function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: exists but owned by another user
		return (err as NodeJS.ErrnoException).code === "EPERM";
	}
}
