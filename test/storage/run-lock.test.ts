import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LOCK_WRITE_GRACE_MS, RunLock, readOwner } from "../../src/storage/run-lock.js";
import { LockError } from "../../src/utils/errors.js";
import { makeTempDir, removeDir } from "../helpers.js";

let dir: string;
let lockPath: string;

beforeEach(async () => {
	dir = await makeTempDir();
	lockPath = path.join(dir, "history.lock");
});

afterEach(async () => {
	await removeDir(dir);
});

describe("RunLock", () => {
	it("records the owning process", async () => {
		const lock = await RunLock.acquire(lockPath);

		const owner = await readOwner(lockPath);
		expect(owner?.pid).toBe(process.pid);

		await lock.release();
		expect(await readOwner(lockPath)).toBeNull();
	});

	it("fails fast while another live run holds the lock", async () => {
		const lock = await RunLock.acquire(lockPath);

		await expect(RunLock.acquire(lockPath)).rejects.toBeInstanceOf(LockError);

		await lock.release();
	});

	it("can be acquired again after release", async () => {
		const first = await RunLock.acquire(lockPath);
		await first.release();

		const second = await RunLock.acquire(lockPath);
		await second.release();
	});

	it("takes over a lock left by a process that is gone", async () => {
		// Above the default Linux pid_max, so no such process can exist
		await fs.writeFile(lockPath, JSON.stringify({ pid: 4_194_305, acquiredAt: "2026-01-01T00:00:00.000Z" }));

		const lock = await RunLock.acquire(lockPath);

		expect((await readOwner(lockPath))?.pid).toBe(process.pid);
		await lock.release();
	});

	it("lets exactly one of two racing runs take over a stale lock", async () => {
		for (let round = 0; round < 25; round++) {
			await fs.writeFile(lockPath, JSON.stringify({ pid: 4_194_305, acquiredAt: "2026-01-01T00:00:00.000Z" }));

			const results = await Promise.allSettled([RunLock.acquire(lockPath), RunLock.acquire(lockPath)]);

			const held = results.filter((r) => r.status === "fulfilled");
			const refused = results.filter((r) => r.status === "rejected");
			expect(held).toHaveLength(1);
			expect(refused).toHaveLength(1);
			expect(refused[0]).toMatchObject({ reason: expect.any(LockError) });
			expect((await readOwner(lockPath))?.pid).toBe(process.pid);

			for (const result of results) {
				if (result.status === "fulfilled") await result.value.release();
			}
			expect(await fs.readdir(dir)).toEqual([]);
		}
	});

	it("refuses a lock file that is still being written", async () => {
		await fs.writeFile(lockPath, "");

		await expect(RunLock.acquire(lockPath)).rejects.toThrow("is being written by another run");
		expect(await fs.readFile(lockPath, "utf-8")).toBe("");
	});

	it("takes over an unreadable lock file once it is old enough", async () => {
		await fs.writeFile(lockPath, "garbage");
		const old = new Date(Date.now() - LOCK_WRITE_GRACE_MS - 60_000);
		await fs.utimes(lockPath, old, old);

		const lock = await RunLock.acquire(lockPath);

		expect((await readOwner(lockPath))?.pid).toBe(process.pid);
		await lock.release();
	});

	it("releases idempotently", async () => {
		const lock = await RunLock.acquire(lockPath);

		await lock.release();
		await lock.release();
	});
});
