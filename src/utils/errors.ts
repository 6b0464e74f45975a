export class CaseWatchError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly cause?: unknown,
	) {
		super(message);
		this.name = "CaseWatchError";
	}
}

export class ConfigError extends CaseWatchError {
	constructor(message: string, cause?: unknown) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

export class StorageError extends CaseWatchError {
	constructor(message: string, cause?: unknown) {
		super(message, "STORAGE_ERROR", cause);
		this.name = "StorageError";
	}
}

/** Another run holds the history store. */
export class LockError extends CaseWatchError {
	constructor(message: string, cause?: unknown) {
		super(message, "LOCK_ERROR", cause);
		this.name = "LockError";
	}
}

export class SnapshotError extends CaseWatchError {
	constructor(message: string, cause?: unknown) {
		super(message, "SNAPSHOT_ERROR", cause);
		this.name = "SnapshotError";
	}
}

/** Per-record artifact failure; recorded on the record, never fatal to a run. */
export class FetchError extends CaseWatchError {
	constructor(
		message: string,
		public readonly recordId: string,
		cause?: unknown,
	) {
		super(message, "FETCH_ERROR", cause);
		this.name = "FetchError";
	}
}

/** The transferred body outgrew the size limit its probe passed. */
export class ArtifactTooLargeError extends FetchError {
	constructor(
		recordId: string,
		public readonly limitBytes: number,
		public readonly receivedBytes: number,
	) {
		super(`Artifact for ${recordId} exceeded ${limitBytes} bytes during transfer`, recordId);
		this.name = "ArtifactTooLargeError";
	}
}

export class RunCancelledError extends CaseWatchError {
	constructor(message = "Run cancelled", cause?: unknown) {
		super(message, "RUN_CANCELLED", cause);
		this.name = "RunCancelledError";
	}
}

/**
 * A run stopped before its history was persisted. The durable store is
 * exactly as it was when the run started, so the run can simply be retried.
 */
export class RunAbortedError extends CaseWatchError {
	constructor(
		message: string,
		public readonly phase: string,
		cause?: unknown,
	) {
		super(message, "RUN_ABORTED", cause);
		this.name = "RunAbortedError";
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
