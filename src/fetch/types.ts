/**
 * Collaborator that knows how to reach a record's artifact (its document
 * dossier). The core only decides whether to fetch; this side does the fetching.
 */
export interface ArtifactFetcher {
	/** Size in bytes of the artifact, without transferring it. */
	probeSize(id: string): Promise<number>;
	/**
	 * Transfer the artifact; resolves to where it was stored. A transfer
	 * that grows past `maxBytes` rejects with ArtifactTooLargeError.
	 */
	materialize(id: string, maxBytes?: number): Promise<string>;
}

export type ProbeResult =
	| { ok: true; sizeBytes: number }
	| { ok: false; error: Error };
