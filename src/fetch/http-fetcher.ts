import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios from "axios";
import { ArtifactTooLargeError, FetchError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { ArtifactFetcher } from "./types.js";

const log = createChildLogger("http-fetcher");

/** The slice of HTTP the fetcher needs. */
export interface ArtifactHttpClient {
	head(url: string): Promise<{ headers: unknown }>;
	getStream(url: string): Promise<unknown>;
}

export interface HttpArtifactFetcherOptions {
	/** URL with an `{id}` placeholder, e.g. https://registry.example/cases/{id}/dossier.pdf */
	urlTemplate: string;
	/** Where an artifact for `id` is written */
	targetFile: (id: string) => string;
	timeoutMs?: number;
	http?: ArtifactHttpClient;
}

export function createAxiosClient(timeoutMs: number): ArtifactHttpClient {
	const instance = axios.create({ timeout: timeoutMs });
	return {
		head: (url) => instance.head(url),
		getStream: async (url) => (await instance.get(url, { responseType: "stream" })).data,
	};
}

export function artifactUrl(template: string, id: string): string {
	return template.replaceAll("{id}", encodeURIComponent(id));
}

/**
 * Fetches case dossiers over HTTP. The size comes from a HEAD request's
 * content-length; the body is streamed to a temp file, cut off once it
 * passes the size limit, and renamed into place only when complete.
 */
export class HttpArtifactFetcher implements ArtifactFetcher {
	private readonly http: ArtifactHttpClient;

	constructor(private readonly options: HttpArtifactFetcherOptions) {
		this.http = options.http ?? createAxiosClient(options.timeoutMs ?? 60_000);
	}

	async probeSize(id: string): Promise<number> {
		const url = artifactUrl(this.options.urlTemplate, id);
		const { headers } = await this.http.head(url);
		const size = contentLength(headers);
		if (size === null) {
			throw new FetchError(`No usable content-length for ${url}`, id);
		}
		return size;
	}

	async materialize(id: string, maxBytes?: number): Promise<string> {
		const url = artifactUrl(this.options.urlTemplate, id);
		const target = this.options.targetFile(id);
		const temp = `${target}.part`;

		await fs.mkdir(path.dirname(target), { recursive: true });
		const body = await this.http.getStream(url);
		if (!(body instanceof Readable)) {
			discard(body);
			throw new FetchError(`Response body for ${url} is not a stream`, id);
		}

		try {
			if (maxBytes === undefined) {
				await pipeline(body, createWriteStream(temp));
			} else {
				await pipeline(body, byteLimit(id, maxBytes), createWriteStream(temp));
			}
			await fs.rename(temp, target);
		} catch (err) {
			await fs.rm(temp, { force: true });
			throw err;
		}

		log.debug({ id, target }, "Artifact written");
		return target;
	}
}

function contentLength(headers: unknown): number | null {
	if (typeof headers !== "object" || headers === null || !("content-length" in headers)) {
		return null;
	}
	const raw = headers["content-length"];
	if (typeof raw !== "string" && typeof raw !== "number") return null;
	const size = Number(raw);
	return Number.isInteger(size) && size >= 0 ? size : null;
}

function byteLimit(id: string, maxBytes: number): Transform {
	let received = 0;
	return new Transform({
		transform(chunk: Buffer, _encoding, callback) {
			received += chunk.length;
			if (received > maxBytes) {
				callback(new ArtifactTooLargeError(id, maxBytes, received));
				return;
			}
			callback(null, chunk);
		},
	});
}

/** Close whatever the client handed back so the connection is not left open. */
function discard(body: unknown): void {
	if (typeof body === "object" && body !== null && "destroy" in body && typeof body.destroy === "function") {
		body.destroy();
	}
}
