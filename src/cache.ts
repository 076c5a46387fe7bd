import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve, sep } from "node:path";
import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";

/** Storage the scraper reads before a request and writes after it */
export interface BlobStore {
	read(key: string): Promise<Buffer | undefined>;
	write(key: string, bytes: Buffer): Promise<void>;
}

export class FileBlobStore implements BlobStore {
	readonly rootDir: string;

	constructor(rootDir: string) {
		this.rootDir = resolve(rootDir);
	}

	private pathFor(key: string): string {
		if (isAbsolute(key) || key.split(/[\\/]/).includes("..")) {
			throw new ConfigurationError(`Cache key escapes the cache root: ${key}`);
		}
		return join(this.rootDir, ...key.split("/"));
	}

	async read(key: string): Promise<Buffer | undefined> {
		const path = this.pathFor(key);
		if (!existsSync(path)) return undefined;
		return readFile(path);
	}

	async write(key: string, bytes: Buffer): Promise<void> {
		const path = this.pathFor(key);
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, bytes);
		logger.debug(`Wrote ${key} to ${this.rootDir}${sep}`);
	}
}

export class MemoryBlobStore implements BlobStore {
	private readonly blobs = new Map<string, Buffer>();

	async read(key: string): Promise<Buffer | undefined> {
		return this.blobs.get(key);
	}

	async write(key: string, bytes: Buffer): Promise<void> {
		this.blobs.set(key, bytes);
	}

	get keys(): string[] {
		return [...this.blobs.keys()];
	}
}

/**
 * Returns the JSON stored under `key`, or runs `produce` and stores its result.
 * An entry that fails to parse is treated as missing.
 */
export async function cachedJson<T>(
	store: BlobStore,
	key: string,
	produce: () => Promise<T>,
	options: { renew?: boolean } = {}
): Promise<T> {
	if (!options.renew) {
		const raw = await store.read(key);
		if (raw !== undefined) {
			try {
				return JSON.parse(raw.toString("utf-8")) as T;
			} catch {
				logger.warn(`Failed to read cache entry ${key}, fetching fresh.`);
			}
		}
	}
	const value = await produce();
	await store.write(key, Buffer.from(JSON.stringify(value), "utf-8"));
	return value;
}

export function defaultCacheDir(): string {
	return join(process.cwd(), ".ghps-cache");
}
