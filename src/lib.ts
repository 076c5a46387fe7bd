/**
 * Programmatic API for gh-pool-scraper.
 *
 * @example
 * ```ts
 * import { createScraper } from "gh-pool-scraper";
 *
 * const { dispatcher, api } = createScraper({
 *   tokens: ["<token-a>", "<token-b>"],
 * });
 *
 * const outcome = await dispatcher.execute(
 *   { method: "GET", endpoint: "repos/octocat/hello-world/pulls" },
 *   { paginate: true, signal: AbortSignal.timeout(60_000) }
 * );
 * if (outcome.status === "success") console.log(outcome.body);
 *
 * const stats = await api.pullRequestDiffStats("octocat/hello-world", 42);
 * ```
 */
import { type BlobStore, FileBlobStore } from "./cache.js";
import { type ConfigInput, loadConfig } from "./config.js";
import type { FetchLike } from "./credential.js";
import { CredentialPool } from "./credential-pool.js";
import { RequestDispatcher } from "./dispatcher.js";
import { GitHubApi } from "./github-api.js";
import { setLogLevel } from "./logger.js";
import type { Scheduler } from "./scheduler.js";

export type * from "./types.js";
export type { ScraperConfig, ConfigInput } from "./config.js";
export type { DispatcherOptions } from "./dispatcher.js";
export type { DiffParseOptions, HunkHeader } from "./diff-parser.js";
export type { CredentialOptions, FetchLike } from "./credential.js";
export type { Scheduler } from "./scheduler.js";

export type { BlobStore } from "./cache.js";
export { FileBlobStore, MemoryBlobStore, cachedJson } from "./cache.js";
export { loadConfig, readTokensFile } from "./config.js";
export { Credential, rateClassOf } from "./credential.js";
export { CredentialPool } from "./credential-pool.js";
export {
	MAX_HUNK_CHARS,
	parseDiff,
	parseFiles,
	parseHunkHeader,
	parseHunks,
	parseRange,
	statsFromHunks
} from "./diff-parser.js";
export { GH_REST, RequestDispatcher } from "./dispatcher.js";
export * from "./errors.js";
export { isNonCodeFile } from "./file-classifier.js";
export { GitHubApi, parseCommit } from "./github-api.js";
export { RateLimitTracker } from "./rate-limit-tracker.js";
export { systemScheduler } from "./scheduler.js";

export interface CreateScraperOptions extends ConfigInput {
	/** Cache backend; defaults to a `FileBlobStore` rooted at the configured cache dir */
	store?: BlobStore;
	fetch?: FetchLike;
	scheduler?: Scheduler;
}

export interface Scraper {
	dispatcher: RequestDispatcher;
	api: GitHubApi;
	store: BlobStore;
}

/**
 * Builds a dispatcher over a fresh credential pool plus the record-level API.
 * Throws `ConfigurationError` when no token can be found.
 */
export function createScraper(options: CreateScraperOptions = {}): Scraper {
	const config = loadConfig(options);
	setLogLevel(config.logLevel);

	const pool = CredentialPool.fromSecrets(config.tokens, {
		timeoutMs: config.timeoutMs,
		fetch: options.fetch
	});
	const dispatcher = new RequestDispatcher(pool, {
		baseUrl: config.baseUrl,
		perPage: config.perPage,
		scheduler: options.scheduler
	});
	const store = options.store ?? new FileBlobStore(config.cacheDir);

	return { dispatcher, api: new GitHubApi(dispatcher, store), store };
}
