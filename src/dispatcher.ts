import type { Credential } from "./credential.js";
import { rateClassOf } from "./credential.js";
import type { CredentialPool } from "./credential-pool.js";
import {
	DispatchCancelledError,
	FatalNetworkError,
	HttpStatusError,
	ScraperError,
	isTransportError
} from "./errors.js";
import { logger } from "./logger.js";
import { pageItems, parseNextLink } from "./pagination.js";
import {
	formatWait,
	randomInt,
	type Scheduler,
	systemScheduler
} from "./scheduler.js";
import type {
	ApiRequest,
	ApiResponse,
	CredentialRateLimits,
	DispatchOutcome,
	ExecuteOptions,
	RateClass
} from "./types.js";

export const GH_REST = "https://api.github.com";

/** Statuses meaning "absent or unavailable" rather than failure */
const SOFT_EMPTY_STATUSES = new Set([404, 409, 410, 451]);

/** Upper bounds, in seconds, of the uniform backoff jitter (lower bound is 1s) */
const EXHAUSTED_JITTER_MAX = 60;
const SERVER_ERROR_JITTER_MAX = 29;
const AUTH_SWEEP_JITTER_MAX = 60;

export interface DispatcherOptions {
	baseUrl?: string;
	/** `per_page` sent with paginated requests */
	perPage?: number;
	scheduler?: Scheduler;
	/** Source of randomness for backoff jitter, `[0, 1)` */
	random?: () => number;
}

export class RequestDispatcher {
	readonly pool: CredentialPool;
	private readonly baseUrl: string;
	private readonly perPage: number;
	private readonly scheduler: Scheduler;
	private readonly random: () => number;

	constructor(pool: CredentialPool, options: DispatcherOptions = {}) {
		this.pool = pool;
		this.baseUrl = (options.baseUrl ?? GH_REST).replace(/\/+$/, "");
		this.perPage = options.perPage ?? 100;
		this.scheduler = options.scheduler ?? systemScheduler;
		this.random = options.random ?? Math.random;
	}

	/**
	 * Drives one logical request, and every page of it when `paginate` is set,
	 * to a terminal outcome. Rate-limit exhaustion and transient failures are
	 * absorbed here. HTTP, network and cancellation failures come back as a
	 * `fatal` outcome carrying the items of every page fetched before it.
	 */
	async execute(
		request: ApiRequest,
		options: ExecuteOptions = {}
	): Promise<DispatchOutcome> {
		const { paginate = false, signal } = options;
		const rateClass = rateClassOf(request.endpoint);
		const items: unknown[] = [];
		const attempted = new Set<Credential>();
		let url = this.buildUrl(request, paginate);
		let pages = 0;
		let transportFailures = 0;
		let serverErrors = 0;
		let authFailures = 0;

		try {
			while (true) {
				if (signal?.aborted) throw new DispatchCancelledError(signal.reason);

				const credential = this.select(rateClass, attempted);
				if (!credential) {
					await this.waitForPool(rateClass, signal);
					continue;
				}

				let res: ApiResponse;
				try {
					res = await credential.send(url, request, { signal });
				} catch (err) {
					if (!isTransportError(err)) throw err;
					transportFailures++;
					logger.warn(
						`${err.message} (${credential.label}, failure ${transportFailures}/${this.pool.size})`
					);
					if (transportFailures > this.pool.size) {
						throw new FatalNetworkError(
							`Network failed ${transportFailures} times for ${request.endpoint}`,
							transportFailures,
							err
						);
					}
					attempted.add(credential);
					continue;
				}

				if (res.ok) {
					transportFailures = 0;
					serverErrors = 0;
					authFailures = 0;
					attempted.clear();

					const body = parseBody(res);
					if (!paginate) return { status: "success", body, pages: 1 };

					const pageBody = pageItems(body);
					pages++;
					items.push(...pageBody);
					const next = parseNextLink(res.headers.get("link"));
					if (pageBody.length === 0 || next === null) {
						return { status: "success", body: items, pages };
					}
					url = next;
					continue;
				}

				const status = res.status;

				if (SOFT_EMPTY_STATUSES.has(status)) {
					logger.debug(`${status} for ${request.endpoint}, treating as empty`);
					if (pages > 0) return { status: "success", body: items, pages };
					return { status: "soft-empty", httpStatus: status };
				}

				if (status === 401) {
					authFailures++;
					logger.warn(
						`401 Bad credentials for ${credential.label}, please remove this token`
					);
					attempted.add(credential);
					if (authFailures >= this.pool.size) {
						// A whole sweep was rejected; back off before the next one
						authFailures = 0;
						attempted.clear();
						const seconds = randomInt(1, AUTH_SWEEP_JITTER_MAX, this.random);
						logger.warn(
							`Every credential was rejected for ${request.endpoint}, retrying in ${seconds}s`
						);
						await this.scheduler.sleep(seconds * 1000, signal);
					}
					continue;
				}

				const retryAfter = parseRetryAfter(res.headers.get("retry-after"));
				if (status === 403 && isQuotaExhausted(res.headers, retryAfter)) {
					credential.tracker(rateClass).markExhausted();
					const seconds = randomInt(1, EXHAUSTED_JITTER_MAX, this.random);
					logger.info(
						`Quota exhausted on ${credential.label}, retrying in ${seconds}s`
					);
					await this.scheduler.sleep(seconds * 1000, signal);
					continue;
				}

				if ((status === 403 || status === 429) && retryAfter !== null) {
					logger.info(`Secondary rate limit hit. Waiting ${retryAfter}s...`);
					await this.scheduler.sleep(retryAfter * 1000, signal);
					continue;
				}

				if (status >= 500) {
					serverErrors++;
					if (serverErrors > this.pool.size) {
						throw new FatalNetworkError(
							`Server kept failing (${status}) for ${request.endpoint}`,
							serverErrors
						);
					}
					const seconds = randomInt(1, SERVER_ERROR_JITTER_MAX, this.random);
					logger.warn(`${status} from ${request.endpoint}, retrying in ${seconds}s`);
					attempted.add(credential);
					await this.scheduler.sleep(seconds * 1000, signal);
					continue;
				}

				throw new HttpStatusError(status, request.endpoint, res.text);
			}
		} catch (err) {
			const error =
				err instanceof ScraperError
					? err
					: new ScraperError(`Request to ${request.endpoint} failed`, {
							cause: err
						});
			if (!(error instanceof DispatchCancelledError)) {
				logger.warn(error.message);
			}
			return { status: "fatal", error, partial: items };
		}
	}

	/** Like `execute`, but returns the body directly and throws on fatal outcomes */
	async request(
		request: ApiRequest,
		options: ExecuteOptions = {}
	): Promise<unknown> {
		const outcome = await this.execute(request, options);
		switch (outcome.status) {
			case "success":
				return outcome.body;
			case "soft-empty":
				return options.paginate ? [] : null;
			case "fatal":
				throw outcome.error;
		}
	}

	/** Learns the search quota of every credential, which core responses never report */
	async refreshLimits(signal?: AbortSignal): Promise<void> {
		for (const credential of this.pool.credentials) {
			try {
				await credential.refreshLimits(this.baseUrl, { signal });
			} catch (err) {
				if (err instanceof DispatchCancelledError) throw err;
				logger.warn(
					`Could not refresh limits for ${credential.label}: ${String(err)}`
				);
			}
		}
	}

	rateLimits(): CredentialRateLimits[] {
		return this.pool.credentials.map((credential) => ({
			label: credential.label,
			...credential.rateLimits()
		}));
	}

	private select(
		rateClass: RateClass,
		attempted: Set<Credential>
	): Credential | null {
		const now = this.scheduler.now();
		const credential = this.pool.pickReady(rateClass, now, attempted);
		if (credential || attempted.size === 0) return credential;
		// Every ready credential failed this sweep; start the next one
		attempted.clear();
		return this.pool.pickReady(rateClass, now);
	}

	private async waitForPool(
		rateClass: RateClass,
		signal?: AbortSignal
	): Promise<void> {
		const now = this.scheduler.now();
		const resumeAt = this.pool.earliestReadyAt(rateClass, now) + 1000;
		const waitMs = Math.max(resumeAt - now, 0);
		logger.info(`Out of keys, resuming in ${formatWait(waitMs)}`);
		await this.scheduler.sleep(waitMs, signal);
		logger.info(".. resumed");
	}

	private buildUrl(request: ApiRequest, paginate: boolean): string {
		const url = new URL(
			`${this.baseUrl}/${request.endpoint.replace(/^\/+/, "")}`
		);
		for (const [key, value] of Object.entries(request.params ?? {})) {
			url.searchParams.set(key, String(value));
		}
		if (paginate) {
			if (!url.searchParams.has("page")) url.searchParams.set("page", "1");
			if (!url.searchParams.has("per_page")) {
				url.searchParams.set("per_page", String(this.perPage));
			}
		}
		return url.toString();
	}
}

function parseBody(res: ApiResponse): unknown {
	if (res.text.length === 0) return null;
	const contentType = res.headers.get("content-type") ?? "";
	return contentType.includes("json") ? JSON.parse(res.text) : res.text;
}

/**
 * A 403 means spent quota when the response says so, or when it carries
 * neither a quota header nor a `retry-after` to go by.
 */
function isQuotaExhausted(headers: Headers, retryAfter: number | null): boolean {
	const remaining = headers.get("x-ratelimit-remaining");
	if (remaining === null) return retryAfter === null;
	return parseInt(remaining, 10) === 0;
}

function parseRetryAfter(value: string | null): number | null {
	if (value === null) return null;
	const seconds = parseInt(value, 10);
	return Number.isNaN(seconds) ? null : seconds;
}
