import {
	ConnectionError,
	DispatchCancelledError,
	HttpStatusError,
	RequestTimeoutError
} from "./errors.js";
import { RateLimitTracker } from "./rate-limit-tracker.js";
import type {
	ApiRequest,
	ApiResponse,
	RateClass,
	RateLimitSnapshot
} from "./types.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface CredentialOptions {
	/** Per-call timeout in milliseconds */
	timeoutMs?: number;
	fetch?: FetchLike;
	userAgent?: string;
}

export interface SendOptions {
	signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_ACCEPT = "application/vnd.github+json";

export function rateClassOf(endpoint: string): RateClass {
	return endpoint.replace(/^\/+/, "").startsWith("search") ? "search" : "core";
}

/**
 * One personal access token plus the quota GitHub last reported for it.
 * Identity is by object: two credentials holding the same secret are still distinct.
 */
export class Credential {
	readonly secret: string;
	private readonly trackers: Record<RateClass, RateLimitTracker> = {
		core: new RateLimitTracker(),
		search: new RateLimitTracker()
	};
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;
	private readonly userAgent: string;

	constructor(secret: string, options: CredentialOptions = {}) {
		this.secret = secret;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
		this.userAgent = options.userAgent ?? "gh-pool-scraper/1.0";
	}

	/** Masked secret, safe to log */
	get label(): string {
		if (this.secret.length <= 8) return "****";
		return `${this.secret.slice(0, 4)}…${this.secret.slice(-4)}`;
	}

	tracker(rateClass: RateClass): RateLimitTracker {
		return this.trackers[rateClass];
	}

	isReady(rateClass: RateClass, now: number): boolean {
		return this.trackers[rateClass].isReady(now);
	}

	readyAt(rateClass: RateClass, now: number): number {
		return this.trackers[rateClass].readyAt(now);
	}

	private headers(accept?: string): Record<string, string> {
		return {
			Authorization: `token ${this.secret}`,
			"Content-Type": "application/json",
			"User-Agent": this.userAgent,
			Accept: accept ?? DEFAULT_ACCEPT,
			"X-GitHub-Api-Version": "2022-11-28"
		};
	}

	/**
	 * Performs one HTTP call and records the rate-limit headers against the
	 * tracker for the request's class. Status codes are left to the caller.
	 *
	 * The timeout and the caller's signal cover the body as well as the
	 * headers: a server that stalls mid-body still rejects.
	 */
	async send(
		url: string,
		request: ApiRequest,
		options: SendOptions = {}
	): Promise<ApiResponse> {
		const { signal } = options;
		if (signal?.aborted) throw new DispatchCancelledError(signal.reason);

		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);
		const onAbort = () => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		try {
			const res = await this.fetchImpl(url, {
				method: request.method,
				headers: this.headers(request.accept),
				body:
					request.body === undefined ? undefined : JSON.stringify(request.body),
				signal: controller.signal
			});
			this.trackers[rateClassOf(request.endpoint)].updateFromHeaders(
				res.headers
			);
			const text = await readText(res, controller.signal);
			return { status: res.status, ok: res.ok, headers: res.headers, text };
		} catch (err) {
			if (signal?.aborted) throw new DispatchCancelledError(signal.reason);
			if (timedOut) throw new RequestTimeoutError(url, this.timeoutMs);
			throw new ConnectionError(`Request to ${url} failed: ${String(err)}`, {
				cause: err
			});
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		}
	}

	/**
	 * Search quota is never reported on core responses, so ask for it
	 * explicitly. Core limits are updated from this call's own headers.
	 */
	async refreshLimits(baseUrl: string, options: SendOptions = {}): Promise<void> {
		const request: ApiRequest = { method: "GET", endpoint: "rate_limit" };
		const res = await this.send(`${baseUrl}/rate_limit`, request, options);
		if (!res.ok) {
			throw new HttpStatusError(res.status, request.endpoint, res.text);
		}
		const json = JSON.parse(res.text) as {
			resources?: { search?: { limit: number; remaining: number; reset: number } };
		};
		const search = json.resources?.search;
		if (search) {
			this.trackers.search.update(
				search.remaining,
				search.reset * 1000,
				search.limit
			);
		}
	}

	rateLimits(): Record<RateClass, RateLimitSnapshot> {
		return {
			core: this.trackers.core.snapshot(),
			search: this.trackers.search.snapshot()
		};
	}
}

/** Resolves with the whole body, or rejects as soon as `signal` aborts */
function readText(res: Response, signal: AbortSignal): Promise<string> {
	if (signal.aborted) return Promise.reject(signal.reason);
	return new Promise<string>((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		signal.addEventListener("abort", onAbort, { once: true });
		void res.text().then(
			(text) => {
				signal.removeEventListener("abort", onAbort);
				resolve(text);
			},
			(err: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(err);
			}
		);
	});
}
