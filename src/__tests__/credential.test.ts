import { describe, expect, it } from "vitest";
import { Credential, rateClassOf } from "../credential.js";
import {
	ConnectionError,
	DispatchCancelledError,
	RequestTimeoutError
} from "../errors.js";
import type { ApiRequest } from "../types.js";
import { fakeFetch, json, stalledBody } from "./helpers.js";

const pulls: ApiRequest = { method: "GET", endpoint: "repos/o/r/pulls" };

const limitHeaders = {
	"x-ratelimit-remaining": "4999",
	"x-ratelimit-reset": "1700000000",
	"x-ratelimit-limit": "5000"
};

describe("rateClassOf", () => {
	it("puts search endpoints in the search class", () => {
		expect(rateClassOf("search/issues")).toBe("search");
		expect(rateClassOf("/search/repositories")).toBe("search");
	});

	it("puts everything else in the core class", () => {
		expect(rateClassOf("repos/o/r/pulls")).toBe("core");
		expect(rateClassOf("users/searcher")).toBe("core");
	});
});

describe("Credential", () => {
	it("masks its secret in labels", () => {
		expect(new Credential("test-secret-0001").label).toBe("test…0001");
		expect(new Credential("short").label).toBe("****");
	});

	it("sends the token and records quota against the request's class", async () => {
		const { fetch, calls } = fakeFetch(() => json([], { headers: limitHeaders }));
		const credential = new Credential("test-secret", { fetch });

		const res = await credential.send("https://api.github.com/repos/o/r/pulls", pulls);

		expect(res.status).toBe(200);
		expect(res.text).toBe("[]");
		expect(calls[0].token).toBe("token test-secret");
		expect(calls[0].accept).toBe("application/vnd.github+json");
		expect(credential.rateLimits()).toEqual({
			core: { limit: 5000, remaining: 4999, resetAt: 1_700_000_000_000 },
			search: { limit: null, remaining: null, resetAt: null }
		});
	});

	it("records search quota on the search tracker only", async () => {
		const { fetch } = fakeFetch(() =>
			json({ items: [] }, {
				headers: { ...limitHeaders, "x-ratelimit-remaining": "0", "x-ratelimit-limit": "30" }
			})
		);
		const credential = new Credential("test-secret", { fetch });

		await credential.send("https://api.github.com/search/issues", {
			method: "GET",
			endpoint: "search/issues"
		});

		expect(credential.isReady("search", 0)).toBe(false);
		expect(credential.isReady("core", 0)).toBe(true);
	});

	it("passes a custom Accept header through", async () => {
		const { fetch, calls } = fakeFetch(() => new Response("diff text"));
		const credential = new Credential("test-secret", { fetch });
		await credential.send("https://api.github.com/repos/o/r/pulls/1", {
			...pulls,
			accept: "application/vnd.github.v3.diff"
		});
		expect(calls[0].accept).toBe("application/vnd.github.v3.diff");
	});

	it("turns a hung call into RequestTimeoutError", async () => {
		const credential = new Credential("test-secret", {
			timeoutMs: 5,
			fetch: (_input, init) =>
				new Promise<Response>((_resolve, reject) => {
					init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
				})
		});
		await expect(credential.send("https://api.github.com/x", pulls)).rejects.toBeInstanceOf(
			RequestTimeoutError
		);
	});

	it("applies the timeout to a body that stalls after the headers", async () => {
		const { fetch } = fakeFetch(() => stalledBody());
		const credential = new Credential("test-secret", { timeoutMs: 5, fetch });
		await expect(credential.send("https://api.github.com/x", pulls)).rejects.toBeInstanceOf(
			RequestTimeoutError
		);
	});

	it("turns a network failure into ConnectionError", async () => {
		const credential = new Credential("test-secret", {
			fetch: async () => {
				throw new TypeError("fetch failed");
			}
		});
		await expect(credential.send("https://api.github.com/x", pulls)).rejects.toBeInstanceOf(
			ConnectionError
		);
	});

	it("does not call out when the signal is already aborted", async () => {
		const { fetch, calls } = fakeFetch(() => json([]));
		const credential = new Credential("test-secret", { fetch });
		const controller = new AbortController();
		controller.abort();

		await expect(
			credential.send("https://api.github.com/x", pulls, { signal: controller.signal })
		).rejects.toBeInstanceOf(DispatchCancelledError);
		expect(calls).toHaveLength(0);
	});

	it("refreshLimits loads the search quota from rate_limit", async () => {
		const { fetch, calls } = fakeFetch(() =>
			json(
				{ resources: { search: { limit: 30, remaining: 12, reset: 1_700_000_100 } } },
				{ headers: limitHeaders }
			)
		);
		const credential = new Credential("test-secret", { fetch });

		await credential.refreshLimits("https://api.github.com");

		expect(calls[0].url).toBe("https://api.github.com/rate_limit");
		expect(credential.rateLimits().search).toEqual({
			limit: 30,
			remaining: 12,
			resetAt: 1_700_000_100_000
		});
		expect(credential.rateLimits().core.remaining).toBe(4999);
	});
});
