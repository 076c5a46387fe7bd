import type { RateLimitSnapshot } from "./types.js";

/**
 * Last observed quota for one credential and one rate class.
 *
 * Nothing here polls GitHub: state is only learnt from the headers of
 * responses actually received, so it may briefly lag the real quota.
 */
export class RateLimitTracker {
	private remaining: number | null = null;
	private resetAt: number | null = null;
	private limit: number | null = null;

	update(
		remaining: number | null,
		resetAt: number | null,
		limit: number | null
	): void {
		this.remaining = remaining;
		this.resetAt = resetAt;
		this.limit = limit;
	}

	/** Returns false when the headers did not carry both remaining and reset */
	updateFromHeaders(headers: Headers): boolean {
		const remaining = parseHeaderInt(headers.get("x-ratelimit-remaining"));
		const reset = parseHeaderInt(headers.get("x-ratelimit-reset"));
		if (remaining === null || reset === null) return false;
		this.update(
			remaining,
			reset * 1000,
			parseHeaderInt(headers.get("x-ratelimit-limit"))
		);
		return true;
	}

	markExhausted(): void {
		this.remaining = 0;
	}

	isReady(now: number): boolean {
		if (this.remaining === null || this.remaining > 0) return true;
		return this.resetAt === null || now >= this.resetAt;
	}

	readyAt(now: number): number {
		if (this.remaining === 0 && this.resetAt !== null) return this.resetAt;
		return now;
	}

	snapshot(): RateLimitSnapshot {
		return {
			limit: this.limit,
			remaining: this.remaining,
			resetAt: this.resetAt
		};
	}
}

function parseHeaderInt(value: string | null): number | null {
	if (value === null) return null;
	const n = parseInt(value, 10);
	return Number.isNaN(n) ? null : n;
}
