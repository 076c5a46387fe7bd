import type { ScraperError } from "./errors.js";

/** GitHub keeps separate quotas for search endpoints and everything else */
export type RateClass = "core" | "search";

export const RATE_CLASSES: readonly RateClass[] = ["core", "search"];

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean;

export interface ApiRequest {
	readonly method: HttpMethod;
	/** Path relative to the API root, e.g. `repos/octocat/hello-world/pulls` */
	readonly endpoint: string;
	readonly params?: Readonly<Record<string, QueryValue>>;
	readonly body?: unknown;
	/** Overrides the default `application/vnd.github+json` Accept header */
	readonly accept?: string;
}

/** A response whose body has been read in full while the call's timeout still applied */
export interface ApiResponse {
	readonly status: number;
	readonly ok: boolean;
	readonly headers: Headers;
	readonly text: string;
}

/** URL of the next page, taken from the `Link: <…>; rel="next"` header. `null` ends pagination. */
export type PageCursor = string | null;

export interface RateLimitSnapshot {
	limit: number | null;
	remaining: number | null;
	/** Epoch milliseconds at which the quota window resets */
	resetAt: number | null;
}

export interface CredentialRateLimits {
	label: string;
	core: RateLimitSnapshot;
	search: RateLimitSnapshot;
}

export type DispatchOutcome =
	| { status: "success"; body: unknown; pages: number }
	| { status: "soft-empty"; httpStatus: number }
	| { status: "fatal"; error: ScraperError; partial: unknown[] };

export interface ExecuteOptions {
	paginate?: boolean;
	/** Cancels every wait and in-flight call belonging to this execution */
	signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Diff statistics
// ---------------------------------------------------------------------------

export interface DiffHunk {
	addStart: number;
	addLen: number;
	delStart: number;
	delLen: number;
	addedLines: string[];
	removedLines: string[];
}

/** `[start, length]` of one hunk side */
export type LineRange = [start: number, length: number];

export interface FileDiffStats {
	readonly fileName: string;
	readonly addedLoc: number;
	readonly deletedLoc: number;
	readonly addedLocations: readonly LineRange[];
	readonly deletedLocations: readonly LineRange[];
	readonly addedCode: string;
	readonly deletedCode: string;
}

// ---------------------------------------------------------------------------
// Reshaped GitHub records
// ---------------------------------------------------------------------------

export interface IssueRecord {
	number: number;
	title: string;
	author: string;
	closed: boolean;
	createdAt: string;
	updatedAt: string;
	closedAt: string | null;
}

export interface CommitRecord {
	sha: string;
	/** GitHub login; null for commits authored outside GitHub */
	author: string | null;
	authorName: string | null;
	authorEmail: string | null;
	authoredDate: string | null;
	/** Commit message with newlines replaced by commas */
	message: string;
	committedDate: string | null;
	parents: string[];
	verified: boolean | null;
}

export interface PullRecord {
	number: number;
	title: string;
	body: string | null;
	labels: string[];
	author: string;
	createdAt: string;
	updatedAt: string;
	closedAt: string | null;
	mergedAt: string | null;
	head: string | null;
	headBranch: string | null;
	base: string | null;
	baseBranch: string | null;
}

export interface CommentRecord {
	id: number;
	author: string | null;
	body: string;
	createdAt: string;
}

export interface ChangedFile {
	filename: string;
	status: string;
	additions: number;
	deletions: number;
	changes: number;
	patch?: string;
}
