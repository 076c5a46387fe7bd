import { type BlobStore, cachedJson } from "./cache.js";
import { parseDiff } from "./diff-parser.js";
import type { RequestDispatcher } from "./dispatcher.js";
import { isNonCodeFile } from "./file-classifier.js";
import { logger } from "./logger.js";
import type {
	ApiRequest,
	ChangedFile,
	CommentRecord,
	CommitRecord,
	FileDiffStats,
	IssueRecord,
	PullRecord
} from "./types.js";

/** Files with more changed lines than this are left out of PR diff statistics */
const MAX_FILE_CHANGES = 5000;
/** A PR touching more code files than this is treated as too big to analyse */
const MAX_CODE_FILES = 500;

type ApiUser = { login: string } | null;

interface ApiGitActor {
	name?: string;
	email?: string;
	date?: string;
}

interface ApiCommit {
	sha: string;
	author: ApiUser;
	commit: {
		message: string;
		author: ApiGitActor | null;
		committer: { date?: string } | null;
	};
	parents: Array<{ sha: string }>;
	verification?: { verified?: boolean };
}

interface ApiBranchRef {
	label?: string;
	repo: { full_name: string } | null;
}

export interface CacheOptions {
	/** Ignore any cached copy and fetch again */
	renew?: boolean;
}

function get(endpoint: string, params?: ApiRequest["params"]): ApiRequest {
	return { method: "GET", endpoint, params };
}

function asArray<T>(body: unknown): T[] {
	return Array.isArray(body) ? body : [];
}

export function parseCommit(commit: ApiCommit): CommitRecord {
	const author: ApiGitActor = commit.commit.author ?? {};
	return {
		sha: commit.sha,
		author: commit.author?.login ?? null,
		authorName: author.name ?? null,
		authorEmail: author.email ?? null,
		authoredDate: author.date ?? null,
		message: commit.commit.message.replace(/\n/g, ","),
		committedDate: commit.commit.committer?.date ?? null,
		parents: commit.parents.map((p) => p.sha),
		verified: commit.verification?.verified ?? null
	};
}

/**
 * Reshapes GitHub responses into flat records. Every call goes through the
 * shared dispatcher; diff statistics are additionally kept in the blob store.
 */
export class GitHubApi {
	private readonly dispatcher: RequestDispatcher;
	private readonly store: BlobStore;

	constructor(dispatcher: RequestDispatcher, store: BlobStore) {
		this.dispatcher = dispatcher;
		this.store = store;
	}

	private async list<T>(
		endpoint: string,
		params?: ApiRequest["params"]
	): Promise<T[]> {
		const body = await this.dispatcher.request(get(endpoint, params), {
			paginate: true
		});
		return asArray<T>(body);
	}

	// ---------------------------------------------------------------------------
	// Issues, commits, pull requests
	// ---------------------------------------------------------------------------

	async repoIssues(repo: string): Promise<IssueRecord[]> {
		const issues = await this.list<{
			number: number;
			title: string;
			state: string;
			user: { login: string };
			created_at: string;
			updated_at: string;
			closed_at: string | null;
			pull_request?: unknown;
		}>(`repos/${repo}/issues`, { state: "all" });

		return issues
			.filter((issue) => issue.pull_request === undefined)
			.map((issue) => ({
				number: issue.number,
				title: issue.title,
				author: issue.user.login,
				closed: issue.state !== "open",
				createdAt: issue.created_at,
				updatedAt: issue.updated_at,
				closedAt: issue.closed_at
			}));
	}

	async repoCommits(repo: string): Promise<CommitRecord[]> {
		const commits = await this.list<ApiCommit>(`repos/${repo}/commits`);
		return commits.map(parseCommit);
	}

	async repoPulls(repo: string): Promise<PullRecord[]> {
		const pulls = await this.list<{
			number: number;
			title: string;
			body: string | null;
			labels?: Array<{ name: string }>;
			user: { login: string };
			created_at: string;
			updated_at: string;
			closed_at: string | null;
			merged_at: string | null;
			head: ApiBranchRef;
			base: ApiBranchRef;
		}>(`repos/${repo}/pulls`, { state: "all" });

		return pulls.map((pr) => ({
			number: pr.number,
			title: pr.title,
			body: pr.body,
			labels: (pr.labels ?? []).map((l) => l.name),
			author: pr.user.login,
			createdAt: pr.created_at,
			updatedAt: pr.updated_at,
			closedAt: pr.closed_at,
			mergedAt: pr.merged_at,
			head: pr.head.repo?.full_name ?? null,
			headBranch: pr.head.label ?? null,
			base: pr.base.repo?.full_name ?? null,
			baseBranch: pr.base.label ?? null
		}));
	}

	async pullRequestCommits(repo: string, number: number): Promise<CommitRecord[]> {
		const commits = await this.list<ApiCommit>(
			`repos/${repo}/pulls/${number}/commits`
		);
		return commits.map(parseCommit);
	}

	/** General comments only; review comments attached to code are a separate endpoint */
	async issueComments(repo: string, number: number): Promise<CommentRecord[]> {
		const comments = await this.list<{
			id: number;
			user: ApiUser;
			body: string;
			created_at: string;
		}>(`repos/${repo}/issues/${number}/comments`);

		return comments.map((c) => ({
			id: c.id,
			author: c.user?.login ?? null,
			body: c.body,
			createdAt: c.created_at
		}));
	}

	// ---------------------------------------------------------------------------
	// Changed files and diff statistics
	// ---------------------------------------------------------------------------

	async pullRequestFiles(repo: string, number: number): Promise<ChangedFile[]> {
		const files = await this.list<ChangedFile>(
			`repos/${repo}/pulls/${number}/files`
		);
		return files.map(toChangedFile);
	}

	async commitChangedFiles(repo: string, sha: string): Promise<ChangedFile[]> {
		const body = (await this.dispatcher.request(
			get(`repos/${repo}/commits/${sha}`)
		)) as { files?: ChangedFile[] } | null;
		return (body?.files ?? []).map(toChangedFile);
	}

	async pullRequestDiffStats(
		repo: string,
		number: number,
		options: CacheOptions = {}
	): Promise<FileDiffStats[]> {
		return cachedJson(
			this.store,
			`pr_data/${repo}/${number}/raw_diff.json`,
			async () => {
				const files = await this.pullRequestFiles(repo, number);
				return files
					.filter((f) => f.changes <= MAX_FILE_CHANGES && f.patch !== undefined)
					.map((f) => parseDiff(f.filename, f.patch ?? ""));
			},
			options
		);
	}

	/** Diff statistics restricted to code files; empty when the PR is too big to be meaningful */
	async pullRequestCodeStats(
		repo: string,
		number: number,
		options: CacheOptions = {}
	): Promise<FileDiffStats[]> {
		const stats = await this.pullRequestDiffStats(repo, number, options);
		const code = stats.filter((f) => !isNonCodeFile(f.fileName));
		if (code.length > MAX_CODE_FILES) {
			logger.warn(
				`${repo}#${number} changes ${code.length} code files, skipping as too big`
			);
			return [];
		}
		return code;
	}

	async commitDiffStats(
		repo: string,
		sha: string,
		options: CacheOptions = {}
	): Promise<FileDiffStats[]> {
		return cachedJson(
			this.store,
			`pr_data/${repo}/commits/${sha}.json`,
			async () => {
				const files = await this.commitChangedFiles(repo, sha);
				return files
					.filter((f) => f.patch !== undefined)
					.map((f) => parseDiff(f.filename, f.patch ?? ""));
			},
			options
		);
	}

	// ---------------------------------------------------------------------------
	// Repositories and users
	// ---------------------------------------------------------------------------

	/** ISO timestamp of the last push, or "" for a deleted repository */
	async repoLastPushDate(repo: string): Promise<string> {
		const body = (await this.dispatcher.request(get(`repos/${repo}`))) as {
			pushed_at?: string;
		} | null;
		if (!body) {
			logger.info(`${repo} deleted`);
			return "";
		}
		return body.pushed_at ?? "";
	}

	async userEmail(login: string): Promise<string> {
		const body = (await this.dispatcher.request(get(`users/${login}`))) as {
			email?: string | null;
		} | null;
		if (!body) {
			logger.info(`${login} deleted`);
			return "";
		}
		return body.email ?? "";
	}

	/** Uses the search quota, tracked separately from the core quota */
	async searchRepositories(
		language: string,
		createdFrom: string,
		createdTo: string
	): Promise<Array<{ fullName: string; stars: number }>> {
		const repos = await this.list<{
			full_name: string;
			stargazers_count: number;
		}>("search/repositories", {
			q: `language:"${language}" created:${createdFrom}..${createdTo}`
		});
		return repos.map((r) => ({ fullName: r.full_name, stars: r.stargazers_count }));
	}
}

function toChangedFile(f: ChangedFile): ChangedFile {
	return {
		filename: f.filename,
		status: f.status,
		additions: f.additions,
		deletions: f.deletions,
		changes: f.changes,
		...(f.patch !== undefined ? { patch: f.patch } : {})
	};
}
