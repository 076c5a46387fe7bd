#!/usr/bin/env node
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import checkbox from "@inquirer/checkbox";
import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { parseDiff, parseFiles } from "./diff-parser.js";
import { ScraperError } from "./errors.js";
import { createScraper, type CreateScraperOptions } from "./lib.js";
import type { QueryValue, RateLimitSnapshot } from "./types.js";

interface GlobalOptions {
	token?: string[];
	tokensFile?: string;
	cacheDir?: string;
	timeoutMs?: string;
	logLevel?: string;
}

const program = new Command();

program
	.name("ghps")
	.description(
		"Token-pooled GitHub REST client.\n" +
			"Rotates across several tokens, waits out rate limits and retries transient failures.\n" +
			"Also turns unified diffs into per-file line statistics."
	)
	.version("1.0.0")
	.option(
		"-t, --token <pat>",
		"GitHub token; repeat for several (default: GITHUB_TOKENS, comma-separated)",
		collect
	)
	.option("--tokens-file <path>", "File with one token per line")
	.option("--cache-dir <path>", "Directory for cached diff statistics")
	.option("--timeout-ms <ms>", "Per-request network timeout")
	.option("--log-level <level>", "silent | error | warn | info | debug");

// ─── request ─────────────────────────────────────────────────────────────────

program
	.command("request <endpoint>")
	.description("Send one GET through the token pool, e.g. repos/octocat/hello-world/pulls")
	.option("--paginate", "Follow rel=\"next\" links and concatenate every page")
	.option("-p, --param <key=value>", "Query parameter; repeatable", collect)
	.option("--deadline <seconds>", "Give up (keeping fetched pages) after this long")
	.option("-o, --output <path>", "Path to write JSON output (default: stdout)")
	.action(
		async (
			endpoint: string,
			opts: {
				paginate?: boolean;
				param?: string[];
				deadline?: string;
				output?: string;
			}
		) => {
			const { dispatcher } = createScraper(scraperOptions());
			const signal = opts.deadline
				? AbortSignal.timeout(parseInt(opts.deadline, 10) * 1000)
				: undefined;

			const spinner = ora(`GET ${endpoint}…`).start();
			const outcome = await dispatcher.execute(
				{ method: "GET", endpoint, params: parseParams(opts.param ?? []) },
				{ paginate: opts.paginate ?? false, signal }
			);

			switch (outcome.status) {
				case "success":
					spinner.succeed(
						`GET ${endpoint}` +
							(opts.paginate ? chalk.gray(` (${outcome.pages} pages)`) : "")
					);
					writeOutput(outcome.body, opts.output);
					break;
				case "soft-empty":
					spinner.warn(
						`GET ${endpoint} ${chalk.yellow(`→ ${outcome.httpStatus}`)}, nothing there`
					);
					writeOutput(opts.paginate ? [] : null, opts.output);
					break;
				case "fatal":
					spinner.fail(chalk.red(outcome.error.message));
					if (outcome.partial.length > 0) {
						console.error(
							chalk.yellow(`Keeping ${outcome.partial.length} items fetched before the failure`)
						);
						writeOutput(outcome.partial, opts.output);
					}
					process.exitCode = 1;
					break;
			}
		}
	);

// ─── diff ────────────────────────────────────────────────────────────────────

program
	.command("diff <file>")
	.description("Parse a local unified diff or patch into per-file statistics")
	.option("--name <fileName>", "File name to report for a single-file patch")
	.option("-o, --output <path>", "Path to write JSON output (default: stdout)")
	.action((file: string, opts: { name?: string; output?: string }) => {
		const text = readFileSync(resolve(file), "utf-8");
		const stats = /^diff --git /m.test(text)
			? parseFiles(text)
			: [parseDiff(opts.name ?? basename(file), text)];
		writeOutput(stats, opts.output);
	});

// ─── pr-stats ────────────────────────────────────────────────────────────────

program
	.command("pr-stats <repo> [numbers...]")
	.description("Diff statistics for pull requests of owner/repo (default: every PR)")
	.option("--select", "Interactively choose which pull requests to analyse")
	.option("--renew", "Ignore cached statistics and fetch again")
	.option("--code-only", "Leave out documentation, data and asset files")
	.option("-o, --output <path>", "Path to write JSON output (default: stdout)")
	.action(
		async (
			repo: string,
			numbers: string[],
			opts: { select?: boolean; renew?: boolean; codeOnly?: boolean; output?: string }
		) => {
			const { api } = createScraper(scraperOptions());
			let targets = numbers.map((n) => parseInt(n, 10));

			if (targets.length === 0) {
				const spinner = ora(`Listing pull requests of ${repo}…`).start();
				const pulls = await api.repoPulls(repo);
				spinner.succeed(`Found ${chalk.bold(pulls.length)} pull requests`);

				if (opts.select) {
					targets = await checkbox({
						message: `Choose pull requests (${pulls.length} total)`,
						choices: pulls.map((pr) => ({
							name: `#${pr.number} ${pr.title}`,
							value: pr.number,
							checked: true
						})),
						pageSize: 20,
						loop: false
					});
				} else {
					targets = pulls.map((pr) => pr.number);
				}
			}

			if (targets.length === 0) {
				console.error(chalk.red("No pull requests selected — nothing to do."));
				return;
			}

			const result: Record<string, unknown> = {};
			const bar = ora(`Parsing diffs 0 / ${targets.length}…`).start();
			let done = 0;
			for (const number of targets) {
				result[number] = opts.codeOnly
					? await api.pullRequestCodeStats(repo, number, { renew: opts.renew })
					: await api.pullRequestDiffStats(repo, number, { renew: opts.renew });
				done++;
				bar.text = `Parsing diffs ${done} / ${targets.length}…`;
			}
			bar.succeed(`Parsed ${chalk.bold(done)} pull requests of ${repo}`);
			writeOutput({ repo, pulls: result }, opts.output);
		}
	);

// ─── rate-limit ──────────────────────────────────────────────────────────────

program
	.command("rate-limit")
	.description("Show the core and search quota of every configured token")
	.action(async () => {
		const { dispatcher } = createScraper(scraperOptions());
		const spinner = ora("Checking rate limits…").start();
		await dispatcher.refreshLimits();
		spinner.stop();

		console.log(chalk.bold("\nRate limits:"));
		for (const entry of dispatcher.rateLimits()) {
			console.log(
				`  ${entry.label.padEnd(14)} core ${formatQuota(entry.core)}   search ${formatQuota(entry.search)}`
			);
		}
	});

try {
	await program.parseAsync(process.argv);
} catch (err) {
	if (!(err instanceof ScraperError)) throw err;
	console.error(chalk.red(`${err.name}: ${err.message}`));
	process.exitCode = 1;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function collect(value: string, previous: string[] = []): string[] {
	return [...previous, value];
}

function scraperOptions(): CreateScraperOptions {
	const opts = program.opts<GlobalOptions>();
	return {
		tokens: opts.token,
		tokensFile: opts.tokensFile,
		cacheDir: opts.cacheDir,
		timeoutMs: opts.timeoutMs,
		logLevel: opts.logLevel
	};
}

function parseParams(pairs: string[]): Record<string, QueryValue> {
	const params: Record<string, QueryValue> = {};
	for (const pair of pairs) {
		const eq = pair.indexOf("=");
		if (eq <= 0) throw new ScraperError(`Expected key=value, got "${pair}"`);
		params[pair.slice(0, eq)] = pair.slice(eq + 1);
	}
	return params;
}

function writeOutput(value: unknown, output?: string): void {
	const json = JSON.stringify(value, null, 2);
	if (output) {
		const outPath = resolve(output);
		const outDir = dirname(outPath);
		if (!existsSync(outDir)) mkdirSync(outDir, { recursive: true });
		writeFileSync(outPath, json, "utf-8");
		console.error(chalk.green(`✓ Output written to ${outPath}`));
	} else {
		process.stdout.write(`${json}\n`);
	}
}

function formatQuota(snapshot: RateLimitSnapshot): string {
	if (snapshot.remaining === null) return chalk.gray("unknown");
	const color =
		snapshot.remaining === 0
			? chalk.red
			: snapshot.limit !== null && snapshot.remaining < snapshot.limit / 10
				? chalk.yellow
				: chalk.green;
	const resetAt =
		snapshot.resetAt !== null
			? chalk.gray(` (resets ${new Date(snapshot.resetAt).toLocaleTimeString()})`)
			: "";
	return color(`${snapshot.remaining}/${snapshot.limit ?? "?"}`) + resetAt;
}
