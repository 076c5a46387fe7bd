import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { defaultCacheDir } from "./cache.js";
import { GH_REST } from "./dispatcher.js";
import { ConfigurationError } from "./errors.js";

const configSchema = z.object({
	tokens: z
		.array(z.string().min(1))
		.min(1, "No GitHub API tokens found. Pass --token, GITHUB_TOKENS or a tokens file."),
	timeoutMs: z.coerce.number().int().positive(),
	perPage: z.coerce.number().int().min(1).max(100),
	baseUrl: z.string().url(),
	cacheDir: z.string().min(1),
	logLevel: z.enum(["silent", "error", "warn", "info", "debug"])
});

export type ScraperConfig = z.infer<typeof configSchema>;

/** Raw values as they arrive from CLI flags or a caller; anything omitted falls back to the environment */
export interface ConfigInput {
	tokens?: string[];
	tokensFile?: string;
	timeoutMs?: number | string;
	perPage?: number | string;
	baseUrl?: string;
	cacheDir?: string;
	logLevel?: string;
}

/** One token per line; blank lines and `#` comments are ignored */
export function readTokensFile(path: string): string[] {
	if (!existsSync(path)) {
		throw new ConfigurationError(`Tokens file not found: ${path}`);
	}
	return readFileSync(path, "utf-8")
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"));
}

function resolveTokens(input: ConfigInput, env: NodeJS.ProcessEnv): string[] {
	if (input.tokens && input.tokens.length > 0) return input.tokens;
	const file = input.tokensFile ?? env.GITHUB_TOKENS_FILE;
	if (file) return readTokensFile(file);
	return (env.GITHUB_TOKENS ?? env.GITHUB_TOKEN ?? "")
		.split(",")
		.map((t) => t.trim())
		.filter((t) => t.length > 0);
}

export function loadConfig(
	input: ConfigInput = {},
	env: NodeJS.ProcessEnv = process.env
): ScraperConfig {
	const result = configSchema.safeParse({
		tokens: resolveTokens(input, env),
		timeoutMs: input.timeoutMs ?? env.GHPS_TIMEOUT_MS ?? 30_000,
		perPage: input.perPage ?? env.GHPS_PER_PAGE ?? 100,
		baseUrl: input.baseUrl ?? env.GHPS_BASE_URL ?? GH_REST,
		cacheDir: input.cacheDir ?? env.GHPS_CACHE_DIR ?? defaultCacheDir(),
		logLevel: input.logLevel ?? env.LOG_LEVEL ?? "info"
	});
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
			.join("; ");
		throw new ConfigurationError(`Invalid configuration: ${issues}`);
	}
	return result.data;
}
