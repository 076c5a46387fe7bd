import { readFileSync } from "node:fs";

/** Build files without an extension that still hold code */
const CODE_FILENAMES = new Set([
	"Dockerfile",
	"Makefile",
	"Gemfile",
	"Rakefile",
	"Podfile",
	"Vagrantfile",
	"Brewfile",
	"Jenkinsfile"
]);

let nonCodeSuffixes: Set<string> | undefined;

function loadNonCodeSuffixes(): Set<string> {
	if (!nonCodeSuffixes) {
		const raw = readFileSync(
			new URL("../data/non-code-suffixes.json", import.meta.url),
			"utf-8"
		);
		const parsed: unknown = JSON.parse(raw);
		nonCodeSuffixes = new Set(
			Array.isArray(parsed)
				? parsed.filter((s): s is string => typeof s === "string")
				: []
		);
	}
	return nonCodeSuffixes;
}

/**
 * True for documentation, data, assets and anything without an extension.
 * Such files are left out of code statistics.
 */
export function isNonCodeFile(filename: string): boolean {
	const basename = filename.split("/").pop() ?? filename;
	if (CODE_FILENAMES.has(basename)) return false;
	if (basename.includes(".gitignore")) return true;

	const dotIndex = basename.lastIndexOf(".");
	// dotfiles such as `.env` have no extension either
	if (dotIndex <= 0) return true;
	const ext = basename.slice(dotIndex).toLowerCase();
	return loadNonCodeSuffixes().has(ext);
}
