import { DiffParseError } from "./errors.js";
import { logger } from "./logger.js";
import type { DiffHunk, FileDiffStats, LineRange } from "./types.js";

/** Hunk bodies longer than this are skipped outright */
export const MAX_HUNK_CHARS = 100 * 1024;

export interface DiffParseOptions {
	maxHunkChars?: number;
}

export interface HunkHeader {
	addStart: number;
	addLen: number;
	delStart: number;
	delLen: number;
}

interface SignedRange {
	sign: "+" | "-";
	start: number;
	length: number;
}

const RANGE_BODY = /^(\d+)(?:,(\d+))?$/;
const FILE_BOUNDARY = "diff --git";
const FILE_NAME = /^diff --git "?a\/.*?"? "?b\/(.+?)"?$/;

/** `+12,4`, `-7` (length 1) */
export function parseRange(token: string): SignedRange {
	const sign = token[0];
	if (sign !== "+" && sign !== "-") {
		throw new DiffParseError(`Range "${token}" has no +/- sign`);
	}
	const match = RANGE_BODY.exec(token.slice(1));
	if (!match) throw new DiffParseError(`Malformed range "${token}"`);
	return {
		sign,
		start: parseInt(match[1], 10),
		length: match[2] === undefined ? 1 : parseInt(match[2], 10)
	};
}

/**
 * Parses `@@ -a,b +c,d @@ optional section`. Sides are told apart by sign,
 * not position: some producers emit the added range first.
 */
export function parseHunkHeader(line: string): HunkHeader {
	if (!line.startsWith("@@ ")) {
		throw new DiffParseError(`Not a hunk header: "${line}"`);
	}
	const close = line.indexOf(" @@", 2);
	if (close === -1) throw new DiffParseError(`Unterminated hunk header: "${line}"`);

	const tokens = line.slice(3, close).trim().split(/\s+/);
	if (tokens.length !== 2) {
		throw new DiffParseError(`Expected two ranges in "${line}"`);
	}
	const [first, second] = tokens.map(parseRange);
	if (first.sign === second.sign) {
		throw new DiffParseError(`Both ranges in "${line}" are "${first.sign}"`);
	}
	const added = first.sign === "+" ? first : second;
	const deleted = first.sign === "-" ? first : second;
	return {
		addStart: added.start,
		addLen: added.length,
		delStart: deleted.start,
		delLen: deleted.length
	};
}

function splitLines(text: string): string[] {
	const lines = text.split(/\r?\n/);
	if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
	return lines;
}

interface PendingHunk {
	headerLine: string;
	body: string[];
	rawLength: number;
}

function buildHunk(pending: PendingHunk, maxHunkChars: number): DiffHunk | null {
	if (pending.rawLength > maxHunkChars) {
		logger.warn(
			`Skipping hunk ${pending.headerLine}: body is ${pending.rawLength} characters (limit ${maxHunkChars})`
		);
		return null;
	}

	let header: HunkHeader;
	try {
		header = parseHunkHeader(pending.headerLine);
	} catch (err) {
		logger.warn(`Parse Error: ${String(err)}`);
		return null;
	}

	const addedLines: string[] = [];
	const removedLines: string[] = [];
	let context = 0;
	for (const line of pending.body) {
		const marker = line[0];
		if (marker === "+") addedLines.push(line.slice(1));
		else if (marker === "-") removedLines.push(line.slice(1));
		// "\ No newline at end of file"
		else if (marker === "\\") continue;
		else context++;
	}

	if (
		context + addedLines.length !== header.addLen ||
		context + removedLines.length !== header.delLen
	) {
		logger.warn(
			`Dropping malformed hunk ${pending.headerLine}: ` +
				`saw +${addedLines.length} -${removedLines.length} with ${context} context lines`
		);
		return null;
	}

	return { ...header, addedLines, removedLines };
}

/**
 * Line state machine: outside a hunk, lines are file preamble and ignored;
 * inside one, lines accumulate until the next `@@` header or end of text.
 * Bad hunks are dropped one at a time, never the whole text.
 */
export function parseHunks(
	diffText: string,
	options: DiffParseOptions = {}
): DiffHunk[] {
	const maxHunkChars = options.maxHunkChars ?? MAX_HUNK_CHARS;
	const hunks: DiffHunk[] = [];
	let pending: PendingHunk | null = null;

	const flush = () => {
		if (!pending) return;
		const hunk = buildHunk(pending, maxHunkChars);
		if (hunk) hunks.push(hunk);
		pending = null;
	};

	for (const line of splitLines(diffText)) {
		if (line.startsWith("@@")) {
			flush();
			pending = { headerLine: line, body: [], rawLength: 0 };
		} else if (pending) {
			pending.body.push(line);
			pending.rawLength += line.length + 1;
		}
	}
	flush();

	return hunks;
}

export function statsFromHunks(
	fileName: string,
	hunks: readonly DiffHunk[]
): FileDiffStats {
	const added: string[] = [];
	const removed: string[] = [];
	const addedLocations: LineRange[] = [];
	const deletedLocations: LineRange[] = [];

	for (const hunk of hunks) {
		added.push(...hunk.addedLines);
		removed.push(...hunk.removedLines);
		addedLocations.push([hunk.addStart, hunk.addLen]);
		deletedLocations.push([hunk.delStart, hunk.delLen]);
	}

	return {
		fileName,
		addedLoc: added.length,
		deletedLoc: removed.length,
		addedLocations,
		deletedLocations,
		addedCode: added.join("\n"),
		deletedCode: removed.join("\n")
	};
}

export function parseDiff(
	fileName: string,
	diffText: string,
	options?: DiffParseOptions
): FileDiffStats {
	return statsFromHunks(fileName, parseHunks(diffText, options));
}

/** Splits a multi-file diff on `diff --git` lines; files with an unreadable boundary are skipped */
export function parseFiles(
	diffText: string,
	options?: DiffParseOptions
): FileDiffStats[] {
	const files: FileDiffStats[] = [];
	let boundary: string | null = null;
	let body: string[] = [];

	const flush = () => {
		if (boundary === null) return;
		const match = FILE_NAME.exec(boundary);
		if (match) {
			files.push(parseDiff(match[1], body.join("\n"), options));
		} else {
			logger.warn(`Skipping file with unreadable header: "${boundary}"`);
		}
	};

	for (const line of splitLines(diffText)) {
		if (line.startsWith(FILE_BOUNDARY)) {
			flush();
			boundary = line;
			body = [];
		} else {
			body.push(line);
		}
	}
	flush();

	return files;
}
