import { describe, expect, it } from "vitest";
import {
	parseDiff,
	parseFiles,
	parseHunkHeader,
	parseHunks,
	parseRange
} from "../diff-parser.js";
import { DiffParseError } from "../errors.js";

const SIMPLE = "@@ -1,2 +1,3 @@\n context\n-old\n+new1\n+new2\n";

describe("parseRange", () => {
	it("reads start and length", () => {
		expect(parseRange("+12,4")).toEqual({ sign: "+", start: 12, length: 4 });
	});

	it("defaults a missing length to 1", () => {
		expect(parseRange("-7")).toEqual({ sign: "-", start: 7, length: 1 });
	});

	it.each(["12,4", "+a,1", "-1,", "+1,2,3", ""])("rejects %j", (token) => {
		expect(() => parseRange(token)).toThrow(DiffParseError);
	});
});

describe("parseHunkHeader", () => {
	it("assigns sides by sign", () => {
		expect(parseHunkHeader("@@ -3,5 +8,6 @@")).toEqual({
			delStart: 3,
			delLen: 5,
			addStart: 8,
			addLen: 6
		});
	});

	it("accepts the added range first", () => {
		expect(parseHunkHeader("@@ +8,6 -3,5 @@")).toEqual(parseHunkHeader("@@ -3,5 +8,6 @@"));
	});

	it("accepts ranges without a length", () => {
		expect(parseHunkHeader("@@ -5 +7 @@")).toEqual({
			delStart: 5,
			delLen: 1,
			addStart: 7,
			addLen: 1
		});
	});

	it("ignores the section heading after the closing marker", () => {
		expect(parseHunkHeader("@@ -10,3 +10,4 @@ function foo() {")).toEqual({
			delStart: 10,
			delLen: 3,
			addStart: 10,
			addLen: 4
		});
	});

	it.each(["@@ -1,2 -1,3 @@", "@@ -1,2 @@", "@@ -1,2 +1,3", "@@ -1,x +1,3 @@"])(
		"rejects %j",
		(line) => {
			expect(() => parseHunkHeader(line)).toThrow(DiffParseError);
		}
	);
});

describe("parseHunks", () => {
	it("splits lines into added and removed, dropping context", () => {
		expect(parseHunks(SIMPLE)).toEqual([
			{
				addStart: 1,
				addLen: 3,
				delStart: 1,
				delLen: 2,
				addedLines: ["new1", "new2"],
				removedLines: ["old"]
			}
		]);
	});

	it("gives the same hunk when the header lists the added range first", () => {
		const reversed = "@@ +1,3 -1,2 @@\n context\n-old\n+new1\n+new2\n";
		expect(parseHunks(reversed)).toEqual(parseHunks(SIMPLE));
	});

	it("strips exactly one marker character", () => {
		const [hunk] = parseHunks("@@ -1 +1 @@\n--x\n++y\n");
		expect(hunk.removedLines).toEqual(["-x"]);
		expect(hunk.addedLines).toEqual(["+y"]);
	});

	it("ignores no-newline markers", () => {
		const text = "@@ -1 +1 @@\n-a\n\\ No newline at end of file\n+b\n\\ No newline at end of file\n";
		const [hunk] = parseHunks(text);
		expect(hunk.removedLines).toEqual(["a"]);
		expect(hunk.addedLines).toEqual(["b"]);
	});

	it("drops a hunk whose line counts disagree with its header", () => {
		const text = "@@ -1,2 +1,2 @@\n+x\n@@ -9 +9 @@\n-y\n+z\n";
		expect(parseHunks(text)).toEqual([
			{ addStart: 9, addLen: 1, delStart: 9, delLen: 1, addedLines: ["z"], removedLines: ["y"] }
		]);
	});

	it("skips a hunk with an unreadable header and keeps the rest", () => {
		const text = "@@ -1,x +1,1 @@\n+a\n@@ -5,1 +5,1 @@\n-b\n+c\n";
		const hunks = parseHunks(text);
		expect(hunks).toHaveLength(1);
		expect(hunks[0]).toMatchObject({ delStart: 5, removedLines: ["b"], addedLines: ["c"] });
	});

	it("excludes a hunk body above the 102400-character ceiling without throwing", () => {
		const bigLines = Array.from({ length: 100 }, () => `+${"a".repeat(1023)}`);
		const text = `@@ -0,0 +1,100 @@\n${bigLines.join("\n")}\n@@ -50 +150 @@\n-x\n+y\n`;
		const hunks = parseHunks(text);
		expect(hunks).toHaveLength(1);
		expect(hunks[0]).toMatchObject({ delStart: 50, addStart: 150 });
	});

	it("honours a custom ceiling", () => {
		expect(parseHunks(SIMPLE, { maxHunkChars: 10 })).toEqual([]);
		expect(parseHunks(SIMPLE, { maxHunkChars: 29 })).toHaveLength(1);
	});

	it("measures the ceiling in characters rather than encoded bytes", () => {
		// "+éé" plus its line break is 4 characters but 6 UTF-8 bytes
		const text = "@@ -0,0 +1 @@\n+éé\n";
		expect(parseHunks(text, { maxHunkChars: 4 })).toHaveLength(1);
		expect(parseHunks(text, { maxHunkChars: 3 })).toEqual([]);
	});

	it("ignores file preamble before the first hunk", () => {
		const text = "--- a/x.ts\n+++ b/x.ts\n" + SIMPLE;
		expect(parseHunks(text)).toHaveLength(1);
	});
});

describe("parseDiff", () => {
	it("accumulates counts, locations and code across hunks", () => {
		const text = `${SIMPLE}@@ -10,1 +11,1 @@\n-x\n+y\n`;
		expect(parseDiff("src/app.ts", text)).toEqual({
			fileName: "src/app.ts",
			addedLoc: 3,
			deletedLoc: 2,
			addedLocations: [
				[1, 3],
				[11, 1]
			],
			deletedLocations: [
				[1, 2],
				[10, 1]
			],
			addedCode: "new1\nnew2\ny",
			deletedCode: "old\nx"
		});
	});

	it("keeps partial statistics when one hunk is bad", () => {
		const text = `@@ -1 +1 @@\n+only-added\n${SIMPLE}`;
		const stats = parseDiff("a.ts", text);
		expect(stats.addedLocations).toEqual([[1, 3]]);
		expect(stats.addedLoc).toBe(2);
	});

	it("returns empty statistics for text without hunks", () => {
		expect(parseDiff("empty.ts", "")).toEqual({
			fileName: "empty.ts",
			addedLoc: 0,
			deletedLoc: 0,
			addedLocations: [],
			deletedLocations: [],
			addedCode: "",
			deletedCode: ""
		});
	});
});

describe("parseFiles", () => {
	it("splits on diff --git and skips files with unreadable boundaries", () => {
		const text = [
			"diff --git a/src/a.ts b/src/a.ts",
			"index 1234567..89abcde 100644",
			"--- a/src/a.ts",
			"+++ b/src/a.ts",
			"@@ -1 +1 @@",
			"-a",
			"+b",
			"diff --git broken header",
			"@@ -1 +1 @@",
			"-c",
			"+d",
			"diff --git a/README.md b/docs/README.md",
			"--- a/README.md",
			"+++ b/docs/README.md",
			"@@ -0,0 +1,2 @@",
			"+x",
			"+y",
			""
		].join("\n");

		const files = parseFiles(text);

		expect(files.map((f) => f.fileName)).toEqual(["src/a.ts", "docs/README.md"]);
		expect(files[0]).toMatchObject({ addedLoc: 1, deletedLoc: 1, addedCode: "b", deletedCode: "a" });
		expect(files[1]).toMatchObject({
			addedLoc: 2,
			deletedLoc: 0,
			addedLocations: [[1, 2]],
			deletedLocations: [[0, 0]]
		});
	});

	it("ignores text before the first boundary", () => {
		expect(parseFiles("From abc Mon Sep 17 00:00:00 2001\n" + SIMPLE)).toEqual([]);
	});
});
