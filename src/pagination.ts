import type { PageCursor } from "./types.js";

/**
 * Extracts the `rel="next"` target from a Link header such as
 * `<https://api.github.com/…&page=2>; rel="next", <…&page=5>; rel="last"`.
 */
export function parseNextLink(link: string | null): PageCursor {
	if (!link) return null;
	for (const part of link.split(",")) {
		const match = /<([^>]+)>\s*;(.*)/.exec(part.trim());
		if (!match) continue;
		const rels = /rel="([^"]*)"/.exec(match[2]);
		if (rels && rels[1].split(/\s+/).includes("next")) return match[1];
	}
	return null;
}

/** Items carried by one page: the array itself, or `items` for search results */
export function pageItems(body: unknown): unknown[] {
	if (body === null || body === "") return [];
	if (Array.isArray(body)) return body;
	if (typeof body === "object" && "items" in body && Array.isArray(body.items)) {
		return body.items;
	}
	return [body];
}
