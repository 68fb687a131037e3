import type { Metadata } from "./types.ts";

/**
 * Frontmatter block for an emitted rule file. The three keys are always
 * present and always in this order; values are written raw, the way rule
 * loaders read them (a glob such as `*.java` stays unquoted).
 */
export const FRONTMATTER_KEYS = ["description", "globs", "alwaysApply"] as const;

export type FrontmatterKey = (typeof FRONTMATTER_KEYS)[number];

export function frontmatterValues(metadata: Metadata): Record<FrontmatterKey, string> {
	return {
		description: metadata.description ?? "",
		globs: metadata.globs ?? "",
		alwaysApply: metadata.alwaysApply === undefined ? "" : String(metadata.alwaysApply),
	};
}

/** Serialize metadata to a frontmatter block with --- delimiters, no trailing newline. */
export function renderFrontmatter(metadata: Metadata): string {
	const values = frontmatterValues(metadata);
	const lines: string[] = ["---"];
	for (const key of FRONTMATTER_KEYS) {
		lines.push(`${key}: ${values[key]}`);
	}
	lines.push("---");
	return lines.join("\n");
}

/**
 * Read the frontmatter of an emitted file back into its key/value pairs.
 * Returns undefined when the content does not open with a frontmatter block.
 */
export function extractFrontmatter(
	content: string,
): { values: Record<string, string>; body: string } | undefined {
	const lines = content.split("\n");
	if ((lines[0] ?? "").trim() !== "---") return undefined;

	const closingIdx = lines.findIndex((line, i) => i > 0 && line.trim() === "---");
	if (closingIdx === -1) return undefined;

	const values: Record<string, string> = {};
	for (const line of lines.slice(1, closingIdx)) {
		const colonIdx = line.indexOf(":");
		if (colonIdx === -1) continue;
		const key = line.slice(0, colonIdx).trim();
		if (key) values[key] = line.slice(colonIdx + 1).trim();
	}

	return { values, body: lines.slice(closingIdx + 1).join("\n") };
}
