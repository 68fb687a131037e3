import { renderFrontmatter } from "./frontmatter.ts";
import { renderSection } from "./render.ts";
import type { PromptDocument, RuleSection, TableOfContents } from "./types.ts";

export const CHARACTERIZATION_HEADING = "## System prompt characterization";
export const DESCRIPTION_HEADING = "## Description";
export const TOC_HEADING = "## Table of contents";

/** Entries for the table of contents, or undefined when none was requested. */
export function tocEntries(
	toc: TableOfContents | undefined,
	sections: PromptDocument["sections"],
): string[] | undefined {
	if (!toc) return undefined;
	if (toc.mode === "explicit") return [...toc.entries];
	return sections
		.filter((s): s is RuleSection => s.kind === "rule")
		.map((rule) => `Rule ${rule.id}: ${rule.title}`);
}

function renderToc(entries: readonly string[]): string {
	if (entries.length === 0) return TOC_HEADING;
	return `${TOC_HEADING}\n\n${entries.map((e) => `- ${e}`).join("\n")}`;
}

/**
 * Assemble the final artifact: frontmatter, title, characterization,
 * description, table of contents, then every section in document order.
 * Blocks are separated by exactly one blank line and the text ends with a
 * single newline.
 */
export function assembleDocument(doc: PromptDocument): string {
	const blocks: string[] = [`# ${doc.title}`];

	if (doc.role) {
		blocks.push(CHARACTERIZATION_HEADING, `Role definition: ${doc.role}`);
	}
	if (doc.description) {
		blocks.push(DESCRIPTION_HEADING, doc.description);
	}

	const entries = tocEntries(doc.toc, doc.sections);
	if (entries) blocks.push(renderToc(entries));

	for (const section of doc.sections) {
		blocks.push(renderSection(section, doc.source));
	}

	return `${renderFrontmatter(doc.metadata)}\n${blocks.join("\n\n")}\n`;
}
