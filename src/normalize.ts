/**
 * Canonical form for verbatim code blocks.
 *
 * Line endings become "\n" and trailing horizontal whitespace is stripped
 * from every line. Then one leading newline is dropped when the text opens
 * with exactly one newline (not two), and one trailing newline likewise.
 * Indentation and interior blank lines are untouched. Stripping runs first
 * so a line of trailing spaces cannot hide a newline from the trim step,
 * which keeps the function idempotent.
 */
export function normalizeCode(raw: string): string {
	let text = raw
		.replace(/\r\n?/g, "\n")
		.split("\n")
		.map((line) => line.replace(/[ \t]+$/, ""))
		.join("\n");

	if (text.startsWith("\n") && !text.startsWith("\n\n")) {
		text = text.slice(1);
	}
	if (text.endsWith("\n") && !text.endsWith("\n\n")) {
		text = text.slice(0, -1);
	}
	return text;
}

/** Collapse every whitespace run to one space and trim both ends. */
export function collapseWhitespace(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}
