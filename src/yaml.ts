/**
 * Minimal YAML reader/writer for the flat key-value config file.
 * Handles: string values, quoted strings, inline comments.
 * Does NOT handle: nested maps, arrays, multiline values.
 */

function maybeQuote(value: string): string {
	const needsQuotes =
		value === "" ||
		value.includes(":") ||
		value.includes("#") ||
		value.includes('"') ||
		value.includes("'") ||
		value.includes("\n") ||
		value.startsWith(" ") ||
		value.endsWith(" ");

	if (needsQuotes) {
		const escaped = value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
		return `"${escaped}"`;
	}
	return value;
}

function unquote(value: string): string {
	if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
		return value.slice(1, -1).replace(/\\(["\\n])/g, (_, ch: string) => (ch === "n" ? "\n" : ch));
	}
	if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) {
		return value.slice(1, -1).replace(/''/g, "'");
	}
	return value;
}

function stripInlineComment(value: string): string {
	if (value.startsWith('"') || value.startsWith("'")) return value;
	const commentIdx = value.indexOf(" #");
	return commentIdx === -1 ? value : value.slice(0, commentIdx).trim();
}

export function parseYaml(text: string): Record<string, string> {
	const result: Record<string, string> = {};

	for (const rawLine of text.split("\n")) {
		const line = rawLine.trim();
		if (!line || line.startsWith("#")) continue;

		const colonIdx = line.indexOf(":");
		if (colonIdx === -1) continue;

		const key = line.slice(0, colonIdx).trim();
		if (!key) continue;

		result[key] = unquote(stripInlineComment(line.slice(colonIdx + 1).trim()));
	}

	return result;
}

export function serializeYaml(obj: Record<string, string>): string {
	const lines = Object.entries(obj).map(([key, value]) => `${key}: ${maybeQuote(value)}`);
	return `${lines.join("\n")}\n`;
}
