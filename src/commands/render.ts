import { relative } from "node:path";
import type { Command } from "commander";
import { describeError } from "../errors.ts";
import { errorOut, fmt, humanOut, jsonOut, rawOut } from "../output.ts";
import { transformFile } from "../pipeline.ts";
import { ExitError } from "../types.ts";

export default async function renderCmd(args: string[], json: boolean): Promise<void> {
	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: rulecraft render <file> [options]

Prints the compiled rule file to stdout.

Options:
  --json    Output the document model and the compiled text as JSON`);
		return;
	}

	const file = args.filter((a) => !a.startsWith("--"))[0];
	if (!file) {
		if (json) {
			jsonOut({ success: false, command: "render", error: "Source file required" });
		} else {
			errorOut("Usage: rulecraft render <file> [--json]");
		}
		throw new ExitError(1);
	}

	try {
		const result = transformFile(file);
		if (json) {
			jsonOut({
				success: true,
				command: "render",
				source: result.document.source,
				sources: result.sources,
				document: result.document,
				output: result.output,
			});
		} else {
			rawOut(result.output);
		}
	} catch (err: unknown) {
		const lines = describeError(err);
		if (json) {
			jsonOut({ success: false, command: "render", error: lines.join("\n") });
		} else {
			errorOut(fmt.error(relative(process.cwd(), file) || file));
			for (const line of lines) errorOut(fmt.info(line));
		}
		throw new ExitError(1);
	}
}

export function register(program: Command): void {
	program
		.command("render")
		.description("Compile one prompt source and print it")
		.argument("<file>", "Prompt source file")
		.option("--json", "Output as JSON")
		.action(async (file: string, options: { json?: boolean }) => {
			const args = [file];
			if (options.json) args.push("--json");
			await renderCmd(args, options.json ?? false);
		});
}
