import { resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig } from "../config.ts";
import { describeError } from "../errors.ts";
import { loadDocument } from "../loader.ts";
import { mapDocument } from "../mapper.ts";
import { c, errorOut, humanOut, jsonOut } from "../output.ts";
import { ExitError } from "../types.ts";
import { discoverSources } from "./build.ts";

export interface ValidationReport {
	file: string;
	valid: boolean;
	sections?: number;
	includes?: number;
	errors: string[];
}

/** Compose and map one source without rendering or writing anything. */
export function validateFile(file: string): ValidationReport {
	try {
		const composed = loadDocument(file);
		const doc = mapDocument(composed);
		return {
			file: composed.path,
			valid: true,
			sections: doc.sections.length,
			includes: composed.sources.length - 1,
			errors: [],
		};
	} catch (err: unknown) {
		return { file: resolve(file), valid: false, errors: describeError(err) };
	}
}

export default async function validate(args: string[], json: boolean): Promise<void> {
	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: rulecraft validate [files...]

Checks that each source composes and fits the prompt vocabulary.
Without files, validates every source in the configured source directory.

Options:
  --json    Output as JSON`);
		return;
	}

	let files = args.filter((a) => !a.startsWith("--"));
	if (files.length === 0) {
		const cwd = process.cwd();
		const config = await loadConfig(cwd);
		try {
			files = await discoverSources(resolve(cwd, config.sourceDir));
		} catch (err: unknown) {
			const msg = err instanceof Error ? err.message : String(err);
			if (json) {
				jsonOut({ success: false, command: "validate", error: msg });
			} else {
				errorOut(`Error: ${msg}`);
			}
			throw new ExitError(1);
		}
	}

	const results = files.map(validateFile);
	const allValid = results.every((r) => r.valid);

	if (json) {
		jsonOut({ success: allValid, command: "validate", results, count: results.length });
	} else {
		for (const r of results) {
			if (r.valid) {
				humanOut(`${c.green("✓")} ${r.file} ${c.dim(`(${r.sections} sections)`)}`);
			} else {
				humanOut(`${c.red("✗")} ${r.file}`);
				for (const line of r.errors) {
					humanOut(`    ${c.red("error")}: ${line}`);
				}
			}
		}
		if (results.length === 0) {
			humanOut(c.dim("No prompt sources to validate."));
		}
	}

	if (!allValid) throw new ExitError(1);
}

export function register(program: Command): void {
	program
		.command("validate [files...]")
		.description("Check prompt sources without writing output")
		.option("--json", "Output as JSON")
		.action(async (files: string[], opts: { json?: boolean }) => {
			const args = [...files];
			if (opts.json) args.push("--json");
			await validate(args, opts.json ?? false);
		});
}
