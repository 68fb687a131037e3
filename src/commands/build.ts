import { existsSync } from "node:fs";
import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, relative, resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig, normalizeExtension } from "../config.ts";
import { describeError } from "../errors.ts";
import { extractFrontmatter } from "../frontmatter.ts";
import { c, debugOut, errorOut, fmt, humanOut, jsonOut } from "../output.ts";
import { transformFile } from "../pipeline.ts";
import { ExitError } from "../types.ts";

export type BuildStatus = "written" | "unchanged" | "stale" | "missing" | "planned" | "failed";

export interface BuildEntry {
	source: string;
	output: string;
	status: BuildStatus;
	/** Set for stale outputs in --check mode: which part drifted. */
	drift?: "frontmatter" | "body";
	error?: string[];
}

/** Top-level *.xml files of a source directory, sorted by name. Subdirectories hold fragments. */
export async function discoverSources(sourceDir: string): Promise<string[]> {
	const entries = await readdir(sourceDir, { withFileTypes: true });
	return entries
		.filter((e) => e.isFile() && extname(e.name).toLowerCase() === ".xml")
		.map((e) => join(sourceDir, e.name))
		.sort();
}

export function outputPathFor(source: string, outDir: string, extension: string): string {
	return join(outDir, `${basename(source, extname(source))}${extension}`);
}

function whichDrift(expected: string, actual: string): "frontmatter" | "body" {
	const a = extractFrontmatter(expected);
	const b = extractFrontmatter(actual);
	if (!a || !b) return "frontmatter";
	return JSON.stringify(a.values) === JSON.stringify(b.values) ? "body" : "frontmatter";
}

async function readIfExists(path: string): Promise<string | undefined> {
	if (!existsSync(path)) return undefined;
	return readFile(path, "utf8");
}

interface BuildOptions {
	check: boolean;
	dryRun: boolean;
	force: boolean;
}

async function buildOne(source: string, output: string, opts: BuildOptions): Promise<BuildEntry> {
	let content: string;
	try {
		const result = transformFile(source);
		content = result.output;
		debugOut(`${source}: ${result.document.sections.length} sections from ${result.sources.length} file(s)`);
	} catch (err: unknown) {
		return { source, output, status: "failed", error: describeError(err) };
	}

	if (opts.dryRun) return { source, output, status: "planned" };

	try {
		return await syncOutput(source, output, content, opts);
	} catch (err: unknown) {
		return { source, output, status: "failed", error: describeError(err) };
	}
}

async function syncOutput(
	source: string,
	output: string,
	content: string,
	opts: BuildOptions,
): Promise<BuildEntry> {
	const existing = await readIfExists(output);

	if (opts.check) {
		if (existing === undefined) return { source, output, status: "missing" };
		if (existing === content) return { source, output, status: "unchanged" };
		return { source, output, status: "stale", drift: whichDrift(content, existing) };
	}

	if (!opts.force && existing === content) {
		return { source, output, status: "unchanged" };
	}

	await mkdir(dirname(output), { recursive: true });
	await writeFile(output, content);
	return { source, output, status: "written" };
}

const VALUE_FLAGS = new Set(["--ext"]);

function positionals(args: string[]): string[] {
	const result: string[] = [];
	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (VALUE_FLAGS.has(arg)) {
			i++;
			continue;
		}
		if (!arg.startsWith("--")) result.push(arg);
	}
	return result;
}

function flagValue(args: string[], flag: string): string | undefined {
	const idx = args.indexOf(flag);
	return idx === -1 ? undefined : args[idx + 1];
}

function reportHuman(entries: BuildEntry[], cwd: string): void {
	for (const e of entries) {
		const src = relative(cwd, e.source);
		const out = relative(cwd, e.output);
		switch (e.status) {
			case "written":
				humanOut(fmt.success(`${src} → ${fmt.path(out)}`));
				break;
			case "unchanged":
				humanOut(c.dim(`(unchanged) ${src} → ${out}`));
				break;
			case "planned":
				humanOut(`  ${src} → ${out}`);
				break;
			case "missing":
				humanOut(fmt.error(`${out} is missing`, `(from ${src})`));
				break;
			case "stale":
				humanOut(fmt.error(`${out} is stale`, `(${e.drift ?? "body"} differs from ${src})`));
				break;
			case "failed":
				errorOut(fmt.error(src));
				for (const line of e.error ?? []) errorOut(fmt.info(line));
				break;
		}
	}
}

export default async function build(args: string[], json: boolean): Promise<void> {
	const cwd = process.cwd();

	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: rulecraft build [sourceDir] [outDir] [options]

Options:
  --check          Compare outputs with the sources instead of writing
  --dry-run        Show what would be written
  --force          Rewrite outputs even if unchanged
  --ext <ext>      Output file extension (default from config: .md)
  --json           Output as JSON`);
		return;
	}

	const config = await loadConfig(cwd);
	const [srcArg, outArg] = positionals(args);
	const sourceDir = resolve(cwd, srcArg ?? config.sourceDir);
	const outDir = resolve(cwd, outArg ?? config.outDir);
	const ext = flagValue(args, "--ext");
	const extension = ext ? normalizeExtension(ext) : config.extension;

	const opts: BuildOptions = {
		check: args.includes("--check"),
		dryRun: args.includes("--dry-run"),
		force: args.includes("--force"),
	};

	if (!existsSync(sourceDir)) {
		if (json) {
			jsonOut({ success: false, command: "build", error: `Source directory '${sourceDir}' not found` });
		} else {
			errorOut(`Source directory '${relative(cwd, sourceDir) || "."}' not found`);
		}
		throw new ExitError(1);
	}

	const sources = await discoverSources(sourceDir);
	debugOut(`found ${sources.length} source(s) in ${sourceDir}`);

	// Each document is independent: one failure never stops its siblings
	const entries: BuildEntry[] = [];
	for (const source of sources) {
		entries.push(await buildOne(source, outputPathFor(source, outDir, extension), opts));
	}

	const failed = entries.filter((e) => e.status === "failed").length;
	const outdated = entries.filter((e) => e.status === "stale" || e.status === "missing").length;
	const success = failed === 0 && outdated === 0;

	if (json) {
		jsonOut({ success, command: "build", check: opts.check, files: entries });
	} else {
		reportHuman(entries, cwd);
		if (sources.length === 0) {
			humanOut(c.dim("No prompt sources found."));
		} else if (opts.check && outdated === 0 && failed === 0) {
			humanOut(fmt.success("All outputs are up to date"));
		}
		if (failed > 0) {
			errorOut(fmt.error(`${failed} of ${sources.length} document(s) failed`));
		}
	}

	if (!success) throw new ExitError(1);
}

export function register(program: Command): void {
	program
		.command("build [sourceDir] [outDir]")
		.description("Compile every prompt source into a rule file")
		.option("--check", "Compare outputs with the sources instead of writing")
		.option("--dry-run", "Show what would be written")
		.option("--force", "Rewrite outputs even if unchanged")
		.option("--ext <ext>", "Output file extension")
		.option("--json", "Output as JSON")
		.action(
			async (
				sourceDir: string | undefined,
				outDir: string | undefined,
				opts: { check?: boolean; dryRun?: boolean; force?: boolean; ext?: string; json?: boolean },
			) => {
				const args: string[] = [];
				if (sourceDir) args.push(sourceDir);
				if (outDir) args.push(outDir);
				if (opts.check) args.push("--check");
				if (opts.dryRun) args.push("--dry-run");
				if (opts.force) args.push("--force");
				if (opts.ext) args.push("--ext", opts.ext);
				if (opts.json) args.push("--json");
				await build(args, opts.json ?? false);
			},
		);
}
