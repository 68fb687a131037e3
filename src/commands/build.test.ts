import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { transformFile } from "../pipeline.ts";
import { ExitError } from "../types.ts";
import build, { discoverSources, outputPathFor } from "./build.ts";

const tmpDir = fileURLToPath(new URL("../../.test-tmp-build", import.meta.url));

interface Captured {
	stdout: string;
	stderr: string;
	error?: unknown;
}

// Capture stdout/stderr, keeping the error a command threw
async function captureOutput(fn: () => Promise<void>): Promise<Captured> {
	const origLog = console.log;
	const origError = console.error;
	let stdout = "";
	let stderr = "";

	console.log = (...args: unknown[]) => {
		stdout += `${args.join(" ")}\n`;
	};
	console.error = (...args: unknown[]) => {
		stderr += `${args.join(" ")}\n`;
	};

	try {
		await fn();
		return { stdout, stderr };
	} catch (error: unknown) {
		return { stdout, stderr, error };
	} finally {
		console.log = origLog;
		console.error = origError;
	}
}

function write(rel: string, content: string): void {
	const path = join(tmpDir, rel);
	mkdirSync(dirname(path), { recursive: true });
	writeFileSync(path, content);
}

function prompt(title: string, sections = ""): string {
	return `<prompt xmlns:xi="http://www.w3.org/2001/XInclude"><metadata><globs>*.ts</globs></metadata><header><title>${title}</title></header><sections>${sections}</sections></prompt>`;
}

const RULE =
	'<rule id="1"><title>Naming</title><subtitle>Use camelCase</subtitle><description>Name things clearly.</description></rule>';

async function inTmp<T>(fn: () => Promise<T>): Promise<T> {
	const origCwd = process.cwd();
	process.chdir(tmpDir);
	try {
		return await fn();
	} finally {
		process.chdir(origCwd);
	}
}

interface JsonEntry {
	source: string;
	output: string;
	status: string;
	drift?: string;
	error?: string[];
}

function entries(stdout: string): JsonEntry[] {
	const parsed: { files: JsonEntry[] } = JSON.parse(stdout.trim());
	return parsed.files;
}

function statusByName(stdout: string): Record<string, string> {
	const result: Record<string, string> = {};
	for (const e of entries(stdout)) {
		result[e.source.slice(e.source.lastIndexOf("/") + 1)] = e.status;
	}
	return result;
}

beforeEach(() => {
	mkdirSync(tmpDir, { recursive: true });
});

afterEach(() => {
	if (existsSync(tmpDir)) {
		rmSync(tmpDir, { recursive: true });
	}
});

describe("discoverSources", () => {
	it("lists top-level xml files sorted, skipping fragment directories", async () => {
		write("prompts/b.xml", prompt("B"));
		write("prompts/a.XML", prompt("A"));
		write("prompts/notes.txt", "x");
		write("prompts/fragments/f.xml", RULE);
		const sources = await discoverSources(join(tmpDir, "prompts"));
		expect(sources).toEqual([join(tmpDir, "prompts", "a.XML"), join(tmpDir, "prompts", "b.xml")]);
	});
});

describe("outputPathFor", () => {
	it("swaps the extension and directory", () => {
		expect(outputPathFor("/src/prompts/java.xml", "/out", ".mdc")).toBe("/out/java.mdc");
	});
});

describe("rulecraft build", () => {
	it("writes one output per source", async () => {
		write("prompts/style.xml", prompt("Style", RULE));
		const { stdout, error } = await inTmp(() => captureOutput(() => build([], false)));
		expect(error).toBeUndefined();
		expect(stdout).toContain("style.md");
		const expected = transformFile(join(tmpDir, "prompts", "style.xml")).output;
		expect(readFileSync(join(tmpDir, "rules", "style.md"), "utf8")).toBe(expected);
	});

	it("resolves includes relative to each source", async () => {
		write("prompts/style.xml", prompt("Style", '<xi:include href="fragments/naming.xml"/>'));
		write("prompts/fragments/naming.xml", RULE);
		await inTmp(() => captureOutput(() => build([], false)));
		expect(readFileSync(join(tmpDir, "rules", "style.md"), "utf8")).toContain("## Rule 1: Naming");
	});

	it("skips unchanged outputs unless forced", async () => {
		write("prompts/style.xml", prompt("Style"));
		await inTmp(() => captureOutput(() => build([], false)));

		const again = await inTmp(() => captureOutput(() => build(["--json"], true)));
		expect(statusByName(again.stdout)).toEqual({ "style.xml": "unchanged" });

		const forced = await inTmp(() => captureOutput(() => build(["--force", "--json"], true)));
		expect(statusByName(forced.stdout)).toEqual({ "style.xml": "written" });
	});

	it("takes directories and extension from arguments", async () => {
		write("src/style.xml", prompt("Style"));
		await inTmp(() => captureOutput(() => build(["src", "out", "--ext", "mdc"], false)));
		expect(existsSync(join(tmpDir, "out", "style.mdc"))).toBe(true);
	});

	it("takes directories and extension from the config file", async () => {
		write(".rulecraft/config.yaml", "sourceDir: defs\noutDir: .cursor/rules\nextension: .mdc\n");
		write("defs/style.xml", prompt("Style"));
		await inTmp(() => captureOutput(() => build([], false)));
		expect(existsSync(join(tmpDir, ".cursor", "rules", "style.mdc"))).toBe(true);
	});

	it("keeps building after a document fails", async () => {
		write("prompts/a-broken.xml", prompt("Broken", '<xi:include href="missing.xml"/>'));
		write("prompts/b-good.xml", prompt("Good"));
		const { stdout, error } = await inTmp(() => captureOutput(() => build(["--json"], true)));

		expect(error).toBeInstanceOf(ExitError);
		const [broken, good] = entries(stdout);
		expect(broken?.status).toBe("failed");
		expect(broken?.error?.[0]).toMatch(/^UnresolvedIncludeError: Included fragment ".*missing\.xml" not found/);
		expect(good?.status).toBe("written");
		expect(existsSync(join(tmpDir, "rules", "b-good.md"))).toBe(true);
		expect(existsSync(join(tmpDir, "rules", "a-broken.md"))).toBe(false);
	});

	it("keeps building when an output cannot be written", async () => {
		write("prompts/a.xml", prompt("A"));
		write("prompts/b.xml", prompt("B"));
		mkdirSync(join(tmpDir, "rules", "a.md"), { recursive: true });
		const { stdout, error } = await inTmp(() => captureOutput(() => build(["--json"], true)));

		expect(error).toBeInstanceOf(ExitError);
		const [a, b] = entries(stdout);
		expect(a?.status).toBe("failed");
		expect(a?.error?.[0]).toMatch(/^EISDIR/);
		expect(b?.status).toBe("written");
		expect(existsSync(join(tmpDir, "rules", "b.md"))).toBe(true);
	});

	it("reports the failed document on stderr", async () => {
		write("prompts/broken.xml", "<prompt><metadata>");
		const { stderr, error } = await inTmp(() => captureOutput(() => build([], false)));
		expect(error).toBeInstanceOf(ExitError);
		expect(stderr).toContain("broken.xml");
		expect(stderr).toContain("MalformedDocumentError");
		expect(stderr).toContain("1 of 1 document(s) failed");
	});

	it("writes nothing on --dry-run", async () => {
		write("prompts/style.xml", prompt("Style"));
		const { stdout } = await inTmp(() => captureOutput(() => build(["--dry-run", "--json"], true)));
		expect(statusByName(stdout)).toEqual({ "style.xml": "planned" });
		expect(existsSync(join(tmpDir, "rules"))).toBe(false);
	});

	describe("--check", () => {
		it("passes when outputs are current", async () => {
			write("prompts/style.xml", prompt("Style"));
			await inTmp(() => captureOutput(() => build([], false)));
			const { stdout, error } = await inTmp(() => captureOutput(() => build(["--check"], false)));
			expect(error).toBeUndefined();
			expect(stdout).toContain("All outputs are up to date");
		});

		it("fails on missing outputs", async () => {
			write("prompts/style.xml", prompt("Style"));
			const { stdout, error } = await inTmp(() => captureOutput(() => build(["--check", "--json"], true)));
			expect(error).toBeInstanceOf(ExitError);
			expect(statusByName(stdout)).toEqual({ "style.xml": "missing" });
			expect(existsSync(join(tmpDir, "rules"))).toBe(false);
		});

		it("names the part of a stale output that drifted", async () => {
			write("prompts/style.xml", prompt("Style"));
			await inTmp(() => captureOutput(() => build([], false)));

			write("prompts/style.xml", prompt("Style", RULE));
			const body = await inTmp(() => captureOutput(() => build(["--check", "--json"], true)));
			expect(body.error).toBeInstanceOf(ExitError);
			expect(entries(body.stdout)[0]).toMatchObject({ status: "stale", drift: "body" });

			write("prompts/style.xml", prompt("Style").replace("*.ts", "*.tsx"));
			const front = await inTmp(() => captureOutput(() => build(["--check", "--json"], true)));
			expect(entries(front.stdout)[0]).toMatchObject({ status: "stale", drift: "frontmatter" });
		});
	});

	it("fails when the source directory does not exist", async () => {
		const { stderr, error } = await inTmp(() => captureOutput(() => build([], false)));
		expect(error).toBeInstanceOf(ExitError);
		expect(stderr).toContain("Source directory 'prompts' not found");
	});
});
