#!/usr/bin/env -S node --import tsx
import chalk from "chalk";
import { Command, Help } from "commander";
import { errorOut, isJsonMode, jsonOut, palette, setQuiet, setVerbose } from "./output.ts";
import { ExitError } from "./types.ts";

export const VERSION = "0.1.0";

const t0 = performance.now();

const rawArgs = process.argv.slice(2);

// --version --json: rich metadata output (before Commander processes version flag)
if ((rawArgs.includes("-v") || rawArgs.includes("--version")) && rawArgs.includes("--json")) {
	const platform = `${process.platform}-${process.arch}`;
	console.log(
		JSON.stringify({ name: "rulecraft", version: VERSION, runtime: process.version, platform }),
	);
	process.exit();
}

// Apply output modes early (before Commander parses)
if (rawArgs.includes("--quiet") || rawArgs.includes("-q")) {
	setQuiet(true);
}
if (rawArgs.includes("--verbose")) {
	setVerbose(true);
}

const program = new Command();
program
	.name("rulecraft")
	.description("Compile XML prompt definitions into Markdown rule files")
	.version(VERSION, "-v, --version", "Show version")
	.option("-q, --quiet", "Suppress non-error output")
	.option("--verbose", "Extra diagnostic output")
	.option("--timing", "Show command execution time")
	.addHelpCommand(false)
	.configureHelp({
		formatHelp(cmd: Command, helper: Help): string {
			if (cmd.parent) {
				return Help.prototype.formatHelp.call(helper, cmd, helper);
			}
			const header = `${palette.brand(chalk.bold("rulecraft"))} ${palette.muted(`v${VERSION}`)} — XML prompt definitions to Markdown rules\n\nUsage: rulecraft <command> [options]`;

			const cmdLines: string[] = ["\nCommands:"];
			for (const sub of cmd.commands) {
				const name = sub.name();
				const argStr = sub.registeredArguments
					.map((a) => (a.required ? `<${a.name()}>` : `[${a.name()}]`))
					.join(" ");
				const rawEntry = argStr ? `${name} ${argStr}` : name;
				const colored = argStr ? `${chalk.green(name)} ${chalk.dim(argStr)}` : chalk.green(name);
				const pad = " ".repeat(Math.max(30 - rawEntry.length, 2));
				cmdLines.push(`  ${colored}${pad}${sub.description()}`);
			}

			const opts: [string, string][] = [
				["-h, --help", "Show help"],
				["-v, --version", "Show version"],
				["--json", "Output as JSON"],
				["-q, --quiet", "Suppress non-error output"],
				["--verbose", "Extra diagnostic output"],
				["--timing", "Show command execution time"],
			];
			const optLines: string[] = ["\nOptions:"];
			for (const [flag, desc] of opts) {
				const pad = " ".repeat(Math.max(30 - flag.length, 2));
				optLines.push(`  ${chalk.dim(flag)}${pad}${desc}`);
			}

			const footer = `\nRun '${chalk.dim("rulecraft")} <command> --help' for command-specific help.`;

			return `${[header, ...cmdLines, ...optLines, footer].join("\n")}\n`;
		},
	});

const { register: registerInit } = await import("./commands/init.ts");
const { register: registerBuild } = await import("./commands/build.ts");
const { register: registerRender } = await import("./commands/render.ts");
const { register: registerValidate } = await import("./commands/validate.ts");

registerInit(program);
registerBuild(program);
registerRender(program);
registerValidate(program);

// --- Typo suggestions via Levenshtein distance ---

function editDistance(a: string, b: string): number {
	const m = a.length;
	const n = b.length;
	const dp = new Array<number>((m + 1) * (n + 1)).fill(0);
	const idx = (i: number, j: number) => i * (n + 1) + j;
	for (let i = 0; i <= m; i++) dp[idx(i, 0)] = i;
	for (let j = 0; j <= n; j++) dp[idx(0, j)] = j;
	for (let i = 1; i <= m; i++) {
		for (let j = 1; j <= n; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			const del = (dp[idx(i - 1, j)] ?? 0) + 1;
			const ins = (dp[idx(i, j - 1)] ?? 0) + 1;
			const sub = (dp[idx(i - 1, j - 1)] ?? 0) + cost;
			dp[idx(i, j)] = Math.min(del, ins, sub);
		}
	}
	return dp[idx(m, n)] ?? 0;
}

function suggestCommand(input: string): string | undefined {
	let bestMatch: string | undefined;
	let bestDist = 3; // Only suggest if distance <= 2
	for (const cmd of program.commands.map((c) => c.name())) {
		const dist = editDistance(input, cmd);
		if (dist < bestDist) {
			bestDist = dist;
			bestMatch = cmd;
		}
	}
	return bestMatch;
}

program.on("command:*", (operands: string[]) => {
	const unknown = operands[0] ?? "";
	process.stderr.write(`Unknown command: ${unknown}\n`);
	const suggestion = suggestCommand(unknown);
	if (suggestion) {
		process.stderr.write(`Did you mean '${suggestion}'?\n`);
	}
	process.stderr.write("Run 'rulecraft --help' for usage.\n");
	process.exit(1);
});

function reportTiming(): void {
	if (program.opts().timing) {
		const elapsed = Math.round(performance.now() - t0);
		process.stderr.write(`[timing] ${elapsed}ms\n`);
	}
}

program
	.parseAsync(process.argv)
	.then(reportTiming)
	.catch((err: unknown) => {
		reportTiming();
		if (err instanceof ExitError) {
			process.exitCode = err.exitCode;
			return;
		}
		const msg = err instanceof Error ? err.message : String(err);
		const command = process.argv[2] ?? "";
		if (isJsonMode(process.argv.slice(2))) {
			jsonOut({ success: false, command, error: msg });
		} else {
			errorOut(`Error: ${msg}`);
		}
		process.exitCode = 1;
	});
