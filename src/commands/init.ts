import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Command } from "commander";
import { configPath, saveConfig } from "../config.ts";
import { errorOut, humanOut, jsonOut } from "../output.ts";
import { CONFIG_DIR, DEFAULT_CONFIG, ExitError } from "../types.ts";

export default async function init(args: string[], json: boolean): Promise<void> {
	const cwd = process.cwd();

	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: rulecraft init

Writes ${CONFIG_DIR}/config.yaml with default directories and creates the source directory.`);
		return;
	}

	if (existsSync(configPath(cwd))) {
		if (json) {
			jsonOut({ success: false, command: "init", error: `${CONFIG_DIR}/config.yaml already exists` });
		} else {
			errorOut(`${CONFIG_DIR}/config.yaml already exists`);
		}
		throw new ExitError(1);
	}

	const config = { ...DEFAULT_CONFIG };
	await saveConfig(cwd, config);
	await mkdir(join(cwd, config.sourceDir, "fragments"), { recursive: true });

	if (json) {
		jsonOut({ success: true, command: "init", config });
	} else {
		humanOut(`Initialized ${CONFIG_DIR}/ in ${cwd}`);
		humanOut(`  sourceDir=${config.sourceDir}, outDir=${config.outDir}, extension=${config.extension}`);
	}
}

export function register(program: Command): void {
	program
		.command("init")
		.description(`Initialize ${CONFIG_DIR}/ in current directory`)
		.option("--json", "Output as JSON")
		.action(async (options: { json?: boolean }) => {
			const args = options.json ? ["--json"] : [];
			await init(args, options.json ?? false);
		});
}
