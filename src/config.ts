import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Config } from "./types.ts";
import { CONFIG_DIR, CONFIG_FILE, DEFAULT_CONFIG } from "./types.ts";
import { parseYaml, serializeYaml } from "./yaml.ts";

export function configPath(dir: string): string {
	return join(dir, CONFIG_DIR, CONFIG_FILE);
}

export async function loadConfig(dir: string): Promise<Config> {
	let text: string;
	try {
		text = await readFile(configPath(dir), "utf8");
	} catch (err: unknown) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") return { ...DEFAULT_CONFIG };
		throw err;
	}

	const parsed = parseYaml(text);
	return {
		sourceDir: parsed.sourceDir || DEFAULT_CONFIG.sourceDir,
		outDir: parsed.outDir || DEFAULT_CONFIG.outDir,
		extension: normalizeExtension(parsed.extension || DEFAULT_CONFIG.extension),
	};
}

export async function saveConfig(dir: string, config: Config): Promise<void> {
	await mkdir(join(dir, CONFIG_DIR), { recursive: true });
	await writeFile(
		configPath(dir),
		serializeYaml({
			sourceDir: config.sourceDir,
			outDir: config.outDir,
			extension: config.extension,
		}),
	);
}

export function normalizeExtension(ext: string): string {
	return ext.startsWith(".") ? ext : `.${ext}`;
}
