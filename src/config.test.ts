import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "./config.ts";
import { DEFAULT_CONFIG } from "./types.ts";

const tmpDir = fileURLToPath(new URL("../.test-tmp-config", import.meta.url));

beforeEach(() => {
	mkdirSync(tmpDir, { recursive: true });
});

afterEach(() => {
	if (existsSync(tmpDir)) {
		rmSync(tmpDir, { recursive: true });
	}
});

describe("loadConfig", () => {
	it("returns the defaults when no config file exists", async () => {
		expect(await loadConfig(tmpDir)).toEqual(DEFAULT_CONFIG);
	});

	it("adds the dot to a bare extension", async () => {
		mkdirSync(join(tmpDir, ".rulecraft"));
		writeFileSync(join(tmpDir, ".rulecraft", "config.yaml"), "extension: mdc\n");
		expect(await loadConfig(tmpDir)).toEqual({ ...DEFAULT_CONFIG, extension: ".mdc" });
	});

	it("rethrows read errors other than a missing file", async () => {
		mkdirSync(join(tmpDir, ".rulecraft", "config.yaml"), { recursive: true });
		await expect(loadConfig(tmpDir)).rejects.toMatchObject({ code: "EISDIR" });
	});
});
