import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { CircularIncludeError, UnresolvedIncludeError } from "./errors.ts";
import type { SourceReader } from "./loader.ts";
import { transformFile } from "./pipeline.ts";

const FIXTURE = fileURLToPath(new URL("../fixtures/prompts/java-guidelines.xml", import.meta.url));
const EXPECTED = fileURLToPath(new URL("../fixtures/expected/java-guidelines.md", import.meta.url));
const XI = 'xmlns:xi="http://www.w3.org/2001/XInclude"';

function memoryReader(files: Record<string, string>): SourceReader {
	return {
		exists: (path) => path in files,
		read: (path) => {
			const text = files[path];
			if (text === undefined) throw new Error(`ENOENT: ${path}`);
			return text;
		},
	};
}

function compile(xml: string, extra: Record<string, string> = {}): string {
	return transformFile("/p/main.xml", { reader: memoryReader({ "/p/main.xml": xml, ...extra }) })
		.output;
}

function rule(id: number, title: string, extra = ""): string {
	return `<rule id="${id}"><title>${title}</title><subtitle>Bar</subtitle><description>Baz.</description>${extra}</rule>`;
}

describe("transformFile", () => {
	it("matches the golden output for a document with includes", () => {
		const result = transformFile(FIXTURE);
		expect(result.output).toBe(readFileSync(EXPECTED, "utf8"));
		expect(result.sources).toEqual([
			FIXTURE,
			fileURLToPath(new URL("../fixtures/prompts/fragments/immutability.xml", import.meta.url)),
			fileURLToPath(new URL("../fixtures/prompts/fragments/catch-all.java", import.meta.url)),
		]);
	});

	it("produces identical output on repeated runs", () => {
		expect(transformFile(FIXTURE).output).toBe(transformFile(FIXTURE).output);
	});

	it("writes frontmatter, title and a rule block", () => {
		const out = compile(
			`<prompt><metadata><description>Example</description><globs>*.java</globs><always-apply>false</always-apply></metadata><header><title>Guide</title></header><sections>${rule(1, "Foo")}</sections></prompt>`,
		);
		expect(out).toBe(
			"---\ndescription: Example\nglobs: *.java\nalwaysApply: false\n---\n# Guide\n\n## Rule 1: Foo\n\nTitle: Bar\nDescription: Baz.\n",
		);
	});

	it("lists every rule in the auto table of contents, in order", () => {
		const out = compile(
			`<prompt><metadata/><header><title>G</title><toc auto-generate="true"/></header><sections>${rule(1, "One")}${rule(2, "Two")}</sections></prompt>`,
		);
		expect(out).toContain("## Table of contents\n\n- Rule 1: One\n- Rule 2: Two\n\n## Rule 1: One");
	});

	it("trims example code to its content", () => {
		const out = compile(
			`<prompt><metadata/><header><title>G</title></header><sections>${rule(1, "One", "<good-example><![CDATA[\nfoo();  \n]]></good-example>")}</sections></prompt>`,
		);
		expect(out).toContain("**Good example:**\n\n```\nfoo();\n```\n");
	});

	it("fails on a circular include naming both files", () => {
		const files = {
			"/p/a.xml": `<prompt ${XI}><xi:include href="b.xml"/></prompt>`,
			"/p/b.xml": `<fragment ${XI}><xi:include href="a.xml"/></fragment>`,
		};
		expect(() => transformFile("/p/a.xml", { reader: memoryReader(files) })).toThrow(
			new CircularIncludeError(["/p/a.xml", "/p/b.xml", "/p/a.xml"]),
		);
	});

	it("spaces instruction rules by the description's last character", () => {
		const doc = (description: string) =>
			compile(
				`<prompt><metadata/><header><title>G</title></header><sections><instructions><title>Do</title><description>${description}</description><rules><rule>One</rule></rules></instructions></sections></prompt>`,
			);
		expect(doc("Follow these:")).toContain("## Do\n\nFollow these:\n- One\n");
		expect(doc("Follow these.")).toContain("## Do\n\nFollow these.\n\n- One\n");
	});

	it("ignores source indentation outside verbatim content", () => {
		const compact = compile(
			`<prompt><metadata><globs>*.ts</globs></metadata><header><title>G</title><description>One line.</description></header><sections>${rule(3, "X")}</sections></prompt>`,
		);
		const indented = compile(`<prompt>
	<metadata>
		<globs>
			*.ts
		</globs>
	</metadata>
	<header>
		<title>  G  </title>
		<description>
			One
			line.
		</description>
	</header>
	<sections>
		<rule id=" 3 ">
			<title>X</title>
			<subtitle>Bar</subtitle>
			<description>Baz.</description>
		</rule>
	</sections>
</prompt>
`);
		expect(indented).toBe(compact);
	});

	it("decodes character references in authored text", () => {
		const out = compile(
			"<prompt><metadata/><header><title>A &#60;b&#62; &#x2014; c</title></header></prompt>",
		);
		expect(out).toContain("\n# A <b> \u2014 c\n");
	});

	it("separates a template ending in blank lines by exactly one blank line", () => {
		const out = compile(
			`<prompt><metadata/><header><title>G</title></header><sections><template><title>X</title><body><![CDATA[line\n\n\n]]></body></template>${rule(1, "R")}</sections></prompt>`,
		);
		expect(out).toContain("## X\n\nline\n\n## Rule 1: R\n");
		expect(out).not.toMatch(/\n{3}/);
	});

	it("fails the whole document when an include is unresolved", () => {
		expect(() =>
			compile(`<prompt ${XI}><metadata/><header><title>G</title></header><sections><xi:include href="missing.xml"/></sections></prompt>`),
		).toThrow(UnresolvedIncludeError);
	});

	it("composes fragment wrappers into the section list", () => {
		const out = compile(
			`<prompt ${XI}><metadata/><header><title>G</title><toc auto-generate="true"/></header><sections><xi:include href="rules.xml"/></sections></prompt>`,
			{ "/p/rules.xml": `<fragment>${rule(1, "A")}${rule(2, "B")}</fragment>` },
		);
		expect(out).toContain("- Rule 1: A\n- Rule 2: B");
	});
});
