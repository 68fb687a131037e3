import { assembleDocument } from "./assemble.ts";
import type { ComposedDocument, LoadOptions } from "./loader.ts";
import { loadDocument } from "./loader.ts";
import { mapDocument } from "./mapper.ts";
import type { PromptDocument } from "./types.ts";

export interface CompileResult {
	document: PromptDocument;
	output: string;
	/** Files read to produce the output, root first. */
	sources: string[];
}

export function compileDocument(composed: ComposedDocument): CompileResult {
	const document = mapDocument(composed);
	return { document, output: assembleDocument(document), sources: composed.sources };
}

/**
 * Load, map, render and assemble one prompt document. Either the whole
 * artifact comes back or the first error is thrown.
 */
export function transformFile(path: string, options: LoadOptions = {}): CompileResult {
	return compileDocument(loadDocument(path, options));
}
