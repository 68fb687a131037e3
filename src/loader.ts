import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import {
	CircularIncludeError,
	DocumentNotFoundError,
	MalformedDocumentError,
	UnresolvedIncludeError,
} from "./errors.ts";
import type { XmlElement, XmlNode } from "./xml.ts";
import { cloneElement, localName, parseXml, withChildren } from "./xml.ts";

export interface SourceReader {
	exists(path: string): boolean;
	read(path: string): string;
}

export const fsReader: SourceReader = {
	exists: (path) => existsSync(path),
	read: (path) => readFileSync(path, "utf8"),
};

export interface LoadOptions {
	reader?: SourceReader;
}

export interface ComposedDocument {
	/** Resolved path of the root document. */
	path: string;
	root: XmlElement;
	/** Every file read during composition, root first, in first-use order. */
	sources: string[];
}

type Fragment = { kind: "xml"; root: XmlElement } | { kind: "text"; text: string };

/**
 * Parsed fragments keyed by resolved path, scoped to one composition run.
 * Splice points never receive the cached tree itself, only copies of it.
 */
class FragmentArena {
	private readonly entries = new Map<string, Fragment>();

	constructor(private readonly reader: SourceReader) {}

	get paths(): string[] {
		return [...this.entries.keys()];
	}

	xml(path: string): XmlElement {
		const cached = this.entries.get(path);
		if (cached?.kind === "xml") return cached.root;
		const root = parseXml(this.reader.read(path), path);
		this.entries.set(path, { kind: "xml", root });
		return root;
	}

	text(path: string): string {
		const cached = this.entries.get(path);
		if (cached?.kind === "text") return cached.text;
		const text = this.reader.read(path);
		this.entries.set(path, { kind: "text", text });
		return text;
	}
}

function isInclude(node: XmlNode): node is XmlElement {
	return node.type === "element" && localName(node.name) === "include";
}

/**
 * Load a root document and splice every include directive, recursively,
 * until no directive remains.
 */
export function loadDocument(rootPath: string, options: LoadOptions = {}): ComposedDocument {
	const reader = options.reader ?? fsReader;
	const path = resolve(rootPath);
	if (!reader.exists(path)) {
		throw new DocumentNotFoundError(path);
	}

	const arena = new FragmentArena(reader);
	const root = cloneElement(arena.xml(path), [path]);

	return { path, root: resolveElement(root, [path], arena, reader), sources: arena.paths };
}

function resolveElement(
	el: XmlElement,
	stack: readonly string[],
	arena: FragmentArena,
	reader: SourceReader,
): XmlElement {
	const children: XmlNode[] = [];
	for (const child of el.children) {
		if (isInclude(child)) {
			children.push(...expandInclude(child, stack, arena, reader));
		} else if (child.type === "element") {
			children.push(resolveElement(child, stack, arena, reader));
		} else {
			children.push(child);
		}
	}
	return withChildren(el, children);
}

function expandInclude(
	directive: XmlElement,
	stack: readonly string[],
	arena: FragmentArena,
	reader: SourceReader,
): XmlNode[] {
	const referencing = stack[stack.length - 1] ?? directive.origin.path;
	const href = directive.attributes.href;
	if (!href) {
		throw new MalformedDocumentError(referencing, `<${directive.name}> without href`);
	}

	const target = isAbsolute(href) ? resolve(href) : resolve(dirname(referencing), href);
	if (stack.includes(target)) {
		throw new CircularIncludeError([...stack, target]);
	}
	if (!reader.exists(target)) {
		throw new UnresolvedIncludeError(target, referencing, [...stack, target]);
	}

	const chain = [...stack, target];

	if (directive.attributes.parse === "text") {
		return [{ type: "text", value: arena.text(target), verbatim: true }];
	}

	const copy = cloneElement(arena.xml(target), chain);
	const resolved = resolveElement(copy, chain, arena, reader);

	// <fragment> is a wrapper: its children are spliced, not the element itself
	return resolved.name === "fragment" ? [...resolved.children] : [resolved];
}
