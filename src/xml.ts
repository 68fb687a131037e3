import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedDocumentError } from "./errors.ts";

/** Where a node was authored: its file and the include chain that reached it. */
export interface NodeOrigin {
	readonly path: string;
	readonly chain: readonly string[];
}

export interface XmlElement {
	readonly type: "element";
	readonly name: string;
	readonly attributes: Readonly<Record<string, string>>;
	readonly children: readonly XmlNode[];
	readonly origin: NodeOrigin;
}

export interface XmlText {
	readonly type: "text";
	readonly value: string;
	/** CDATA sections and text-mode includes; never whitespace-collapsed as a block. */
	readonly verbatim: boolean;
}

export type XmlNode = XmlElement | XmlText;

// fast-xml-parser keys in preserveOrder mode
const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";
const CDATA_KEY = "#cdata";

const parser = new XMLParser({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: "",
	textNodeName: TEXT_KEY,
	cdataPropName: CDATA_KEY,
	trimValues: false,
	parseTagValue: false,
	parseAttributeValue: false,
	// decimal and hex character references (&#60; &#x2014;) in text and attributes
	htmlEntities: true,
	ignoreDeclaration: true,
	ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
	const attributes: Record<string, string> = {};
	if (!isRecord(raw)) return attributes;
	for (const [key, value] of Object.entries(raw)) {
		attributes[key] = String(value);
	}
	return attributes;
}

function collectText(raw: unknown): string {
	if (!Array.isArray(raw)) return typeof raw === "string" ? raw : "";
	let text = "";
	for (const entry of raw) {
		if (isRecord(entry) && TEXT_KEY in entry) {
			text += String(entry[TEXT_KEY]);
		}
	}
	return text;
}

function convert(raw: unknown, origin: NodeOrigin): XmlNode[] {
	if (!Array.isArray(raw)) return [];
	const nodes: XmlNode[] = [];

	for (const entry of raw) {
		if (!isRecord(entry)) continue;
		for (const [key, value] of Object.entries(entry)) {
			if (key === ATTRS_KEY) continue;
			if (key === TEXT_KEY) {
				nodes.push({ type: "text", value: String(value), verbatim: false });
			} else if (key === CDATA_KEY) {
				nodes.push({ type: "text", value: collectText(value), verbatim: true });
			} else {
				nodes.push({
					type: "element",
					name: key,
					attributes: readAttributes(entry[ATTRS_KEY]),
					children: convert(value, origin),
					origin,
				});
			}
		}
	}

	return nodes;
}

/**
 * Parse one XML document into an element tree. Comments, processing
 * instructions and the XML declaration are dropped; text is kept untrimmed.
 */
export function parseXml(text: string, path: string): XmlElement {
	const validation = XMLValidator.validate(text);
	if (validation !== true) {
		const { msg, line, col } = validation.err;
		throw new MalformedDocumentError(path, msg, line, col);
	}

	const nodes = convert(parser.parse(text), { path, chain: [path] });
	const root = nodes.find((n): n is XmlElement => n.type === "element");
	if (!root) {
		throw new MalformedDocumentError(path, "no root element");
	}
	return root;
}

export function localName(name: string): string {
	const idx = name.indexOf(":");
	return idx === -1 ? name : name.slice(idx + 1);
}

export function childElements(el: XmlElement): XmlElement[] {
	return el.children.filter((n): n is XmlElement => n.type === "element");
}

export function findChild(el: XmlElement, name: string): XmlElement | undefined {
	return childElements(el).find((c) => c.name === name);
}

export function findChildren(el: XmlElement, name: string): XmlElement[] {
	return childElements(el).filter((c) => c.name === name);
}

export function withChildren(el: XmlElement, children: readonly XmlNode[]): XmlElement {
	return { ...el, attributes: { ...el.attributes }, children };
}

/** Deep copy with every element re-attributed to a new origin chain. */
export function cloneElement(el: XmlElement, chain?: readonly string[]): XmlElement {
	return {
		type: "element",
		name: el.name,
		attributes: { ...el.attributes },
		children: el.children.map((c) => (c.type === "text" ? { ...c } : cloneElement(c, chain))),
		origin: chain ? { path: el.origin.path, chain } : el.origin,
	};
}
