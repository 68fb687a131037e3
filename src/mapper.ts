import {
	DuplicateRuleIdError,
	InvalidElementValueError,
	MissingRequiredElementError,
	UnknownSectionKindError,
} from "./errors.ts";
import type { ComposedDocument } from "./loader.ts";
import { collapseWhitespace } from "./normalize.ts";
import type {
	CodeBlock,
	ContentSection,
	InstructionSection,
	Metadata,
	Note,
	PromptDocument,
	QuestionOption,
	QuestionSection,
	Restrictions,
	RuleSection,
	TableOfContents,
	TemplateSection,
	WorkflowSection,
	WorkflowStep,
} from "./types.ts";
import type { XmlElement, XmlNode, XmlText } from "./xml.ts";
import { childElements, findChild, findChildren } from "./xml.ts";

// --- Text capture ---

function inlineText(node: XmlNode): string {
	if (node.type === "text") return node.value;
	if (node.name === "code") {
		return `\`${collapseWhitespace(node.children.map(inlineText).join(""))}\``;
	}
	return node.children.map(inlineText).join("");
}

function leafText(el: XmlElement): string {
	return collapseWhitespace(inlineText(el));
}

/**
 * Code content byte-for-byte. When the element holds CDATA (or a text-mode
 * include), the whitespace-only indentation around it is markup, not code.
 */
function verbatimText(el: XmlElement): string {
	const texts = el.children.filter((n): n is XmlText => n.type === "text");
	const hasVerbatim = texts.some((t) => t.verbatim);
	return texts
		.filter((t) => !hasVerbatim || t.verbatim || t.value.trim() !== "")
		.map((t) => t.value)
		.join("");
}

// --- Element access with path-aware errors ---

function missing(el: XmlElement, path: string): MissingRequiredElementError {
	return new MissingRequiredElementError(el.origin.path, path, el.origin.chain);
}

function invalid(el: XmlElement, path: string, value: string, expected: string) {
	return new InvalidElementValueError(el.origin.path, path, value, expected, el.origin.chain);
}

function requireChild(parent: XmlElement, name: string, path: string): XmlElement {
	const child = findChild(parent, name);
	if (!child) throw missing(parent, `${path}/${name}`);
	return child;
}

function requireText(parent: XmlElement, name: string, path: string): string {
	return leafText(requireChild(parent, name, path));
}

function optionalText(parent: XmlElement, name: string): string | undefined {
	const child = findChild(parent, name);
	if (!child) return undefined;
	return leafText(child) || undefined;
}

function optionalCode(parent: XmlElement, name: string): CodeBlock | undefined {
	const child = findChild(parent, name);
	if (!child) return undefined;
	const language = child.attributes.language?.trim();
	return { language: language || undefined, content: verbatimText(child) };
}

function parsePositiveInt(raw: string): number | undefined {
	const trimmed = raw.trim();
	if (!/^\d+$/.test(trimmed)) return undefined;
	const value = Number.parseInt(trimmed, 10);
	return value > 0 && Number.isSafeInteger(value) ? value : undefined;
}

function listItems(parent: XmlElement, container: string, item: string): string[] {
	const list = findChild(parent, container);
	return list ? findChildren(list, item).map(leafText) : [];
}

function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) deepFreeze(child);
	}
	return value;
}

// --- Header ---

function mapMetadata(root: XmlElement): Metadata {
	const metadata = requireChild(root, "metadata", "prompt");
	const rawApply = optionalText(metadata, "always-apply");
	let alwaysApply: boolean | undefined;
	if (rawApply === "true") alwaysApply = true;
	else if (rawApply === "false") alwaysApply = false;
	else if (rawApply !== undefined) {
		throw invalid(metadata, "prompt/metadata/always-apply", rawApply, "true or false");
	}

	return {
		description: optionalText(metadata, "description"),
		globs: optionalText(metadata, "globs"),
		alwaysApply,
	};
}

function mapToc(header: XmlElement): TableOfContents | undefined {
	const toc = findChild(header, "toc");
	if (!toc) return undefined;

	const auto = toc.attributes["auto-generate"];
	if (auto !== undefined && auto !== "true" && auto !== "false") {
		throw invalid(toc, "prompt/header/toc/@auto-generate", auto, "true or false");
	}
	if (auto === "true") return { mode: "auto" };

	const entries = findChildren(toc, "entry").map(leafText);
	return entries.length > 0 ? { mode: "explicit", entries } : undefined;
}

// --- Sections ---

function mapNote(note: XmlElement, path: string): Note {
	// <note><term/><description/></note> wins over <note term="...">text</note>
	const termChild = findChild(note, "term");
	if (termChild) {
		return { term: leafText(termChild), description: optionalText(note, "description") ?? "" };
	}
	const term = note.attributes.term;
	if (term === undefined) throw missing(note, `${path}/term`);
	return { term: collapseWhitespace(term), description: leafText(note) };
}

function mapRule(el: XmlElement, path: string): RuleSection {
	const rawId = el.attributes.id;
	if (rawId === undefined) throw missing(el, `${path}/@id`);
	const id = parsePositiveInt(rawId);
	if (id === undefined) throw invalid(el, `${path}/@id`, rawId, "a positive integer");

	const notesEl = findChild(el, "notes");
	const notes = notesEl
		? findChildren(notesEl, "note").map((n, i) => mapNote(n, `${path}/notes/note[${i + 1}]`))
		: [];

	return {
		kind: "rule",
		id,
		title: requireText(el, "title", path),
		subtitle: requireText(el, "subtitle", path),
		description: requireText(el, "description", path),
		notes,
		goodExample: optionalCode(el, "good-example"),
		badExample: optionalCode(el, "bad-example"),
	};
}

function mapTemplate(el: XmlElement, path: string): TemplateSection {
	const title = requireText(el, "title", path);
	const body = requireChild(el, "body", path);
	return {
		kind: "template",
		title,
		description: optionalText(el, "description"),
		body: verbatimText(body),
	};
}

function mapOption(option: XmlElement, path: string): QuestionOption {
	// <option><text/><description/></option> wins over <option>text</option>
	const textChild = findChild(option, "text");
	const text = textChild ? leafText(textChild) : leafText(option);
	if (!text) throw missing(option, `${path}/text`);
	return { text, description: textChild ? optionalText(option, "description") : undefined };
}

function mapQuestion(el: XmlElement, path: string): QuestionSection {
	const options = findChild(el, "options");
	return {
		kind: "question",
		title: requireText(el, "title", path),
		subtitle: optionalText(el, "subtitle"),
		description: optionalText(el, "description"),
		options: options
			? findChildren(options, "option").map((o, i) => mapOption(o, `${path}/options/option[${i + 1}]`))
			: [],
	};
}

function mapStep(step: XmlElement, position: number, path: string): WorkflowStep {
	const rawNumber = step.attributes.number;
	let number = position;
	if (rawNumber !== undefined) {
		const parsed = parsePositiveInt(rawNumber);
		if (parsed === undefined) throw invalid(step, `${path}/@number`, rawNumber, "a positive integer");
		number = parsed;
	}
	return {
		number,
		title: requireText(step, "title", path),
		description: optionalText(step, "description"),
		code: optionalCode(step, "code"),
	};
}

function mapWorkflow(el: XmlElement, path: string): WorkflowSection {
	const steps = findChild(el, "steps");
	return {
		kind: "workflow",
		title: requireText(el, "title", path),
		subtitle: optionalText(el, "subtitle"),
		description: optionalText(el, "description"),
		steps: steps
			? findChildren(steps, "step").map((s, i) => mapStep(s, i + 1, `${path}/steps/step[${i + 1}]`))
			: [],
	};
}

function mapRestrictions(el: XmlElement): Restrictions | undefined {
	const restrictions = findChild(el, "restrictions");
	if (!restrictions) return undefined;
	return {
		description: optionalText(restrictions, "description"),
		items: findChildren(restrictions, "restriction").map(leafText),
	};
}

function mapDirective<K extends "instructions" | "output-requirements">(
	kind: K,
	el: XmlElement,
	path: string,
): { kind: K } & Omit<InstructionSection, "kind"> {
	// <header><title/></header> wins over a direct <title/>
	const header = findChild(el, "header");
	const titleEl = (header && findChild(header, "title")) ?? findChild(el, "title");
	if (!titleEl) throw missing(el, `${path}/title`);

	return {
		kind,
		title: leafText(titleEl),
		description: optionalText(el, "description"),
		restrictions: mapRestrictions(el),
		rules: listItems(el, "rules", "rule"),
	};
}

function mapSection(el: XmlElement, path: string): ContentSection {
	switch (el.name) {
		case "rule":
			return mapRule(el, path);
		case "template":
			return mapTemplate(el, path);
		case "question":
			return mapQuestion(el, path);
		case "workflow":
			return mapWorkflow(el, path);
		case "instructions":
			return mapDirective("instructions", el, path);
		case "output-requirements":
			return mapDirective("output-requirements", el, path);
		default:
			throw new UnknownSectionKindError(el.origin.path, path, el.name, el.origin.chain);
	}
}

function mapSections(root: XmlElement): ContentSection[] {
	const container = findChild(root, "sections");
	if (!container) return [];

	const sections: ContentSection[] = [];
	const counters = new Map<string, number>();
	const ruleIds = new Map<number, string>();

	for (const el of childElements(container)) {
		const index = (counters.get(el.name) ?? 0) + 1;
		counters.set(el.name, index);
		const path = `prompt/sections/${el.name}[${index}]`;

		const section = mapSection(el, path);
		if (section.kind === "rule") {
			if (ruleIds.has(section.id)) {
				throw new DuplicateRuleIdError(el.origin.path, path, section.id, el.origin.chain);
			}
			ruleIds.set(section.id, path);
		}
		sections.push(section);
	}

	return sections;
}

/**
 * Map a composed tree onto the prompt vocabulary. Unknown elements are
 * ignored except directly under <sections>, where the kind set is closed.
 */
export function mapDocument(composed: ComposedDocument): PromptDocument {
	const { root } = composed;
	if (root.name !== "prompt") {
		throw missing(root, "prompt");
	}

	const metadata = mapMetadata(root);
	const header = requireChild(root, "header", "prompt");

	return deepFreeze({
		source: composed.path,
		metadata,
		title: requireText(header, "title", "prompt/header"),
		role: optionalText(header, "role"),
		description: optionalText(header, "description"),
		toc: mapToc(header),
		sections: mapSections(root),
	});
}
