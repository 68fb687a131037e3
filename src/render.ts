import { UnknownSectionKindError } from "./errors.ts";
import { normalizeCode } from "./normalize.ts";
import type {
	CodeBlock,
	ContentSection,
	InstructionSection,
	OutputRequirementsSection,
	QuestionSection,
	RuleSection,
	TemplateSection,
	WorkflowSection,
} from "./types.ts";

// Render functions return fragments without a trailing newline. Spacing
// between sections is the assembler's job.

function fence(code: CodeBlock): string {
	return `\`\`\`${code.language ?? ""}\n${normalizeCode(code.content)}\n\`\`\``;
}

function heading(title: string, subtitle?: string): string {
	return subtitle ? `## ${title}: ${subtitle}` : `## ${title}`;
}

function bullets(items: readonly string[]): string {
	return items.map((item) => `- ${item}`).join("\n");
}

/**
 * A paragraph that introduces a list. Text ending in ":" is followed by a
 * single newline so the list attaches to it; anything else gets a blank line.
 */
function leadIn(text: string): string {
	// TODO: replace the punctuation check with an explicit list-attachment attribute on <description>
	return text.endsWith(":") ? `${text}\n` : `${text}\n\n`;
}

function stripTrailingNewlines(text: string): string {
	return text.replace(/\n+$/, "");
}

export function renderRule(section: RuleSection): string {
	const blocks = [
		`## Rule ${section.id}: ${section.title}`,
		`Title: ${section.subtitle}\nDescription: ${section.description}`,
	];
	if (section.notes.length > 0) {
		blocks.push(section.notes.map((n) => `- **${n.term}**: ${n.description}`).join("\n"));
	}
	if (section.goodExample) {
		blocks.push("**Good example:**", fence(section.goodExample));
	}
	if (section.badExample) {
		blocks.push("**Bad example:**", fence(section.badExample));
	}
	return blocks.join("\n\n");
}

export function renderTemplate(section: TemplateSection): string {
	const blocks = [heading(section.title)];
	if (section.description) blocks.push(section.description);
	// unfenced, so no blank lines at its edges
	const body = normalizeCode(section.body).replace(/^\n+|\n+$/g, "");
	if (body) blocks.push(body);
	return blocks.join("\n\n");
}

export function renderQuestion(section: QuestionSection): string {
	const blocks = [heading(section.title, section.subtitle)];
	if (section.description) blocks.push(section.description);
	if (section.options.length > 0) {
		blocks.push(
			bullets(section.options.map((o) => (o.description ? `${o.text}: ${o.description}` : o.text))),
		);
	}
	return blocks.join("\n\n");
}

export function renderWorkflow(section: WorkflowSection): string {
	const blocks = [heading(section.title, section.subtitle)];
	if (section.description) blocks.push(section.description);
	for (const step of section.steps) {
		blocks.push(`### Step ${step.number}: ${step.title}`);
		if (step.description) blocks.push(step.description);
		if (step.code) blocks.push(fence(step.code));
	}
	return blocks.join("\n\n");
}

export function renderDirective(section: InstructionSection | OutputRequirementsSection): string {
	let out = `${heading(section.title)}\n\n`;
	if (section.description) out += leadIn(section.description);

	const { restrictions } = section;
	if (restrictions) {
		out += "### Restrictions\n\n";
		if (restrictions.description) out += leadIn(restrictions.description);
		if (restrictions.items.length > 0) out += `${bullets(restrictions.items)}\n\n`;
	}

	if (section.rules.length > 0) out += bullets(section.rules);
	return stripTrailingNewlines(out);
}

function unknownKind(section: never, source: string): never {
	const value: unknown = section;
	const kind =
		typeof value === "object" && value !== null && "kind" in value ? String(value.kind) : "?";
	throw new UnknownSectionKindError(source, `sections/${kind}`, kind);
}

/**
 * Render one section to its markdown fragment. The switch is exhaustive over
 * the closed kind set; the default branch only fires for values built
 * outside the type system.
 */
export function renderSection(section: ContentSection, source = ""): string {
	switch (section.kind) {
		case "rule":
			return renderRule(section);
		case "template":
			return renderTemplate(section);
		case "question":
			return renderQuestion(section);
		case "workflow":
			return renderWorkflow(section);
		case "instructions":
		case "output-requirements":
			return renderDirective(section);
		default:
			return unknownKind(section, source);
	}
}
