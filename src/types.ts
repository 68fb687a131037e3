export interface Metadata {
	readonly description?: string;
	readonly globs?: string;
	readonly alwaysApply?: boolean;
}

export type TableOfContents =
	| { readonly mode: "auto" }
	| { readonly mode: "explicit"; readonly entries: readonly string[] };

export interface CodeBlock {
	readonly language?: string;
	/** Raw text as authored; trimmed by normalizeCode at render time. */
	readonly content: string;
}

export interface Note {
	readonly term: string;
	readonly description: string;
}

export interface RuleSection {
	readonly kind: "rule";
	readonly id: number;
	readonly title: string;
	readonly subtitle: string;
	readonly description: string;
	readonly notes: readonly Note[];
	readonly goodExample?: CodeBlock;
	readonly badExample?: CodeBlock;
}

export interface TemplateSection {
	readonly kind: "template";
	readonly title: string;
	readonly description?: string;
	readonly body: string;
}

export interface QuestionOption {
	readonly text: string;
	readonly description?: string;
}

export interface QuestionSection {
	readonly kind: "question";
	readonly title: string;
	readonly subtitle?: string;
	readonly description?: string;
	readonly options: readonly QuestionOption[];
}

export interface WorkflowStep {
	readonly number: number;
	readonly title: string;
	readonly description?: string;
	readonly code?: CodeBlock;
}

export interface WorkflowSection {
	readonly kind: "workflow";
	readonly title: string;
	readonly subtitle?: string;
	readonly description?: string;
	readonly steps: readonly WorkflowStep[];
}

export interface Restrictions {
	readonly description?: string;
	readonly items: readonly string[];
}

interface DirectiveBody {
	readonly title: string;
	readonly description?: string;
	readonly restrictions?: Restrictions;
	readonly rules: readonly string[];
}

export interface InstructionSection extends DirectiveBody {
	readonly kind: "instructions";
}

export interface OutputRequirementsSection extends DirectiveBody {
	readonly kind: "output-requirements";
}

export type ContentSection =
	| RuleSection
	| TemplateSection
	| QuestionSection
	| WorkflowSection
	| InstructionSection
	| OutputRequirementsSection;

export interface PromptDocument {
	readonly source: string;
	readonly metadata: Metadata;
	readonly title: string;
	readonly role?: string;
	readonly description?: string;
	readonly toc?: TableOfContents;
	readonly sections: readonly ContentSection[];
}

export interface Config {
	sourceDir: string;
	outDir: string;
	extension: string;
}

/**
 * Thrown by commands instead of process.exit(1) so the CLI entry point
 * decides the exit status after output has been flushed.
 */
export class ExitError extends Error {
	constructor(public readonly exitCode: number = 1) {
		super("");
	}
}

export const CONFIG_DIR = ".rulecraft";
export const CONFIG_FILE = "config.yaml";
export const DEFAULT_CONFIG: Readonly<Config> = {
	sourceDir: "prompts",
	outDir: "rules",
	extension: ".md",
};
