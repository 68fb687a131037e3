/**
 * Error taxonomy for the compile pipeline.
 *
 * StructuralError covers sources that cannot be composed into one tree
 * (malformed XML, missing or circular includes). SchemaError covers composed
 * trees that do not fit the prompt vocabulary.
 */

export type ErrorCategory = "structural" | "schema";

export class PipelineError extends Error {
	constructor(
		message: string,
		public readonly category: ErrorCategory,
		public readonly sourcePath: string,
		public readonly includeChain: readonly string[] = [],
	) {
		super(message);
		this.name = new.target.name;
	}
}

export class StructuralError extends PipelineError {
	constructor(message: string, sourcePath: string, includeChain: readonly string[] = []) {
		super(message, "structural", sourcePath, includeChain);
	}
}

export class SchemaError extends PipelineError {
	constructor(
		message: string,
		sourcePath: string,
		public readonly elementPath: string,
		includeChain: readonly string[] = [],
	) {
		super(message, "schema", sourcePath, includeChain);
	}
}

export class MalformedDocumentError extends StructuralError {
	constructor(
		sourcePath: string,
		public readonly reason: string,
		public readonly line?: number,
		public readonly column?: number,
	) {
		const at = line !== undefined ? `:${line}:${column ?? 0}` : "";
		super(`Malformed document ${sourcePath}${at}: ${reason}`, sourcePath);
	}
}

export class DocumentNotFoundError extends StructuralError {
	constructor(sourcePath: string) {
		super(`Document "${sourcePath}" not found`, sourcePath);
	}
}

export class UnresolvedIncludeError extends StructuralError {
	constructor(
		public readonly fragmentPath: string,
		public readonly referencingPath: string,
		includeChain: readonly string[],
	) {
		super(
			`Included fragment "${fragmentPath}" not found (referenced from "${referencingPath}")`,
			referencingPath,
			includeChain,
		);
	}
}

export class CircularIncludeError extends StructuralError {
	constructor(public readonly cycle: readonly string[]) {
		super(`Circular include: ${cycle.join(" → ")}`, cycle[0] ?? "", cycle);
	}
}

export class MissingRequiredElementError extends SchemaError {
	constructor(sourcePath: string, elementPath: string, includeChain: readonly string[] = []) {
		super(
			`Missing required element "${elementPath}" in ${sourcePath}`,
			sourcePath,
			elementPath,
			includeChain,
		);
	}
}

export class InvalidElementValueError extends SchemaError {
	constructor(
		sourcePath: string,
		elementPath: string,
		value: string,
		expected: string,
		includeChain: readonly string[] = [],
	) {
		super(
			`Invalid value "${value}" for "${elementPath}" in ${sourcePath}: expected ${expected}`,
			sourcePath,
			elementPath,
			includeChain,
		);
	}
}

export class DuplicateRuleIdError extends SchemaError {
	constructor(
		sourcePath: string,
		elementPath: string,
		public readonly ruleId: number,
		includeChain: readonly string[] = [],
	) {
		super(
			`Duplicate rule id ${ruleId} at "${elementPath}" in ${sourcePath}`,
			sourcePath,
			elementPath,
			includeChain,
		);
	}
}

export class UnknownSectionKindError extends SchemaError {
	constructor(
		sourcePath: string,
		elementPath: string,
		public readonly kind: string,
		includeChain: readonly string[] = [],
	) {
		super(
			`Unknown section kind "${kind}" at "${elementPath}" in ${sourcePath}`,
			sourcePath,
			elementPath,
			includeChain,
		);
	}
}

/**
 * One-line-per-fact description for build reports: the message, then the
 * inclusion chain when the failure happened inside an included fragment.
 */
export function describeError(err: unknown): string[] {
	if (err instanceof PipelineError) {
		const lines = [`${err.name}: ${err.message}`];
		if (err.includeChain.length > 1) {
			lines.push(`include chain: ${err.includeChain.join(" → ")}`);
		}
		return lines;
	}
	return [err instanceof Error ? err.message : String(err)];
}
