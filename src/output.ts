import chalk from "chalk";

let quiet = false;
let verbose = false;

export function setQuiet(value: boolean): void {
	quiet = value;
}

export function setVerbose(value: boolean): void {
	verbose = value;
}

export function jsonOut(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

export function humanOut(text: string): void {
	if (quiet) return;
	console.log(text);
}

/** Raw artifact text; never suppressed by --quiet. */
export function rawOut(text: string): void {
	process.stdout.write(text);
}

export function errorOut(msg: string): void {
	console.error(msg);
}

export function debugOut(msg: string): void {
	if (!verbose) return;
	console.error(chalk.dim(`[debug] ${msg}`));
}

export function isJsonMode(args: string[]): boolean {
	return args.includes("--json");
}

// chalk handles NO_COLOR and TTY detection automatically
export const palette = {
	brand: chalk.rgb(94, 53, 177), // deep violet
	accent: chalk.rgb(255, 183, 77), // amber for paths
	muted: chalk.rgb(120, 120, 110),
};

export const c = {
	dim: (s: string) => chalk.dim(s),
	green: (s: string) => chalk.green(s),
	red: (s: string) => chalk.red(s),
};

export const fmt = {
	success: (msg: string) => `${chalk.green.bold("✓")} ${msg}`,
	path: (p: string) => palette.accent(p),
	error: (msg: string, hint?: string) =>
		hint
			? `${chalk.red.bold("✗")} ${chalk.red(msg)} ${chalk.dim(hint)}`
			: `${chalk.red.bold("✗")} ${chalk.red(msg)}`,
	info: (msg: string) => chalk.dim(`  ${msg}`),
};
