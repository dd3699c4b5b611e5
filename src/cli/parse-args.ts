import process from "node:process";

import cac from "cac";
import type { CliOptions } from "./types";

export type ParsedArgs = {
	source: string | null;
	options: CliOptions;
	rawArgs: string[];
	help: boolean;
};

const VALUE_FLAGS = new Set(["--config", "--path", "--timeout-ms"]);
const BOOLEAN_FLAGS = new Set([
	"--fetch",
	"--clone",
	"--update",
	"--force",
	"--list",
	"--get-path",
	"--json",
	"--silent",
	"--verbose",
	"--help",
	"-h",
]);

const readString = (value: unknown): string | undefined => {
	if (value === undefined || value === null || value === true) {
		return undefined;
	}
	return String(value);
};

const readPositiveNumber = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed < 1) {
		throw new Error(`${flag} must be a positive number.`);
	}
	return parsed;
};

const assertKnownFlags = (rawArgs: string[]) => {
	for (const arg of rawArgs) {
		if (arg === "--") {
			return;
		}
		if (!arg.startsWith("-") || arg === "-") {
			continue;
		}
		const [flag] = arg.split("=");
		if (!VALUE_FLAGS.has(flag) && !BOOLEAN_FLAGS.has(flag)) {
			throw new Error(`Unknown option '${flag}'.`);
		}
	}
};

const assertValue = (value: unknown, flag: string) => {
	if (value === true || value === "") {
		throw new Error(`${flag} expects a value.`);
	}
};

const buildOptions = (parsed: Record<string, unknown>): CliOptions => {
	assertValue(parsed.config, "--config");
	assertValue(parsed.path, "--path");
	assertValue(parsed.timeoutMs, "--timeout-ms");
	return {
		config: readString(parsed.config),
		path: readString(parsed.path),
		fetch: Boolean(parsed.fetch) || Boolean(parsed.clone),
		update: Boolean(parsed.update),
		force: Boolean(parsed.force),
		list: Boolean(parsed.list),
		getPath: Boolean(parsed.getPath),
		json: Boolean(parsed.json),
		silent: Boolean(parsed.silent),
		verbose: Boolean(parsed.verbose),
		timeoutMs: readPositiveNumber(parsed.timeoutMs, "--timeout-ms"),
	};
};

/**
 * Parse `refmirror <source> [options]`. Throws on unknown flags, missing
 * values and extra positionals.
 */
export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac("refmirror");

	cli
		.option("--fetch", "Fetch the mirror when it is missing")
		.option("--clone", "Alias of --fetch")
		.option("--update", "Refresh an existing mirror")
		.option("--force", "Remove and re-fetch an existing mirror")
		.option("--path <path>", "Custom mirror directory")
		.option("--list", "List content files of the mirror")
		.option("--get-path", "Print the mirror path, exit 1 when missing")
		.option("--config <path>", "Path to config file")
		.option("--timeout-ms <n>", "Transfer timeout in milliseconds")
		.option("--json", "Output JSON")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Show transfer commands and output");

	const rawArgs = argv.slice(2);
	assertKnownFlags(rawArgs);
	const result = cli.parse(argv, { run: false });
	const positionals = result.args.map(String);
	if (positionals.length > 1) {
		throw new Error(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
	}
	return {
		source: positionals[0] ?? null,
		options: buildOptions(result.options),
		rawArgs,
		help: Boolean(result.options.help) || Boolean(result.options.h),
	};
};
