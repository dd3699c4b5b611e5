import pc from "picocolors";
import { type AcquireDeps, acquireMirror } from "../acquire";
import { ExitCode } from "../cli/exit-code";
import { symbols, ui } from "../cli/ui";
import { resolveMirrorPath } from "../paths";
import { refreshMirror } from "../refresh";
import { listMirrorFiles, mirrorExists } from "../store";
import type {
	AcquisitionOutcome,
	MirrorListing,
	MirrorSource,
} from "../types/mirror";

export type MirrorCommandOptions = {
	source: MirrorSource;
	path?: string;
	fetch: boolean;
	update: boolean;
	force: boolean;
	list: boolean;
	getPath: boolean;
	homeDir?: string;
	cwd?: string;
	logger?: (message: string) => void;
};

export type MirrorStep =
	| { intent: "fetch"; outcome: AcquisitionOutcome }
	| { intent: "update"; outcome: AcquisitionOutcome }
	| { intent: "list"; listing: MirrorListing }
	| { intent: "get-path"; path: string | null }
	| {
			intent: "default";
			existing: string | null;
			outcome: AcquisitionOutcome | null;
	  };

export type MirrorReport = {
	source: string;
	path: string;
	steps: MirrorStep[];
	exitCode: ExitCode;
};

export const hasExplicitIntent = (
	options: Pick<MirrorCommandOptions, "fetch" | "update" | "list" | "getPath">,
) => options.fetch || options.update || options.list || options.getPath;

/**
 * Run the requested intents against one source, in the fixed order
 * fetch, update, list, get-path. Without any intent the mirror is only
 * inspected, and fetched when it is missing.
 */
export const runMirrorCommand = async (
	options: MirrorCommandOptions,
	deps: AcquireDeps,
): Promise<MirrorReport> => {
	const { source, logger } = options;
	const target = resolveMirrorPath(source.defaultPath, options.path, {
		homeDir: options.homeDir,
		cwd: options.cwd,
	});
	const steps: MirrorStep[] = [];
	let exitCode: ExitCode = ExitCode.Success;

	if (!hasExplicitIntent(options)) {
		if (await mirrorExists(target)) {
			steps.push({ intent: "default", existing: target, outcome: null });
		} else {
			const outcome = await acquireMirror(
				source,
				target,
				{ force: false, logger },
				deps,
			);
			steps.push({ intent: "default", existing: null, outcome });
		}
		return { source: source.id, path: target, steps, exitCode };
	}

	if (options.fetch) {
		const outcome = await acquireMirror(
			source,
			target,
			{ force: options.force, logger },
			deps,
		);
		steps.push({ intent: "fetch", outcome });
	}
	if (options.update) {
		const outcome = await refreshMirror(source, target, { logger }, deps);
		steps.push({ intent: "update", outcome });
	}
	if (options.list) {
		const listing = await listMirrorFiles(target, source.suffix);
		steps.push({ intent: "list", listing });
	}
	if (options.getPath) {
		const present = await mirrorExists(target);
		steps.push({ intent: "get-path", path: present ? target : null });
		if (!present) {
			exitCode = ExitCode.FatalError;
		}
	}
	return { source: source.id, path: target, steps, exitCode };
};

export type OutcomeLevel = "success" | "info" | "warn" | "error";

export type OutcomeMessage = {
	level: OutcomeLevel;
	label: string;
	details?: string;
};

export const describeOutcome = (
	source: MirrorSource,
	target: string,
	intent: "fetch" | "update" | "default",
	outcome: AcquisitionOutcome,
): OutcomeMessage => {
	const location = ui.path(target);
	switch (outcome.status) {
		case "skipped-already-present":
			return {
				level: "info",
				label: `${source.label} already exists at ${location}`,
				details: "use --force to re-fetch",
			};
		case "acquired":
			return {
				level: "success",
				label: `Fetched ${source.label}`,
				details: location,
			};
		case "removed-and-reacquired":
			return {
				level: "success",
				label: `Re-fetched ${source.label}`,
				details: location,
			};
		case "pulled":
			return {
				level: "success",
				label: `Updated ${source.label}`,
				details: location,
			};
		case "not-present":
			return {
				level: "warn",
				label: `${source.label} not found at ${location}`,
				details: "use --fetch to fetch it first",
			};
		case "failed-removal":
			return {
				level: "error",
				label: `Failed to remove existing ${location}`,
				details: outcome.error,
			};
		case "failed-transfer":
			return {
				level: "error",
				label: `Failed to ${intent === "update" ? "update" : "fetch"} ${source.label}`,
				details: outcome.error,
			};
	}
};

export const stepOutcomeMessage = (
	source: MirrorSource,
	target: string,
	step: MirrorStep,
): OutcomeMessage | null => {
	switch (step.intent) {
		case "fetch":
		case "update":
			return describeOutcome(source, target, step.intent, step.outcome);
		case "default":
			if (step.outcome) {
				return describeOutcome(source, target, "default", step.outcome);
			}
			return step.existing
				? {
						level: "info",
						label: `${source.label} already exists at ${ui.path(step.existing)}`,
					}
				: null;
		default:
			return null;
	}
};

const LEVEL_SYMBOLS: Record<OutcomeLevel, string> = {
	success: symbols.success,
	info: symbols.info,
	warn: symbols.warn,
	error: symbols.error,
};

const printOutcome = (message: OutcomeMessage) => {
	const details = message.details ? ` ${pc.gray(message.details)}` : "";
	const line = `${LEVEL_SYMBOLS[message.level]} ${message.label}${details}`;
	if (message.level === "error") {
		process.stderr.write(`${line}\n`);
		return;
	}
	ui.line(line);
};

const printListing = (
	source: MirrorSource,
	target: string,
	listing: MirrorListing,
) => {
	if (listing.status === "missing") {
		ui.line(
			`${symbols.warn} ${source.label} not found at ${ui.path(target)}. Fetch it first.`,
		);
		return;
	}
	if (listing.files.length === 0) {
		ui.line(
			`${symbols.info} No ${source.suffix} files in ${ui.path(target)}`,
		);
		return;
	}
	ui.line();
	ui.line(`${pc.bold(source.label)} ${pc.gray(`(${source.suffix} files)`)}:`);
	for (const file of listing.files) {
		ui.line(`  - ${file}`);
	}
};

/**
 * Print the steps of a report. Acquire and refresh outcomes already shown
 * by a live reporter can be skipped with `skipOutcomes`.
 */
export const printMirrorReport = (
	source: MirrorSource,
	report: MirrorReport,
	options: { skipOutcomes?: boolean } = {},
) => {
	for (const step of report.steps) {
		const message = stepOutcomeMessage(source, report.path, step);
		if (message) {
			if (!options.skipOutcomes) {
				printOutcome(message);
			}
			continue;
		}
		switch (step.intent) {
			case "list":
				printListing(source, report.path, step.listing);
				break;
			case "get-path":
				// Bare path on stdout, even when silent: scripts capture it.
				if (step.path) {
					process.stdout.write(`${step.path}\n`);
				}
				break;
		}
	}
};
