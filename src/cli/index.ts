import process from "node:process";
import pc from "picocolors";
import {
	hasExplicitIntent,
	type MirrorReport,
	printMirrorReport,
	runMirrorCommand,
	stepOutcomeMessage,
} from "../commands/mirror";
import { loadConfig, type MirrorConfig } from "../config";
import { defaultRootDir } from "../paths";
import { createTransfer } from "../transfer";
import type { MirrorSource } from "../types/mirror";
import { ExitCode } from "./exit-code";
import { type ParsedArgs, parseArgs } from "./parse-args";
import { TaskReporter } from "./task-reporter";
import type { CliOptions } from "./types";
import { setSilentMode, ui } from "./ui";

export const CLI_NAME = "refmirror";

const HELP_TEXT = `
Usage: ${CLI_NAME} <source> [options]

Sources:
  docs    OpenCode documentation (site mirror, *.html)
  wiki    tmux wiki (git clone, *.md)
  (more can be declared in refmirror.config.json)

Without options the mirror path is reported, or the mirror is fetched
when it is missing.

Options:
  --fetch, --clone   Fetch the mirror when it is missing
  --force            With --fetch, remove and re-fetch an existing mirror
  --update           Refresh an existing mirror
  --list             List content files of the mirror
  --get-path         Print the mirror path, exit 1 when missing
  --path <path>      Custom mirror directory
  --config <path>
  --timeout-ms <n>
  --json
  --silent
  --verbose
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const parseOrExit = (argv: string[]): ParsedArgs => {
	try {
		return parseArgs(argv);
	} catch (error) {
		ui.error(error instanceof Error ? error.message : String(error));
		process.exit(ExitCode.InvalidArgument);
	}
};

const selectSource = (config: MirrorConfig, id: string): MirrorSource => {
	const source = config.sources[id];
	if (!source) {
		const available = Object.keys(config.sources).join(", ");
		ui.error(`Unknown source '${id}'. Available: ${available}.`);
		process.exit(ExitCode.InvalidArgument);
	}
	return source;
};

const runsTransfer = (options: CliOptions) =>
	options.fetch || options.update || !hasExplicitIntent(options);

const runSource = async (
	source: MirrorSource,
	options: CliOptions,
): Promise<{ report: MirrorReport; reported: boolean }> => {
	const live =
		!options.json &&
		!options.silent &&
		Boolean(process.stdout.isTTY) &&
		runsTransfer(options);
	const reporter = live ? new TaskReporter() : null;
	const verboseLogger =
		options.verbose && !options.json && !options.silent
			? (message: string) => ui.line(pc.dim(message))
			: undefined;
	const logger = reporter
		? (message: string) => reporter.debug(message)
		: verboseLogger;
	const transfer = createTransfer({ timeoutMs: options.timeoutMs, logger });

	try {
		reporter?.start(source.label);
		const report = await runMirrorCommand(
			{
				source,
				path: options.path,
				fetch: options.fetch,
				update: options.update,
				force: options.force,
				list: options.list,
				getPath: options.getPath,
				logger,
			},
			{ transfer },
		);
		if (reporter) {
			for (const step of report.steps) {
				const message = stepOutcomeMessage(source, report.path, step);
				if (message) {
					reporter.complete(
						source.label,
						message.level,
						message.label,
						message.details,
					);
				}
			}
			reporter.finish();
		}
		return { report, reported: reporter !== null };
	} finally {
		reporter?.stop();
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(argv: string[] = process.argv): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseOrExit(argv);
		const { options } = parsed;

		setSilentMode(options.silent || options.json);

		if (parsed.help) {
			printHelp();
			process.exit(ExitCode.Success);
		}

		if (!parsed.source) {
			printHelp();
			process.exit(ExitCode.InvalidArgument);
		}

		const config = await loadConfig({
			configPath: options.config,
			defaultRootDir: defaultRootDir(import.meta.url),
		});
		const source = selectSource(config, parsed.source);
		const { report, reported } = await runSource(source, options);

		if (options.json) {
			process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
		} else {
			printMirrorReport(source, report, { skipOutcomes: reported });
		}
		process.exitCode = report.exitCode;
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message =
		error instanceof Error ? error.message || String(error) : String(error);
	ui.error(message);
	process.exit(ExitCode.FatalError);
}
