import path from "node:path";
import type { BulkHttpSource } from "../types/mirror";
import { runTransferCommand } from "./exec";
import { redactUrl } from "./redact";
import type { TransferOptions, TransferResult } from "./types";

export const resolveWgetCommand = (): string =>
	process.env.REFMIRROR_WGET_COMMAND || "wget";

/**
 * Recursive crawl that stays below the start URL, drops the host directory,
 * strips `cutDirs` leading path levels and rewrites links for local viewing.
 * Output lands in the parent of `target`.
 */
export const buildWgetArgs = (source: BulkHttpSource, target: string) => [
	"-r",
	"-np",
	"-nH",
	`--cut-dirs=${source.cutDirs}`,
	"-k",
	"-p",
	"-E",
	"-A",
	source.accept.join(","),
	source.url,
	"-P",
	path.dirname(target),
];

export const wgetMirror = (
	source: BulkHttpSource,
	target: string,
	options: TransferOptions = {},
): Promise<TransferResult> => {
	const command = resolveWgetCommand();
	const args = buildWgetArgs(source, target);
	return runTransferCommand(command, args, {
		timeoutMs: options.timeoutMs,
		logger: options.logger,
		label: `${command} ${args.map(redactUrl).join(" ")}`,
	});
};
