import { ExecaError, execa } from "execa";
import { toErrorMessage } from "../errors";
import type { TransferResult } from "./types";

type RunOptions = {
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	timeoutMs?: number;
	label?: string;
	logger?: (message: string) => void;
};

type OutputStreams = {
	stdout: NodeJS.ReadableStream | null;
	stderr: NodeJS.ReadableStream | null;
};

const attachLogger = (
	subprocess: OutputStreams,
	commandLabel: string,
	logger?: (message: string) => void,
) => {
	if (!logger) {
		return;
	}
	const forward = (stream: NodeJS.ReadableStream | null) => {
		if (!stream) return;
		stream.on("data", (chunk: unknown) => {
			const text =
				chunk instanceof Buffer ? chunk.toString("utf8") : String(chunk);
			for (const line of text.split(/\r?\n/)) {
				if (!line) continue;
				logger(`${commandLabel} | ${line}`);
			}
		});
	};
	forward(subprocess.stdout);
	forward(subprocess.stderr);
};

/**
 * Run an external transfer tool to completion. A non-zero exit, a timeout or
 * a missing binary resolve to `{ ok: false }` with the tool's short message.
 */
export const runTransferCommand = async (
	command: string,
	args: string[],
	options: RunOptions = {},
): Promise<TransferResult> => {
	const commandLabel = options.label ?? `${command} ${args.join(" ")}`;
	options.logger?.(commandLabel);
	try {
		const subprocess = execa(command, args, {
			cwd: options.cwd,
			env: options.env,
			timeout: options.timeoutMs,
			maxBuffer: 10 * 1024 * 1024,
			stdin: "ignore",
			stdout: "pipe",
			stderr: "pipe",
		});
		attachLogger(subprocess, command, options.logger);
		await subprocess;
		return { ok: true };
	} catch (error) {
		const message =
			error instanceof ExecaError ? error.shortMessage : toErrorMessage(error);
		return { ok: false, error: message };
	}
};
