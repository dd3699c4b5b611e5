import type { MirrorSource, VcsCloneSource } from "../types/mirror";
import { runTransferCommand } from "./exec";
import { redactUrl } from "./redact";
import type { TransferOptions, TransferResult } from "./types";

export const resolveGitCommand = (): string =>
	process.env.REFMIRROR_GIT_COMMAND || "git";

export const buildGitEnv = (): NodeJS.ProcessEnv => ({
	...process.env,
	GIT_TERMINAL_PROMPT: "0",
	GIT_CONFIG_NOSYSTEM: "1",
	GIT_CONFIG_NOGLOBAL: "1",
	...(process.platform === "win32" ? {} : { GIT_ASKPASS: "/bin/false" }),
});

const GIT_CONFIGS = [
	"-c",
	"core.hooksPath=/dev/null",
	"-c",
	"submodule.recurse=false",
	"-c",
	"protocol.ext.allow=never",
];

const git = (
	args: string[],
	options: TransferOptions & { cwd?: string; label: string },
) => {
	const command = resolveGitCommand();
	return runTransferCommand(command, [...GIT_CONFIGS, ...args], {
		cwd: options.cwd,
		env: buildGitEnv(),
		timeoutMs: options.timeoutMs,
		logger: options.logger,
		label: `${command} ${options.label}`,
	});
};

export const gitClone = (
	source: MirrorSource,
	target: string,
	options: TransferOptions = {},
): Promise<TransferResult> =>
	git(["clone", source.url, target], {
		...options,
		label: `clone ${redactUrl(source.url)} ${target}`,
	});

/**
 * Update an existing clone in place: fetch origin, then pull the configured
 * branch. The clone is never re-created here.
 */
export const gitPull = async (
	source: VcsCloneSource,
	target: string,
	options: TransferOptions = {},
): Promise<TransferResult> => {
	const fetched = await git(["fetch", "origin"], {
		...options,
		cwd: target,
		label: "fetch origin",
	});
	if (!fetched.ok) {
		return fetched;
	}
	return git(["pull", "origin", source.branch], {
		...options,
		cwd: target,
		label: `pull origin ${source.branch}`,
	});
};
