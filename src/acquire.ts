import { mkdir, rename } from "node:fs/promises";
import path from "node:path";
import { toErrorMessage } from "./errors";
import { inspectMirror, removeDir } from "./store";
import type { Transfer } from "./transfer";
import type {
	AcquisitionOutcome,
	MirrorSource,
	MirrorState,
} from "./types/mirror";

export type AcquireOptions = {
	force?: boolean;
	logger?: (message: string) => void;
};

export type AcquireDeps = {
	transfer: Transfer;
	removeDir?: typeof removeDir;
};

type RemovalFailure = Extract<AcquisitionOutcome, { status: "failed-removal" }>;

/**
 * Inspect `target`, turning unexpected filesystem errors (EACCES and the
 * like) into a failed-transfer outcome.
 */
export const inspectTarget = async (
	target: string,
): Promise<
	| { state: MirrorState }
	| { failure: Extract<AcquisitionOutcome, { status: "failed-transfer" }> }
> => {
	try {
		return { state: await inspectMirror(target) };
	} catch (error) {
		return {
			failure: { status: "failed-transfer", error: toErrorMessage(error) },
		};
	}
};

/**
 * Delete whatever occupies `target` and confirm it is gone. Returns the
 * failure outcome, or null once the path is clear.
 */
export const removeExisting = async (
	target: string,
	deps: Pick<AcquireDeps, "removeDir">,
): Promise<RemovalFailure | null> => {
	const remove = deps.removeDir ?? removeDir;
	try {
		await remove(target);
		if ((await inspectMirror(target)) !== "missing") {
			return {
				status: "failed-removal",
				error: `${target} still exists after removal.`,
			};
		}
		return null;
	} catch (error) {
		return { status: "failed-removal", error: toErrorMessage(error) };
	}
};

// The crawler writes into `<parent>/<nestedDir>`; move it onto the target
// unless something already sits there.
const promoteNestedDir = async (
	target: string,
	nestedDir: string,
	logger?: (message: string) => void,
) => {
	const nestedPath = path.join(path.dirname(target), nestedDir);
	if (path.resolve(nestedPath) === path.resolve(target)) {
		return;
	}
	if ((await inspectMirror(nestedPath)) !== "directory") {
		return;
	}
	if ((await inspectMirror(target)) !== "missing") {
		logger?.(`Keeping ${nestedPath}: ${target} already exists.`);
		return;
	}
	logger?.(`Moving ${nestedPath} to ${target}`);
	await rename(nestedPath, target);
};

const runTransfer = async (
	source: MirrorSource,
	target: string,
	deps: AcquireDeps,
	logger?: (message: string) => void,
): Promise<AcquisitionOutcome | null> => {
	try {
		await mkdir(path.dirname(target), { recursive: true });
		const result = await deps.transfer.fetch(source, target);
		if (!result.ok) {
			return { status: "failed-transfer", error: result.error };
		}
		if (source.mechanism === "bulk-http" && source.nestedDir) {
			await promoteNestedDir(target, source.nestedDir, logger);
		}
		if ((await inspectMirror(target)) !== "directory") {
			return {
				status: "failed-transfer",
				error: `Transfer finished but ${target} was not created.`,
			};
		}
		return null;
	} catch (error) {
		return { status: "failed-transfer", error: toErrorMessage(error) };
	}
};

/**
 * Populate the mirror at `target`.
 *
 * An existing path (directory or stray file) is left untouched unless
 * `force` is set, in which case it is removed first and nothing is fetched
 * if that removal fails. A failed transfer keeps whatever partial output the
 * tool produced. A transfer that succeeds without leaving a directory at
 * `target` counts as failed.
 */
export const acquireMirror = async (
	source: MirrorSource,
	target: string,
	options: AcquireOptions,
	deps: AcquireDeps,
): Promise<AcquisitionOutcome> => {
	const inspected = await inspectTarget(target);
	if ("failure" in inspected) {
		return inspected.failure;
	}
	const { state } = inspected;
	if (state !== "missing" && !options.force) {
		return { status: "skipped-already-present" };
	}
	const replacing = state !== "missing";
	if (replacing) {
		options.logger?.(`Removing existing ${state}: ${target}`);
		const failure = await removeExisting(target, deps);
		if (failure) {
			return failure;
		}
	}
	options.logger?.(`Fetching ${source.label} to ${target}`);
	const failure = await runTransfer(source, target, deps, options.logger);
	if (failure) {
		return failure;
	}
	return { status: replacing ? "removed-and-reacquired" : "acquired" };
};
