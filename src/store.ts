import { lstat, rm } from "node:fs/promises";
import fg from "fast-glob";
import { getErrnoCode } from "./errors";
import type { MirrorListing, MirrorState } from "./types/mirror";

const DEFAULT_RM_RETRIES = 3;
const DEFAULT_RM_BACKOFF_MS = 100;
const RETRYABLE_RM_CODES = new Set(["ENOTEMPTY", "EBUSY", "EPERM"]);
// A file in place of a parent directory means nothing can live at the path.
const ABSENT_CODES = new Set(["ENOENT", "ENOTDIR"]);

export const inspectMirror = async (target: string): Promise<MirrorState> => {
	try {
		const stats = await lstat(target);
		return stats.isDirectory() ? "directory" : "not-directory";
	} catch (error) {
		const code = getErrnoCode(error);
		if (code && ABSENT_CODES.has(code)) {
			return "missing";
		}
		throw error;
	}
};

export const mirrorExists = async (target: string) =>
	(await inspectMirror(target)) === "directory";

/**
 * List content files of a mirror as sorted POSIX paths relative to its root.
 * Hidden entries (such as a clone's `.git`) are skipped.
 */
export const listMirrorFiles = async (
	target: string,
	suffix: string,
): Promise<MirrorListing> => {
	if (!(await mirrorExists(target))) {
		return { status: "missing" };
	}
	const files = await fg(`**/*${fg.escapePath(suffix)}`, {
		cwd: target,
		onlyFiles: true,
		dot: false,
		followSymbolicLinks: false,
	});
	files.sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
	return { status: "present", files };
};

export const removeDir = async (
	target: string,
	retries = DEFAULT_RM_RETRIES,
) => {
	for (let attempt = 0; attempt <= retries; attempt += 1) {
		try {
			await rm(target, { recursive: true, force: true });
			return;
		} catch (error) {
			const code = getErrnoCode(error);
			if (!code || !RETRYABLE_RM_CODES.has(code) || attempt === retries) {
				throw error;
			}
			await new Promise((resolve) =>
				setTimeout(resolve, DEFAULT_RM_BACKOFF_MS * (attempt + 1)),
			);
		}
	}
};
