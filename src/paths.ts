import { existsSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const DEFAULT_ROOT_DIRNAME = "references";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

type ResolvePathOptions = {
	homeDir?: string;
	cwd?: string;
};

const HOME_PREFIX_RE = /^~(?=$|[\\/])/;

export const expandHome = (value: string, homeDir = homedir()) =>
	value.replace(HOME_PREFIX_RE, homeDir);

/**
 * Resolve the local mirror directory for one invocation.
 *
 * An override wins over the source default. It has `~` expanded and is made
 * absolute against `cwd`, but is not checked for existence.
 */
export const resolveMirrorPath = (
	defaultPath: string,
	overridePath?: string,
	options: ResolvePathOptions = {},
): string => {
	if (overridePath === undefined || overridePath.length === 0) {
		return defaultPath;
	}
	const expanded = expandHome(overridePath, options.homeDir);
	return path.resolve(options.cwd ?? process.cwd(), expanded);
};

/**
 * Find the package root of the running module: the nearest ancestor
 * directory holding a package.json.
 */
export const findPackageRoot = (moduleUrl: string): string => {
	let current = path.dirname(fileURLToPath(moduleUrl));
	while (!existsSync(path.join(current, "package.json"))) {
		const parent = path.dirname(current);
		if (parent === current) {
			return path.dirname(fileURLToPath(moduleUrl));
		}
		current = parent;
	}
	return current;
};

export const defaultRootDir = (moduleUrl: string) =>
	path.join(findPackageRoot(moduleUrl), DEFAULT_ROOT_DIRNAME);
