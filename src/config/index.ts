import { access, readFile } from "node:fs/promises";
import path from "node:path";
import type { MirrorSource } from "../types/mirror";
import {
	ConfigSchema,
	DEFAULT_ACCEPT,
	DEFAULT_BRANCH,
	type RefmirrorConfigFile,
	type SourceDefinition,
	SourceDefinitionSchema,
	type SourceEntry,
} from "./schema";

export const DEFAULT_CONFIG_FILENAME = "refmirror.config.json";

export const BUILTIN_SOURCES: readonly SourceDefinition[] = [
	{
		id: "docs",
		label: "OpenCode documentation",
		mechanism: "bulk-http",
		url: "https://opencode.ai/docs/",
		dirname: "opencode-docs",
		suffix: ".html",
		// `-nH` drops only the host: the crawl lands in `<root>/docs`
		// and is moved onto `opencode-docs` afterwards.
		nestedDir: "docs",
		cutDirs: 0,
		accept: DEFAULT_ACCEPT,
	},
	{
		id: "wiki",
		label: "tmux wiki",
		mechanism: "vcs-clone",
		url: "https://github.com/tmux/tmux.wiki.git",
		dirname: "tmux-wiki",
		suffix: ".md",
		branch: DEFAULT_BRANCH,
	},
];

export type MirrorConfig = {
	configPath: string | null;
	rootDir: string;
	sources: Record<string, MirrorSource>;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const formatIssues = (issues: Array<{ path: (string | number)[]; message: string }>) =>
	issues
		.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
		.join("; ");

export const validateConfig = (input: unknown): RefmirrorConfigFile => {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		throw new Error("Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new Error(
			`Config does not match schema: ${formatIssues(parsed.error.issues)}.`,
		);
	}
	return parsed.data;
};

const assertSimpleDirname = (id: string, dirname: string) => {
	const normalized = path.normalize(dirname);
	if (
		normalized !== dirname ||
		dirname === "." ||
		dirname.includes("..") ||
		dirname.includes("/") ||
		dirname.includes("\\")
	) {
		throw new Error(
			`Source '${id}' dirname must be a single directory name: ${dirname}`,
		);
	}
};

const mergeSource = (
	id: string,
	base: SourceDefinition | undefined,
	entry: SourceEntry,
): SourceDefinition => {
	const parsed = SourceDefinitionSchema.safeParse({
		id,
		label: id,
		dirname: id,
		...base,
		...entry,
	});
	if (!parsed.success) {
		throw new Error(
			`Source '${id}' is incomplete: ${formatIssues(parsed.error.issues)}.`,
		);
	}
	return parsed.data;
};

/**
 * Merge a validated config file over the built-in sources and anchor every
 * source under the root directory.
 */
export const resolveConfig = (
	file: RefmirrorConfigFile,
	params: { baseDir: string; defaultRootDir: string; configPath?: string },
): MirrorConfig => {
	const rootDir = file.rootDir
		? path.resolve(params.baseDir, file.rootDir)
		: params.defaultRootDir;
	const definitions = new Map(
		BUILTIN_SOURCES.map((source) => [source.id, source]),
	);
	for (const [id, entry] of Object.entries(file.sources ?? {})) {
		definitions.set(id, mergeSource(id, definitions.get(id), entry));
	}
	const sources: Record<string, MirrorSource> = {};
	for (const [id, definition] of definitions) {
		assertSimpleDirname(id, definition.dirname);
		sources[id] = {
			...definition,
			defaultPath: path.join(rootDir, definition.dirname),
		};
	}
	return {
		configPath: params.configPath ?? null,
		rootDir,
		sources,
	};
};

export const resolveConfigPath = (configPath?: string, cwd = process.cwd()) =>
	configPath
		? path.resolve(cwd, configPath)
		: path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

const readConfigFile = async (filePath: string) => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read config at ${filePath}: ${message}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${filePath}: ${message}`);
	}
	return validateConfig(parsed);
};

/**
 * Load the mirror configuration. An explicit `configPath` must exist; the
 * default file in the working directory is optional.
 */
export const loadConfig = async (params: {
	configPath?: string;
	defaultRootDir: string;
	cwd?: string;
}): Promise<MirrorConfig> => {
	const cwd = params.cwd ?? process.cwd();
	const resolvedPath = resolveConfigPath(params.configPath, cwd);
	if (!(await exists(resolvedPath))) {
		if (params.configPath) {
			throw new Error(`Config not found at ${resolvedPath}.`);
		}
		return resolveConfig({}, { baseDir: cwd, defaultRootDir: params.defaultRootDir });
	}
	const file = await readConfigFile(resolvedPath);
	return resolveConfig(file, {
		baseDir: path.dirname(resolvedPath),
		defaultRootDir: params.defaultRootDir,
		configPath: resolvedPath,
	});
};
