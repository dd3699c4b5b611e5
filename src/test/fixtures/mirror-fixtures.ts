import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import fg from "fast-glob";
import { vi } from "vitest";
import type { Transfer, TransferResult } from "../../transfer";
import type {
	BulkHttpSource,
	MirrorSource,
	VcsCloneSource,
} from "../../types/mirror";

export const SITE_FILES: Record<string, string> = {
	"index.html": "<h1>Home</h1>",
	"guide/setup.html": "<h1>Setup</h1>",
	"assets/app.css": "body { margin: 0; }",
};

export const WIKI_FILES: Record<string, string> = {
	"Home.md": "# Home",
	"Getting-Started.md": "# Getting started",
	"FAQ.md": "# FAQ",
	".git/HEAD": "ref: refs/heads/main",
};

export const createTempRoot = () =>
	mkdtemp(path.join(tmpdir(), "refmirror-test-"));

export const removeTempRoot = (root: string) =>
	rm(root, { recursive: true, force: true });

export const createSiteSource = (root: string): BulkHttpSource => ({
	id: "site",
	label: "Test docs",
	mechanism: "bulk-http",
	url: "https://docs.example.test/docs/",
	dirname: "site",
	suffix: ".html",
	nestedDir: "docs",
	cutDirs: 1,
	accept: ["*.html", "*.css"],
	defaultPath: path.join(root, "site"),
});

export const createWikiSource = (root: string): VcsCloneSource => ({
	id: "wiki",
	label: "Test wiki",
	mechanism: "vcs-clone",
	url: "https://git.example.test/wiki.git",
	dirname: "wiki",
	suffix: ".md",
	branch: "main",
	defaultPath: path.join(root, "wiki"),
});

export const writeFiles = async (
	root: string,
	files: Record<string, string>,
) => {
	for (const [relativePath, content] of Object.entries(files)) {
		const filePath = path.join(root, relativePath);
		await mkdir(path.dirname(filePath), { recursive: true });
		await writeFile(filePath, content, "utf8");
	}
};

/**
 * Snapshot of every file below `root` as relative path -> content.
 */
export const readTree = async (root: string) => {
	const files = await fg("**/*", { cwd: root, dot: true, onlyFiles: true });
	const tree: Record<string, string> = {};
	for (const file of files.sort()) {
		tree[file] = await readFile(path.join(root, file), "utf8");
	}
	return tree;
};

type StubTransferOptions = {
	siteFiles?: Record<string, string>;
	wikiFiles?: Record<string, string>;
	fetchError?: string;
	pullError?: string;
};

// Where the crawler would write: the nested folder beside the target.
const fetchDestination = (source: MirrorSource, target: string) =>
	source.mechanism === "bulk-http" && source.nestedDir
		? path.join(path.dirname(target), source.nestedDir)
		: target;

/**
 * In-process stand-in for wget and git that writes fixture files instantly.
 */
export const createStubTransfer = (options: StubTransferOptions = {}) => {
	const fetch = vi.fn(
		async (source: MirrorSource, target: string): Promise<TransferResult> => {
			if (options.fetchError) {
				return { ok: false, error: options.fetchError };
			}
			const files =
				source.mechanism === "bulk-http"
					? (options.siteFiles ?? SITE_FILES)
					: (options.wikiFiles ?? WIKI_FILES);
			await writeFiles(fetchDestination(source, target), files);
			return { ok: true };
		},
	);
	const pull = vi.fn(
		async (_source: VcsCloneSource, _target: string): Promise<TransferResult> =>
			options.pullError ? { ok: false, error: options.pullError } : { ok: true },
	);
	const transfer: Transfer = { fetch, pull };
	return { transfer, fetch, pull };
};
