import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTransfer } from "../../transfer";
import { runTransferCommand } from "../../transfer/exec";
import { buildWgetArgs, wgetMirror } from "../../transfer/wget";
import {
	createSiteSource,
	createWikiSource,
} from "../fixtures/mirror-fixtures";

vi.mock("../../transfer/exec", () => ({
	runTransferCommand: vi.fn(async () => ({ ok: true })),
}));

const mockRun = vi.mocked(runTransferCommand);

describe("wget transfer", () => {
	const source = createSiteSource("/mirrors");

	beforeEach(() => {
		vi.clearAllMocks();
		vi.stubEnv("REFMIRROR_WGET_COMMAND", "");
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("builds a mirroring crawl into the parent directory", () => {
		expect(buildWgetArgs(source, "/mirrors/site")).toEqual([
			"-r",
			"-np",
			"-nH",
			"--cut-dirs=1",
			"-k",
			"-p",
			"-E",
			"-A",
			"*.html,*.css",
			"https://docs.example.test/docs/",
			"-P",
			"/mirrors",
		]);
	});

	it("runs wget with the transfer options", async () => {
		const logger = vi.fn();

		const result = await wgetMirror(source, "/mirrors/site", {
			timeoutMs: 2000,
			logger,
		});

		expect(result).toEqual({ ok: true });
		expect(mockRun).toHaveBeenCalledWith(
			"wget",
			buildWgetArgs(source, "/mirrors/site"),
			expect.objectContaining({ timeoutMs: 2000, logger }),
		);
	});

	it("honours a wget command override", async () => {
		vi.stubEnv("REFMIRROR_WGET_COMMAND", "/usr/local/bin/wget2");

		await wgetMirror(source, "/mirrors/site");

		expect(mockRun.mock.calls[0]?.[0]).toBe("/usr/local/bin/wget2");
	});
});

describe("createTransfer", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		vi.stubEnv("REFMIRROR_WGET_COMMAND", "");
		vi.stubEnv("REFMIRROR_GIT_COMMAND", "");
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("dispatches on the transfer mechanism", async () => {
		const transfer = createTransfer({ timeoutMs: 3000 });

		await transfer.fetch(createSiteSource("/mirrors"), "/mirrors/site");
		await transfer.fetch(createWikiSource("/mirrors"), "/mirrors/wiki");

		expect(mockRun.mock.calls.map((call) => call[0])).toEqual(["wget", "git"]);
		expect(mockRun.mock.calls.map((call) => call[2]?.timeoutMs)).toEqual([
			3000, 3000,
		]);
	});

	it("pulls repository sources with git", async () => {
		const transfer = createTransfer();

		await transfer.pull(createWikiSource("/mirrors"), "/mirrors/wiki");

		expect(mockRun.mock.calls.map((call) => call[1].slice(-3))).toEqual([
			["protocol.ext.allow=never", "fetch", "origin"],
			["pull", "origin", "main"],
		]);
	});
});
